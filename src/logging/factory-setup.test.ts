import { afterEach, describe, expect, test, vi } from "vitest";
import { isStructuredError } from "../errors/structured-error.ts";
import { createEnvLogger } from "./factory.ts";

const { configureMock } = vi.hoisted(() => ({ configureMock: vi.fn() }));

vi.mock("@logtape/logtape", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@logtape/logtape")>();
	return { ...actual, configure: configureMock };
});

describe("createEnvLogger setup failures", () => {
	afterEach(() => {
		configureMock.mockReset();
	});

	test("wraps LogTape configuration errors", async () => {
		const original = new Error("Sink not found: missing.");
		configureMock.mockRejectedValueOnce(original);

		const { initLogger } = createEnvLogger({
			directives: "info",
			sinks: { buffer: () => {} },
		});

		let caught: unknown;
		try {
			await initLogger();
		} catch (error) {
			caught = error;
		}

		expect(isStructuredError(caught)).toBe(true);
		if (!isStructuredError(caught)) return;
		expect(caught.message).toBe("Failed to configure LogTape");
		expect(caught.category).toBe("CONFIGURATION");
		expect(caught.code).toBe("LOGGING_SETUP_FAILED");
		expect(caught.cause).toBe(original);
		expect(caught.context).toEqual({ sinks: ["buffer"], logFile: undefined });
	});

	test("wraps non-Error rejections", async () => {
		configureMock.mockRejectedValueOnce("boom");

		const { initLogger } = createEnvLogger({ sinks: { buffer: () => {} } });

		await expect(initLogger()).rejects.toMatchObject({
			code: "LOGGING_SETUP_FAILED",
			cause: { message: "boom" },
		});
	});

	test("absorbs an existing configuration", async () => {
		configureMock.mockRejectedValueOnce(
			new Error("Already configured; if you want to reset, turn on the reset flag."),
		);

		const { initLogger } = createEnvLogger({ sinks: { buffer: () => {} } });

		await expect(initLogger()).resolves.toBeUndefined();
	});

	test("a failed init can be retried", async () => {
		configureMock.mockRejectedValueOnce(new Error("Sink not found: missing."));
		configureMock.mockResolvedValueOnce(undefined);

		const { resolver, initLogger } = createEnvLogger({
			directives: "debug",
			sinks: { buffer: () => {} },
		});

		await expect(initLogger()).rejects.toThrow("Failed to configure LogTape");
		await initLogger();
		await initLogger();

		expect(configureMock).toHaveBeenCalledTimes(2);
		expect(resolver.effectiveLevel("myapp")).toBe("debug");
	});
});
