import { configure as configureLogTape, type LogRecord, reset } from "@logtape/logtape";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
	configure,
	effectiveLevel,
	getDefaultResolver,
	isEnabled,
	resetDefaultResolver,
} from "./global.ts";

describe("process-wide resolver", () => {
	beforeEach(() => {
		resetDefaultResolver();
	});

	afterEach(async () => {
		resetDefaultResolver();
		await reset();
	});

	test("resolves everything to warn before configure", () => {
		expect(effectiveLevel("myapp")).toBe("warn");
		expect(isEnabled("myapp", "info")).toBe(false);
		expect(isEnabled("myapp", "warn")).toBe(true);
	});

	test("configure applies the directive string", () => {
		const ruleset = configure("warn,myapp=info,myapp.database=trace");

		expect(ruleset.rules).toHaveLength(2);
		expect(effectiveLevel("myapp.database")).toBe("trace");
		expect(effectiveLevel("myapp.api")).toBe("info");
		expect(isEnabled("somelib", "info")).toBe(false);
	});

	test("reconfiguring keeps the same handle", () => {
		const handle = getDefaultResolver();

		configure("error");
		configure("debug");

		expect(getDefaultResolver()).toBe(handle);
		expect(effectiveLevel("x")).toBe("debug");
	});

	test("configure never throws on malformed input", () => {
		expect(() => configure("=,..=x,,=,info=info=info")).not.toThrow();
		expect(effectiveLevel("anything")).toBe("warn");
	});

	test("logs skipped directives under envlog.directives", async () => {
		const records: LogRecord[] = [];
		await configureLogTape({
			sinks: { buffer: (record) => records.push(record) },
			loggers: [{ category: ["envlog"], sinks: ["buffer"], lowestLevel: "trace" }],
			reset: true,
		});

		configure("warn,bogus=notalevel,myapp=info");

		expect(records).toHaveLength(1);
		expect(records[0]?.category).toEqual(["envlog", "directives"]);
		expect(records[0]?.level).toBe("warning");
		expect(records[0]?.properties).toEqual({
			directive: "bogus=notalevel",
			index: 1,
			reason: "unknown-level",
		});
	});
});
