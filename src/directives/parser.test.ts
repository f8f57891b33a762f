import { describe, expect, test } from "vitest";
import { DirectiveError } from "../errors/directive-error.ts";
import {
	analyzeDirectives,
	assertValidDirectives,
	formatRuleset,
	parseDirectives,
} from "./parser.ts";
import { EMPTY_RULESET } from "./types.ts";

describe("directives/parser", () => {
	describe("parseDirectives", () => {
		test("empty input falls back to warn with no rules", () => {
			expect(parseDirectives("")).toEqual({ rules: [], defaultLevel: "warn" });
			expect(parseDirectives(undefined)).toEqual(EMPTY_RULESET);
			expect(parseDirectives(null)).toEqual(EMPTY_RULESET);
			expect(parseDirectives(" , ,, ")).toEqual(EMPTY_RULESET);
		});

		test("bare level sets the default", () => {
			expect(parseDirectives("info")).toEqual({
				rules: [],
				defaultLevel: "info",
			});
		});

		test("last bare level wins", () => {
			expect(parseDirectives("debug,myapp=info,error").defaultLevel).toBe(
				"error",
			);
		});

		test("keeps target rules in order of appearance", () => {
			const ruleset = parseDirectives("warn,myapp=info,myapp.database=trace");

			expect(ruleset.defaultLevel).toBe("warn");
			expect(ruleset.rules).toEqual([
				{ target: ["myapp"], level: "info" },
				{ target: ["myapp", "database"], level: "trace" },
			]);
		});

		test("keeps duplicate targets", () => {
			expect(parseDirectives("a.b=debug,a.b=error").rules).toEqual([
				{ target: ["a", "b"], level: "debug" },
				{ target: ["a", "b"], level: "error" },
			]);
		});

		test("trims tokens, targets and segments", () => {
			expect(parseDirectives("  myapp . db =  DEBUG , Info ")).toEqual({
				rules: [{ target: ["myapp", "db"], level: "debug" }],
				defaultLevel: "info",
			});
		});

		test("folds level case but not target case", () => {
			expect(parseDirectives("MyApp=WARNING").rules).toEqual([
				{ target: ["MyApp"], level: "warn" },
			]);
		});

		test("drops directives with unknown levels and keeps the rest", () => {
			expect(parseDirectives("warn,bogus=notalevel,myapp=info")).toEqual({
				rules: [{ target: ["myapp"], level: "info" }],
				defaultLevel: "warn",
			});
			expect(parseDirectives("loud").defaultLevel).toBe("warn");
		});

		test("splits only on the first equals sign", () => {
			expect(parseDirectives("a=info=debug").rules).toEqual([]);
		});

		test("returns frozen structures", () => {
			const ruleset = parseDirectives("myapp=info");

			expect(Object.isFrozen(ruleset)).toBe(true);
			expect(Object.isFrozen(ruleset.rules)).toBe(true);
			expect(Object.isFrozen(ruleset.rules[0])).toBe(true);
			expect(Object.isFrozen(ruleset.rules[0]?.target)).toBe(true);
		});
	});

	describe("analyzeDirectives", () => {
		test("reports each skipped directive with its reason", () => {
			const { ruleset, skipped } = analyzeDirectives(
				"warn, =info, a..b=debug, bogus=notalevel, loud, ok=trace",
			);

			expect(ruleset.rules).toEqual([{ target: ["ok"], level: "trace" }]);
			expect(skipped).toEqual([
				{ directive: "=info", index: 1, reason: "empty-target" },
				{ directive: "a..b=debug", index: 2, reason: "empty-segment" },
				{ directive: "bogus=notalevel", index: 3, reason: "unknown-level" },
				{ directive: "loud", index: 4, reason: "unknown-level" },
			]);
		});

		test("indexes only non-empty directives", () => {
			expect(analyzeDirectives(",,nope").skipped).toEqual([
				{ directive: "nope", index: 0, reason: "unknown-level" },
			]);
		});

		test("flags trailing and leading dots as empty segments", () => {
			expect(
				analyzeDirectives("myapp.=info,.myapp=info").skipped.map((s) => s.reason),
			).toEqual(["empty-segment", "empty-segment"]);
		});

		test("reports nothing for a clean string", () => {
			expect(analyzeDirectives("info,myapp=debug").skipped).toEqual([]);
		});
	});

	describe("assertValidDirectives", () => {
		test("returns the ruleset when every directive is valid", () => {
			expect(assertValidDirectives("error,myapp=debug")).toEqual({
				rules: [{ target: ["myapp"], level: "debug" }],
				defaultLevel: "error",
			});
			expect(assertValidDirectives(undefined)).toEqual(EMPTY_RULESET);
		});

		test("throws DirectiveError listing skipped directives", () => {
			let caught: unknown;
			try {
				assertValidDirectives("warn,bogus=notalevel,=info");
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(DirectiveError);
			if (!(caught instanceof DirectiveError)) return;
			expect(caught.message).toBe(
				'Invalid log directives in "warn,bogus=notalevel,=info": "bogus=notalevel" (unknown-level), "=info" (empty-target)',
			);
			expect(caught.code).toBe("INVALID_DIRECTIVES");
			expect(caught.category).toBe("CONFIGURATION");
			expect(caught.skipped).toHaveLength(2);
		});
	});

	describe("formatRuleset", () => {
		test("renders default first, then rules in order", () => {
			expect(formatRuleset(parseDirectives("myapp=INFO, Warning"))).toBe(
				"warn,myapp=info",
			);
			expect(
				formatRuleset(parseDirectives("debug,a.b=trace,a=off,a.b=error")),
			).toBe("debug,a.b=trace,a=off,a.b=error");
		});

		test("renders the empty ruleset as its default", () => {
			expect(formatRuleset(EMPTY_RULESET)).toBe("warn");
		});

		test("output parses back to an equal ruleset", () => {
			const ruleset = parseDirectives(" trace , x.y = Warning , z=OFF,bad=1");
			expect(parseDirectives(formatRuleset(ruleset))).toEqual(ruleset);
		});
	});
});
