/**
 * Directive string parser.
 *
 * Grammar (informal):
 *
 * ```
 * config    := directive (',' directive)*
 * directive := level | target '=' level
 * target    := segment ('.' segment)*
 * level     := trace | debug | info | warn | warning | error | off
 * ```
 *
 * Parsing is permissive: a malformed directive is dropped and the rest of
 * the string still applies. Bad environment variables must never stop a
 * program from starting.
 *
 * @module directives/parser
 */

import { DirectiveError } from "../errors/directive-error.ts";
import { type Level, parseLevel } from "../levels/index.ts";
import {
	DEFAULT_LEVEL,
	type DirectiveAnalysis,
	type Rule,
	type Ruleset,
	type SkippedDirective,
} from "./types.ts";

const DIRECTIVE_SEPARATOR = ",";
const TARGET_SEPARATOR = "=";
const SEGMENT_SEPARATOR = ".";

/**
 * Parse a directive string and report every directive that was dropped.
 *
 * @param raw - Directive string; `undefined`, `null` and `""` all mean
 *   "nothing configured"
 *
 * @example
 * ```ts
 * const { ruleset, skipped } = analyzeDirectives("warn,db=loud,app=info");
 * // ruleset.defaultLevel === "warn"
 * // ruleset.rules → [{ target: ["app"], level: "info" }]
 * // skipped → [{ directive: "db=loud", index: 1, reason: "unknown-level" }]
 * ```
 */
export function analyzeDirectives(
	raw: string | null | undefined,
): DirectiveAnalysis {
	const rules: Rule[] = [];
	const skipped: SkippedDirective[] = [];
	let defaultLevel: Level | undefined;

	const directives = (raw ?? "")
		.split(DIRECTIVE_SEPARATOR)
		.map((token) => token.trim())
		.filter((token) => token.length > 0);

	for (const [index, directive] of directives.entries()) {
		const eq = directive.indexOf(TARGET_SEPARATOR);

		if (eq === -1) {
			const level = parseLevel(directive);
			if (level === undefined) {
				skipped.push({ directive, index, reason: "unknown-level" });
				continue;
			}
			// Last bare level wins
			defaultLevel = level;
			continue;
		}

		const targetText = directive.slice(0, eq).trim();
		const levelText = directive.slice(eq + 1);

		if (targetText.length === 0) {
			skipped.push({ directive, index, reason: "empty-target" });
			continue;
		}

		const target = targetText
			.split(SEGMENT_SEPARATOR)
			.map((segment) => segment.trim());
		if (target.some((segment) => segment.length === 0)) {
			skipped.push({ directive, index, reason: "empty-segment" });
			continue;
		}

		const level = parseLevel(levelText);
		if (level === undefined) {
			skipped.push({ directive, index, reason: "unknown-level" });
			continue;
		}

		rules.push(Object.freeze({ target: Object.freeze(target), level }));
	}

	const ruleset: Ruleset = Object.freeze({
		rules: Object.freeze(rules),
		defaultLevel: defaultLevel ?? DEFAULT_LEVEL,
	});

	return { ruleset, skipped };
}

/**
 * Parse a directive string into a ruleset. Never throws.
 *
 * @example
 * ```ts
 * const ruleset = parseDirectives("warn,myapp=info,myapp.database=trace");
 * // ruleset.defaultLevel === "warn"
 * // ruleset.rules.length === 2
 * ```
 */
export function parseDirectives(raw: string | null | undefined): Ruleset {
	return analyzeDirectives(raw).ruleset;
}

/**
 * Parse a directive string, rejecting it if any directive would be dropped.
 *
 * For tooling that wants to surface typos (config checks, startup flags)
 * instead of silently ignoring them.
 *
 * @throws DirectiveError listing every skipped directive
 */
export function assertValidDirectives(raw: string | null | undefined): Ruleset {
	const { ruleset, skipped } = analyzeDirectives(raw);
	if (skipped.length > 0) {
		throw new DirectiveError(raw ?? "", skipped);
	}
	return ruleset;
}

/**
 * Render a ruleset back into directive syntax.
 *
 * The default level comes first, then the rules in order. Parsing the
 * result yields an equivalent ruleset.
 *
 * @example
 * ```ts
 * formatRuleset(parseDirectives("myapp=INFO, Warning"));
 * // "warn,myapp=info"
 * ```
 */
export function formatRuleset(ruleset: Ruleset): string {
	return [
		ruleset.defaultLevel,
		...ruleset.rules.map(
			(rule) =>
				`${rule.target.join(SEGMENT_SEPARATOR)}${TARGET_SEPARATOR}${rule.level}`,
		),
	].join(DIRECTIVE_SEPARATOR);
}
