/**
 * envlog/directives
 *
 * Turns a directive string such as `warn,myapp=info,myapp.database=trace`
 * into an immutable ruleset.
 *
 * @example
 * ```typescript
 * import { analyzeDirectives } from "envlog/directives";
 *
 * const { ruleset, skipped } = analyzeDirectives(process.env.NODE_LOG);
 * ```
 *
 * @packageDocumentation
 */

export { reportSkippedDirectives } from "./diagnostics.ts";
export {
	analyzeDirectives,
	assertValidDirectives,
	formatRuleset,
	parseDirectives,
} from "./parser.ts";
export {
	DEFAULT_LEVEL,
	type DirectiveAnalysis,
	EMPTY_RULESET,
	type Rule,
	type Ruleset,
	type SkippedDirective,
	type SkipReason,
} from "./types.ts";
