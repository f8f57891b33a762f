/**
 * envlog
 *
 * Directive-based log level filtering: `warn,myapp=info,myapp.database=trace`
 * from one environment variable decides which level each logger emits.
 *
 * Import from subpath exports for the individual pieces:
 *   import { LevelResolver } from "envlog/resolver";
 *   import { createEnvLogger } from "envlog/logging";
 *
 * @packageDocumentation
 */

export {
	analyzeDirectives,
	DEFAULT_LEVEL,
	formatRuleset,
	parseDirectives,
	type Rule,
	type Ruleset,
	type SkippedDirective,
} from "./directives/index.ts";
export { DirectiveError } from "./errors/index.ts";
export { type Level, LEVELS, levelRank, parseLevel } from "./levels/index.ts";
export { createEnvLogger, type EnvLoggerOptions } from "./logging/index.ts";
export {
	configure,
	effectiveLevel,
	getDefaultResolver,
	isEnabled,
	LevelResolver,
	type LoggerName,
} from "./resolver/index.ts";
