/**
 * envlog/resolver
 *
 * Longest-prefix level resolution over a parsed ruleset, plus a
 * process-wide handle for hosts that want one shared configuration.
 *
 * @packageDocumentation
 */

export {
	configure,
	effectiveLevel,
	getDefaultResolver,
	isEnabled,
	resetDefaultResolver,
} from "./global.ts";
export { LevelResolver, type LoggerName } from "./level-resolver.ts";
