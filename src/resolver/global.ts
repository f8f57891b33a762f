/**
 * Process-wide resolver handle.
 *
 * Hosts that want a single shared configuration call {@link configure} once
 * at startup and consult {@link isEnabled} from their logging calls. Code
 * that needs isolation (tests, embedded instances) constructs its own
 * {@link LevelResolver} and never touches this handle.
 */

import { reportSkippedDirectives } from "../directives/diagnostics.ts";
import { EMPTY_RULESET, type Ruleset } from "../directives/types.ts";
import type { Level } from "../levels/index.ts";
import { LevelResolver, type LoggerName } from "./level-resolver.ts";

let defaultResolver: LevelResolver | undefined;

/**
 * Get or create the process-wide resolver.
 *
 * Until {@link configure} runs it resolves every name to the fallback
 * default (`warn`).
 */
export function getDefaultResolver(): LevelResolver {
	if (!defaultResolver) {
		defaultResolver = new LevelResolver(EMPTY_RULESET);
	}
	return defaultResolver;
}

/**
 * Apply a directive string to the process-wide resolver.
 *
 * Malformed directives are dropped and logged under `envlog.directives`;
 * this never throws.
 *
 * @returns The ruleset now in effect
 *
 * @example
 * ```typescript
 * configure(process.env.NODE_LOG ?? "");
 * if (isEnabled("myapp.database", "debug")) {
 *   // ...
 * }
 * ```
 */
export function configure(raw: string | null | undefined): Ruleset {
	const { ruleset, skipped } = getDefaultResolver().reconfigure(raw);
	reportSkippedDirectives(skipped);
	return ruleset;
}

export function effectiveLevel(loggerName: LoggerName): Level {
	return getDefaultResolver().effectiveLevel(loggerName);
}

export function isEnabled(loggerName: LoggerName, level: Level): boolean {
	return getDefaultResolver().isEnabled(loggerName, level);
}

/**
 * Reset the process-wide resolver (useful for testing).
 */
export function resetDefaultResolver(): void {
	defaultResolver = undefined;
}
