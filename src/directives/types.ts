/**
 * Parsed directive types.
 *
 * A directive string like `warn,myapp=info,myapp.database=trace` becomes a
 * {@link Ruleset}: one default level plus an ordered list of {@link Rule}s.
 * Both are frozen once built; reconfiguration produces a new ruleset.
 */

import type { Level } from "../levels/index.ts";

/** Level used when the directive string carries no bare level. */
export const DEFAULT_LEVEL: Level = "warn";

/** A single `target=level` directive. */
export interface Rule {
	/**
	 * Dot-separated target, already split. Never empty, and no segment is an
	 * empty string.
	 *
	 * @example ["myapp", "database"]
	 */
	readonly target: readonly string[];
	readonly level: Level;
}

export interface Ruleset {
	/** Rules in order of appearance in the directive string. */
	readonly rules: readonly Rule[];
	/** Level for names no rule matches. */
	readonly defaultLevel: Level;
}

/** Why a directive was dropped during parsing. */
export type SkipReason = "unknown-level" | "empty-target" | "empty-segment";

export interface SkippedDirective {
	/** The trimmed directive text as it appeared in the string */
	directive: string;
	/** Zero-based position among the non-empty directives */
	index: number;
	reason: SkipReason;
}

export interface DirectiveAnalysis {
	ruleset: Ruleset;
	skipped: SkippedDirective[];
}

export const EMPTY_RULESET: Ruleset = Object.freeze({
	rules: Object.freeze([]),
	defaultLevel: DEFAULT_LEVEL,
});
