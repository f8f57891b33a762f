/**
 * Log level vocabulary.
 *
 * A closed, totally ordered set of levels. Every level name that reaches the
 * resolver has been validated here once, at parse time.
 *
 * Ranks (used for all threshold comparisons):
 * - trace: 0 (most verbose)
 * - debug: 1
 * - info: 2
 * - warn: 3
 * - error: 4
 * - off: 5 (suppresses everything)
 *
 * @module levels
 */

import type { LogLevel as LogTapeLevel } from "@logtape/logtape";

/** Levels in rank order, most verbose first. */
export const LEVELS = ["trace", "debug", "info", "warn", "error", "off"] as const;

export type Level = (typeof LEVELS)[number];

const LEVEL_RANK: Record<Level, number> = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	off: 5,
};

/** Accepted spellings, lowercase. `warning` is an alias of `warn`. */
const LEVEL_NAMES: ReadonlyMap<string, Level> = new Map<string, Level>([
	["trace", "trace"],
	["debug", "debug"],
	["info", "info"],
	["warn", "warn"],
	["warning", "warn"],
	["error", "error"],
	["off", "off"],
]);

/**
 * Rank of a level for threshold comparisons.
 *
 * @example
 * ```ts
 * levelRank("trace"); // 0
 * levelRank("off"); // 5
 * ```
 */
export function levelRank(level: Level): number {
	return LEVEL_RANK[level];
}

/** Negative when `a` is more verbose than `b`, zero when equal. */
export function compareLevels(a: Level, b: Level): number {
	return LEVEL_RANK[a] - LEVEL_RANK[b];
}

export function isLevel(value: unknown): value is Level {
	return typeof value === "string" && Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Parse a level name, case-insensitively.
 *
 * Surrounding whitespace is ignored. Unknown names yield `undefined`
 * rather than throwing, so callers can drop the directive and move on.
 *
 * @example
 * ```ts
 * parseLevel("INFO"); // "info"
 * parseLevel(" Warning "); // "warn"
 * parseLevel("verbose"); // undefined
 * ```
 */
export function parseLevel(name: string): Level | undefined {
	return LEVEL_NAMES.get(name.trim().toLowerCase());
}

/**
 * Map a LogTape record level onto the closed vocabulary.
 *
 * LogTape's `fatal` has no counterpart and maps to `error`, the most severe
 * level that can still be emitted.
 */
export function fromLogTapeLevel(level: LogTapeLevel): Level {
	switch (level) {
		case "trace":
			return "trace";
		case "debug":
			return "debug";
		case "info":
			return "info";
		case "warning":
			return "warn";
		case "error":
		case "fatal":
			return "error";
	}
}

