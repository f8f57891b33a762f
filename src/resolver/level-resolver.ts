/**
 * Level resolution for hierarchical logger names.
 *
 * A logger name is matched against rule targets one dot-segment at a time:
 * `myapp` matches `myapp.database` but `my` does not. The rule with the
 * most matching segments wins; among rules with the same target, the one
 * declared last wins. Names no rule matches get the ruleset default.
 *
 * @module resolver/level-resolver
 */

import { analyzeDirectives } from "../directives/parser.ts";
import type { DirectiveAnalysis, Ruleset } from "../directives/types.ts";
import { type Level, levelRank } from "../levels/index.ts";

/** A logger name, dotted (`"myapp.database"`) or already split (a LogTape category). */
export type LoggerName = string | readonly string[];

interface TrieNode {
	/** Level of the last rule whose target ends exactly here */
	level?: Level;
	children: Map<string, TrieNode>;
}

/**
 * Immutable view of one ruleset, indexed by target segments.
 *
 * Built once per configuration; the resolver swaps whole snapshots.
 */
class RulesetSnapshot {
	readonly ruleset: Ruleset;
	private readonly root: TrieNode = { children: new Map() };

	constructor(ruleset: Ruleset) {
		this.ruleset = ruleset;
		for (const rule of ruleset.rules) {
			let node = this.root;
			for (const segment of rule.target) {
				let child = node.children.get(segment);
				if (!child) {
					child = { children: new Map() };
					node.children.set(segment, child);
				}
				node = child;
			}
			// Later declarations overwrite earlier ones for the same target
			node.level = rule.level;
		}
	}

	resolve(segments: readonly string[]): Level {
		let level = this.ruleset.defaultLevel;
		let node = this.root;
		for (const segment of segments) {
			const child = node.children.get(segment);
			if (!child) break;
			node = child;
			if (node.level !== undefined) level = node.level;
		}
		return level;
	}
}

function toSegments(name: LoggerName): readonly string[] {
	return typeof name === "string" ? name.split(".") : name;
}

/**
 * Answers "which level is enabled for this logger?" for one ruleset at a
 * time.
 *
 * Reads go through a single snapshot reference; `reconfigure` builds a new
 * snapshot and replaces that reference in one assignment, so a read sees
 * either the old ruleset or the new one, never a mix.
 *
 * @example
 * ```typescript
 * const resolver = LevelResolver.fromDirectives("warn,myapp=info,myapp.database=trace");
 *
 * resolver.effectiveLevel("myapp.api"); // "info"
 * resolver.isEnabled("myapp.database", "trace"); // true
 * resolver.isEnabled("somelib", "info"); // false
 * ```
 */
export class LevelResolver {
	private snapshot: RulesetSnapshot;

	constructor(ruleset: Ruleset) {
		this.snapshot = new RulesetSnapshot(ruleset);
	}

	/** Build a resolver straight from a directive string. */
	static fromDirectives(raw: string | null | undefined): LevelResolver {
		return new LevelResolver(analyzeDirectives(raw).ruleset);
	}

	/** The ruleset currently in effect. */
	get ruleset(): Ruleset {
		return this.snapshot.ruleset;
	}

	/**
	 * Effective threshold for a logger name.
	 *
	 * @param loggerName - Dotted name, or its segments
	 */
	effectiveLevel(loggerName: LoggerName): Level {
		return this.snapshot.resolve(toSegments(loggerName));
	}

	/**
	 * Whether a message at `level` passes the threshold for `loggerName`.
	 *
	 * `off` is a threshold, not a message level: it is never enabled.
	 */
	isEnabled(loggerName: LoggerName, level: Level): boolean {
		if (level === "off") return false;
		return levelRank(level) >= levelRank(this.effectiveLevel(loggerName));
	}

	/**
	 * Parse a new directive string and swap it in.
	 *
	 * Never throws; skipped directives are returned for the caller to report.
	 */
	reconfigure(raw: string | null | undefined): DirectiveAnalysis {
		const analysis = analyzeDirectives(raw);
		this.replaceRuleset(analysis.ruleset);
		return analysis;
	}

	/** Swap in a prebuilt ruleset. */
	replaceRuleset(ruleset: Ruleset): void {
		this.snapshot = new RulesetSnapshot(ruleset);
	}
}
