/**
 * Env Logger Factory.
 *
 * Wires a directive string from the environment into LogTape:
 * - Root logger routed through a directive filter
 * - Console output by default, or caller-supplied sinks
 * - Optional JSONL file output with rotation
 * - Skipped directives reported under the `envlog.directives` category
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getRotatingFileSink } from "@logtape/file";
import {
	configure,
	getConsoleSink,
	getLogger,
	jsonLinesFormatter,
	type Logger,
	type Sink,
} from "@logtape/logtape";
import { reportSkippedDirectives } from "../directives/diagnostics.ts";
import {
	type DirectiveAnalysis,
	EMPTY_RULESET,
	type Ruleset,
} from "../directives/types.ts";
import { StructuredError } from "../errors/structured-error.ts";
import { LevelResolver, type LoggerName } from "../resolver/level-resolver.ts";
import {
	DEFAULT_ENV_VAR,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
} from "./config.ts";
import { createDirectiveFilter } from "./filter.ts";

const FILTER_ID = "envlog";
const CONSOLE_SINK_ID = "console";
const FILE_SINK_ID = "file";

/** Where to find the directive string. */
export interface DirectiveSource {
	/** Environment variable to read. Defaults to `NODE_LOG`. */
	envVar?: string;

	/** Environment to read from. Defaults to `process.env`. */
	env?: Record<string, string | undefined>;
}

/**
 * Options for creating an env logger.
 */
export interface EnvLoggerOptions extends DirectiveSource {
	/**
	 * Directive string to use instead of reading the environment.
	 */
	directives?: string;

	/**
	 * Resolver to configure. Defaults to a fresh one; pass
	 * `getDefaultResolver()` to share the process-wide handle. When neither
	 * `directives` nor the environment variable is set, `initLogger` leaves
	 * its current rules alone.
	 */
	resolver?: LevelResolver;

	/**
	 * Sinks attached to the root logger. Defaults to a single console sink.
	 */
	sinks?: Record<string, Sink>;

	/**
	 * Also write JSONL to this file, rotating at `maxSize`.
	 */
	logFile?: string;

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number;

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number;

	/**
	 * Replace an existing LogTape configuration instead of deferring to it.
	 */
	reset?: boolean;
}

/**
 * Result of creating an env logger.
 */
export interface EnvLogger {
	/** Resolver the LogTape filter consults */
	resolver: LevelResolver;

	/** Directive string read at creation (empty when unset) */
	directives: string;

	/**
	 * Apply the directives and configure LogTape. Must be called before
	 * logging. Safe to call multiple times - only initializes once.
	 *
	 * @throws StructuredError (`LOGGING_SETUP_FAILED`) when LogTape rejects
	 *   the configuration for any reason other than being configured already
	 */
	initLogger: () => Promise<void>;

	/**
	 * Swap in a new directive string without touching LogTape's
	 * configuration. Skipped directives are logged. Takes precedence over
	 * the creation-time directives, also when called before `initLogger`.
	 */
	reconfigure: (raw: string) => Ruleset;

	/**
	 * Get a LogTape logger by dotted name.
	 *
	 * @example getLogger("myapp.database") → logger for ["myapp", "database"]
	 */
	getLogger: (name: LoggerName) => Logger;
}

/**
 * Read the directive string from the environment.
 *
 * @returns The variable's value, or `""` when it is unset
 */
export function readDirectives(source: DirectiveSource = {}): string {
	return lookupDirectives(source) ?? "";
}

function lookupDirectives(source: DirectiveSource): string | undefined {
	const { envVar = DEFAULT_ENV_VAR, env = process.env } = source;
	return env[envVar];
}

/**
 * Create a LogTape setup driven by a directive environment variable.
 *
 * @example
 * ```typescript
 * import { createEnvLogger } from "envlog/logging";
 *
 * // NODE_LOG=warn,myapp=info,myapp.database=trace
 * const { initLogger, getLogger } = createEnvLogger();
 * await initLogger();
 *
 * const db = getLogger("myapp.database");
 * db.trace("Pool created"); // emitted
 * getLogger("somelib").info("Ready"); // suppressed, default is warn
 * ```
 */
export function createEnvLogger(options: EnvLoggerOptions = {}): EnvLogger {
	const {
		resolver = new LevelResolver(EMPTY_RULESET),
		logFile,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		reset = false,
	} = options;

	const configured = options.directives ?? lookupDirectives(options);

	// Applied by initLogger unless reconfigure() has run since
	let pending: string | undefined = configured;
	let isInitialized = false;

	/**
	 * Initialize the logging system.
	 * Safe to call multiple times - only initializes once.
	 * Also safe to call when LogTape is already configured by the host.
	 */
	async function initLogger(): Promise<void> {
		if (isInitialized) return;

		let applied: DirectiveAnalysis | undefined;
		if (pending !== undefined) {
			applied = resolver.reconfigure(pending);
			pending = undefined;
		}

		const sinks: Record<string, Sink> = options.sinks
			? { ...options.sinks }
			: { [CONSOLE_SINK_ID]: getConsoleSink() };
		const rootSinks = Object.keys(sinks);

		if (logFile) {
			const logDir = dirname(logFile);
			if (!existsSync(logDir)) {
				mkdirSync(logDir, { recursive: true });
			}
			sinks[FILE_SINK_ID] = getRotatingFileSink(logFile, {
				formatter: jsonLinesFormatter,
				maxSize,
				maxFiles,
			});
			rootSinks.push(FILE_SINK_ID);
		}

		try {
			await configure({
				sinks,
				filters: {
					[FILTER_ID]: createDirectiveFilter(resolver),
				},
				loggers: [
					{
						category: [],
						sinks: rootSinks,
						filters: [FILTER_ID],
						lowestLevel: "trace",
					},
					// LogTape's own diagnostics, warnings and above
					{
						category: ["logtape", "meta"],
						sinks: rootSinks,
						parentSinks: "override",
						lowestLevel: "warning",
					},
				],
				reset,
			});
		} catch (error: unknown) {
			// The host configured LogTape first; its configuration stays in
			// charge and the resolver is still usable directly
			if (
				!(error instanceof Error) ||
				!error.message.includes("Already configured")
			) {
				throw new StructuredError(
					"Failed to configure LogTape",
					"CONFIGURATION",
					"LOGGING_SETUP_FAILED",
					false,
					{ sinks: rootSinks, logFile },
					error instanceof Error ? error : new Error(String(error)),
				);
			}
		}

		isInitialized = true;
		if (applied) {
			reportSkippedDirectives(applied.skipped);
		}
	}

	function reconfigure(raw: string): Ruleset {
		pending = undefined;
		const { ruleset, skipped } = resolver.reconfigure(raw);
		reportSkippedDirectives(skipped);
		return ruleset;
	}

	function getEnvLogger(name: LoggerName): Logger {
		return getLogger(typeof name === "string" ? name.split(".") : [...name]);
	}

	return {
		resolver,
		directives: configured ?? "",
		initLogger,
		reconfigure,
		getLogger: getEnvLogger,
	};
}
