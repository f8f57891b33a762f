import type { Filter, LogRecord } from "@logtape/logtape";
import { fromLogTapeLevel } from "../levels/index.ts";
import type { LevelResolver } from "../resolver/level-resolver.ts";

/**
 * Create a LogTape filter backed by a resolver.
 *
 * A record passes when its level is enabled for its category. The filter
 * reads the resolver on every record, so `resolver.reconfigure()` takes
 * effect immediately without reconfiguring LogTape.
 *
 * @example
 * ```typescript
 * const resolver = LevelResolver.fromDirectives("warn,myapp=debug");
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   filters: { envlog: createDirectiveFilter(resolver) },
 *   loggers: [{ category: [], sinks: ["console"], filters: ["envlog"], lowestLevel: "trace" }],
 * });
 * ```
 */
export function createDirectiveFilter(resolver: LevelResolver): Filter {
	return (record: LogRecord): boolean =>
		resolver.isEnabled(record.category, fromLogTapeLevel(record.level));
}
