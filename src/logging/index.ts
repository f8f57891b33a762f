/**
 * envlog/logging
 *
 * LogTape integration: a filter that consults a LevelResolver, and a
 * factory that configures LogTape from a directive environment variable.
 *
 * @example
 * ```typescript
 * import { createEnvLogger } from "envlog/logging";
 *
 * const { initLogger, getLogger } = createEnvLogger({ envVar: "MYAPP_LOG" });
 *
 * // Initialize at entry point (server startup, CLI main)
 * await initLogger();
 *
 * getLogger("myapp.database").debug("Connected");
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_ENV_VAR,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LIBRARY_CATEGORY,
} from "./config.ts";
export {
	createEnvLogger,
	type DirectiveSource,
	type EnvLogger,
	type EnvLoggerOptions,
	readDirectives,
} from "./factory.ts";
export { createDirectiveFilter } from "./filter.ts";
