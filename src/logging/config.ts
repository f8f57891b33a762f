/**
 * Logging configuration defaults.
 *
 * These values can be overridden when creating an env logger.
 */

/** Environment variable read for the directive string */
export const DEFAULT_ENV_VAR = "NODE_LOG"

/** LogTape category everything envlog itself logs under */
export const LIBRARY_CATEGORY: readonly string[] = ["envlog"]

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5
