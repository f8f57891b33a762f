/**
 * Structured errors with a machine-readable category and code.
 *
 * Directive parsing never throws; these errors only surface from the strict
 * validation path and from logging setup, where a caller asked to be told.
 *
 * @module errors/structured-error
 */

/**
 * Error categories for classification and handling.
 *
 * Only configuration failures surface from envlog: a rejected directive
 * string, or LogTape refusing the logging setup.
 */
export type ErrorCategory = 'CONFIGURATION'

/**
 * Structured error with categorization, recoverability, and context.
 *
 * Use this as a base class for domain-specific error types.
 *
 * @example
 * ```typescript
 * throw new StructuredError(
 *   "Log file directory is not writable",
 *   "CONFIGURATION",
 *   "LOG_DIR_UNWRITABLE",
 *   false,
 *   { logDir: "/var/log/app" },
 * );
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category for classification.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "INVALID_DIRECTIVES").
	 */
	public readonly code: string

	/**
	 * Whether retrying the same operation could succeed.
	 */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize error to JSON for logging.
	 *
	 * LogTape renders structured properties as-is, so this is the shape that
	 * lands in JSONL sinks when an error is passed as a property.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		recoverable: boolean
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
			stack?: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}
