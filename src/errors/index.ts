/**
 * Error types raised by envlog.
 *
 * @module errors
 */

export { DirectiveError, isDirectiveError } from "./directive-error.ts";
export {
	type ErrorCategory,
	isStructuredError,
	StructuredError,
} from "./structured-error.ts";
