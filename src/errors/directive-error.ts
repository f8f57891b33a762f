import type { SkippedDirective } from '../directives/types.ts'
import { StructuredError } from './structured-error.ts'

/**
 * Raised by strict validation when a directive string contains directives
 * that the permissive parser would have dropped.
 *
 * The skipped directives are available both as `skipped` and under
 * `context.skipped`, so they survive `toJSON()`.
 */
export class DirectiveError extends StructuredError {
	public readonly skipped: readonly SkippedDirective[]

	constructor(raw: string, skipped: readonly SkippedDirective[]) {
		const listed = skipped.map((s) => `"${s.directive}" (${s.reason})`).join(', ')
		super(
			`Invalid log directives in "${raw}": ${listed}`,
			'CONFIGURATION',
			'INVALID_DIRECTIVES',
			false,
			{ raw, skipped },
		)
		this.name = 'DirectiveError'
		this.skipped = skipped
	}
}

export function isDirectiveError(error: unknown): error is DirectiveError {
	return error instanceof DirectiveError
}
