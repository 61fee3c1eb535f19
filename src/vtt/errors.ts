/**
 * Parse failure for WebVTT documents, timing lines, and timestamps.
 *
 * @module vtt/errors
 */

import { StructuredError } from '../errors/structured-error.js'

/**
 * Raised when a document does not match the supported WebVTT subset.
 *
 * `expected` describes what the parser was looking for; `found` is the literal
 * text it saw instead (empty when there was nothing).
 */
export class VttParseError extends StructuredError {
	public readonly expected: string
	public readonly found: string

	constructor(expected: string, found: string) {
		super(
			`parsing error: expected ${expected}, got '${found}'`,
			'VALIDATION',
			'VTT_PARSE_ERROR',
			false,
			{ expected, found },
		)
		this.name = 'VttParseError'
		this.expected = expected
		this.found = found
	}
}
