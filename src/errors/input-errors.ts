/**
 * Errors raised around the merge run: bad invocation and failed inputs.
 *
 * @module errors/input-errors
 */

import { StructuredError } from './structured-error.js'

/** Message used when the speaker and file lists differ in length. */
export const SPEAKER_COUNT_MISMATCH =
	'differing number of speakers and files. every file needs one speaker defined'

/**
 * Invalid invocation: missing files or speakers, or lists of different lengths.
 * Raised before any input is read.
 */
export class ConfigurationError extends StructuredError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, 'CONFIGURATION', 'INVALID_OPTIONS', false, context)
		this.name = 'ConfigurationError'
	}
}

/**
 * Failure while loading or parsing one input file.
 *
 * The message names the source so the user can tell which file broke the run.
 *
 * @example
 * ```typescript
 * new InputFileError("alice.vtt", new VttParseError("-->", "=>")).message
 * // "while parsing alice.vtt: parsing error: expected -->, got '=>'"
 * ```
 */
export class InputFileError extends StructuredError {
	/** Path (or other label) of the input that failed. */
	public readonly source: string

	constructor(source: string, cause: Error) {
		super(
			`while parsing ${source}: ${cause.message}`,
			cause instanceof StructuredError ? cause.category : 'UNKNOWN',
			'INPUT_FAILED',
			false,
			{ source },
			cause,
		)
		this.name = 'InputFileError'
		this.source = source
	}
}
