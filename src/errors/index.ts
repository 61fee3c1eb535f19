/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	ConfigurationError,
	InputFileError,
	SPEAKER_COUNT_MISMATCH,
} from './input-errors.js'
export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	type StructuredErrorJson,
} from './structured-error.js'
