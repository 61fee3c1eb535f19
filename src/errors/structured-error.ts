/**
 * Structured error base class.
 *
 * Every error the merge tool raises carries:
 * - A category and a machine-readable code
 * - A recoverability hint
 * - Context metadata for the log record
 * - The originating error as `cause`
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the tool.
 */
export type ErrorCategory =
	| 'VALIDATION' // Malformed input document
	| 'NOT_FOUND' // Input file missing
	| 'CONFIGURATION' // Invalid invocation
	| 'UNKNOWN'

/**
 * Plain-object form of a {@link StructuredError}, as written to the log.
 */
export interface StructuredErrorJson {
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
}

/**
 * Structured error with categorization, recoverability, and context.
 *
 * Subclass it for domain errors:
 *
 * @example
 * ```typescript
 * class VttParseError extends StructuredError {
 *   constructor(expected: string, found: string) {
 *     super(`parsing error: expected ${expected}, got '${found}'`, "VALIDATION", "VTT_PARSE_ERROR", false, { expected, found });
 *     this.name = "VttParseError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/** High-level error category. */
	public readonly category: ErrorCategory

	/** Machine-readable error code (e.g. "VTT_PARSE_ERROR"). */
	public readonly code: string

	/** Whether retrying the operation could succeed. */
	public readonly recoverable: boolean

	/** Arbitrary context metadata for debugging. */
	public readonly context: Record<string, unknown>

	/** Original error that caused this one. */
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
	 * Serialize the error for logging.
	 */
	toJSON(): StructuredErrorJson {
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

/**
 * Type guard for {@link StructuredError}.
 */
export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * Check whether an error is a {@link StructuredError} marked recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}
