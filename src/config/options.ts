/**
 * Merge options: which files to read and who speaks in each.
 *
 * @module config/options
 */

import { z } from 'zod'
import {
	ConfigurationError,
	SPEAKER_COUNT_MISMATCH,
} from '../errors/input-errors.js'

/**
 * Shape of the options the CLI collects. Files and speakers are parallel
 * lists; their lengths are checked by {@link resolveInputs}.
 */
export const MergeOptionsSchema = z.object({
	files: z
		.array(z.string().min(1, 'input file paths must not be empty'))
		.min(1, 'at least one input file is required'),
	speakers: z
		.array(z.string().min(1, 'speaker names must not be empty'))
		.min(1, 'at least one speaker is required'),
})

export type MergeOptions = z.infer<typeof MergeOptionsSchema>

/**
 * A file paired with the speaker whose words it holds.
 */
export interface InputPair {
	readonly speaker: string
	readonly path: string
}

/**
 * Validate the options and pair each file with its speaker, in order.
 *
 * @throws ConfigurationError for missing files or speakers, or when the two
 *   lists differ in length
 *
 * @example
 * ```ts
 * resolveInputs({ files: ["a.vtt", "b.vtt"], speakers: ["Alice", "Bob"] });
 * // → [{ speaker: "Alice", path: "a.vtt" }, { speaker: "Bob", path: "b.vtt" }]
 * ```
 */
export function resolveInputs(options: unknown): InputPair[] {
	const parsed = MergeOptionsSchema.safeParse(options)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new ConfigurationError(issue?.message ?? 'invalid merge options', {
			path: issue?.path.join('.'),
		})
	}

	const { files, speakers } = parsed.data
	if (files.length !== speakers.length) {
		throw new ConfigurationError(SPEAKER_COUNT_MISMATCH, {
			files: files.length,
			speakers: speakers.length,
		})
	}

	return files.map((path, index) => ({
		speaker: speakers[index] ?? '',
		path,
	}))
}
