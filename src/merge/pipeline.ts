/**
 * Merge speaker-tagged transcripts into one track.
 *
 * Each input is parsed, sorted, tagged with its speaker, and folded into an
 * accumulator track. The first failing input aborts the whole merge.
 *
 * @module merge/pipeline
 */

import { InputFileError } from '../errors/input-errors.js'
import { pipelineLogger } from '../logger.js'
import { Track } from '../vtt/track.js'

/**
 * One transcript to merge: its document text and the speaker it belongs to.
 */
export interface SpeakerInput {
	/** Speaker name written into every cue as `<v speaker>`. */
	readonly speaker: string
	/** Where the text came from (file path); used in errors and diagnostics. */
	readonly source: string
	/** Raw WebVTT document. */
	readonly text: string
}

/**
 * Result of folding one input into the accumulator.
 */
export interface FoldOutcome {
	/** Number of cues the input contributed. */
	readonly cues: number
	/** Whether the input's cues were out of start-time order. */
	readonly unsorted: boolean
}

/**
 * Result of {@link mergeSpeakerTracks}.
 */
export interface MergeResult {
	readonly track: Track
	/** Sources whose cues were not already ordered by start time. */
	readonly unsorted: readonly string[]
}

/**
 * Parse one input, tag it with its speaker, and merge it into `accumulator`.
 *
 * @param accumulator - Track collecting all inputs so far; mutated in place
 * @param input - Document and speaker to add
 * @param cid - Correlation ID attached to log records
 * @throws InputFileError wrapping the VttParseError if the document is malformed
 */
export function foldSpeakerTrack(
	accumulator: Track,
	input: SpeakerInput,
	cid?: string,
): FoldOutcome {
	const parsed = Track.safeParse(input.text)
	if (!parsed.success) {
		throw new InputFileError(input.source, parsed.error)
	}

	const { track } = parsed
	const original = track.clone()
	track.sort()
	const unsorted = !track.equals(original)
	if (unsorted) {
		pipelineLogger.warning('Input cues were not ordered by start time', {
			cid,
			source: input.source,
		})
	}

	const cues = track.length
	track.setSpeakerForAllLines(input.speaker)
	accumulator.mergeWith(track)

	pipelineLogger.debug('Merged input', {
		cid,
		source: input.source,
		speaker: input.speaker,
		cues,
		total: accumulator.length,
	})

	return { cues, unsorted }
}

/**
 * Merge already-loaded inputs in order.
 *
 * Cues sharing a start time keep input order: the first input's cues come
 * first.
 *
 * @example
 * ```ts
 * const { track } = mergeSpeakerTracks([
 *   { speaker: "Alice", source: "alice.vtt", text: aliceVtt },
 *   { speaker: "Bob", source: "bob.vtt", text: bobVtt },
 * ]);
 * process.stdout.write(track.format());
 * ```
 */
export function mergeSpeakerTracks(
	inputs: readonly SpeakerInput[],
	cid?: string,
): MergeResult {
	const track = new Track()
	const unsorted: string[] = []

	for (const input of inputs) {
		if (foldSpeakerTrack(track, input, cid).unsorted) {
			unsorted.push(input.source)
		}
	}

	pipelineLogger.info('Merge complete', {
		cid,
		inputs: inputs.length,
		cues: track.length,
	})

	return { track, unsorted }
}
