/**
 * Merge pipeline: parse → tag → merge for speaker transcripts.
 *
 * @module merge
 */

export {
	type FoldOutcome,
	foldSpeakerTrack,
	type MergeResult,
	mergeSpeakerTracks,
	type SpeakerInput,
} from './pipeline.js'
