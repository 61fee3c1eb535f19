/**
 * WebVTT (Web Video Text Tracks) model for speaker-tagged transcripts.
 *
 * Parses a small subset of WebVTT into a {@link Track} of {@link Cue}s that can
 * be tagged with a speaker, merged with other tracks, and written back out.
 *
 * @example
 * ```ts
 * import { Track } from "vtt-merge/vtt";
 *
 * const alice = Track.parse(aliceContent);
 * alice.setSpeakerForAllLines("Alice");
 *
 * const bob = Track.parse(bobContent);
 * bob.setSpeakerForAllLines("Bob");
 *
 * alice.mergeWith(bob);
 * console.log(alice.format()); // cues from both, ordered by start time
 * ```
 *
 * @module vtt
 */

export { Cue } from './cue.js'
export { VttParseError } from './errors.js'
export { isVttFile } from './files.js'
export { ARROW, Timerange } from './timerange.js'
export { Timestamp } from './timestamp.js'
export { HEADER, Track, type TrackParseResult } from './track.js'
