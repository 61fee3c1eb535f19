/**
 * WebVTT track: parse, sort, tag, merge, and serialize.
 *
 * Supports a deliberately small subset of WebVTT:
 * ```
 * WEBVTT
 *
 * 00:00:00.000 --> 00:00:03.500
 * First line of text
 *
 * 00:00:03.500 --> 00:00:05.000
 * Second line of text
 * ```
 *
 * No cue identifiers, NOTE/STYLE/REGION blocks, or cue settings.
 *
 * @module vtt/track
 */

import { Cue } from './cue.js'
import { VttParseError } from './errors.js'
import { Timerange } from './timerange.js'

/** Required document prefix. */
export const HEADER = 'WEBVTT'

const LINE_BREAK = /\r?\n/

/**
 * Outcome of {@link Track.safeParse}.
 */
export type TrackParseResult =
	| { readonly success: true; readonly track: Track }
	| { readonly success: false; readonly error: VttParseError }

/**
 * An ordered list of cues. Duplicates and overlapping ranges are kept as-is.
 */
export class Track {
	private readonly entries: Cue[]

	constructor(cues: Iterable<Cue> = []) {
		this.entries = [...cues]
	}

	/**
	 * Parse a WebVTT document.
	 *
	 * The header check is a plain prefix match: whatever follows `WEBVTT` on
	 * the first line is scanned like any other line. After that, a blank line
	 * ends the current block, the first line of a block is its timing line, and
	 * every following non-blank line becomes a separate cue with that timing.
	 *
	 * @param document - Raw file content
	 * @throws VttParseError on a missing header or malformed timing line
	 *
	 * @example
	 * ```ts
	 * const track = Track.parse("WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nhello\nworld\n");
	 * track.length; // 2, both cues timed 1s-2s
	 * ```
	 */
	static parse(document: string): Track {
		if (!document.startsWith(HEADER)) {
			throw new VttParseError(HEADER, document.split(LINE_BREAK)[0] ?? '')
		}

		const cues: Cue[] = []
		let pending: Timerange | undefined

		for (const line of document.slice(HEADER.length).split(LINE_BREAK)) {
			if (line.trim() === '') {
				pending = undefined
				continue
			}
			if (pending === undefined) {
				pending = Timerange.parse(line)
				continue
			}
			cues.push(new Cue(pending, line))
		}

		return new Track(cues)
	}

	/**
	 * Parse without throwing on malformed input.
	 */
	static safeParse(document: string): TrackParseResult {
		try {
			return { success: true, track: Track.parse(document) }
		} catch (error: unknown) {
			if (error instanceof VttParseError) {
				return { success: false, error }
			}
			throw error
		}
	}

	get cues(): readonly Cue[] {
		return this.entries
	}

	get length(): number {
		return this.entries.length
	}

	/**
	 * Stable sort by start time. End time, speaker, and text never break ties.
	 */
	sort(): void {
		this.entries.sort((a, b) => a.range.start.compare(b.range.start))
	}

	/**
	 * Overwrite the speaker of every cue.
	 */
	setSpeakerForAllLines(speaker: string): void {
		for (const cue of this.entries) {
			cue.speaker = speaker
		}
	}

	/**
	 * Move all cues of `other` to the end of this track, then re-sort.
	 *
	 * `other` is left empty. Cues sharing a start time stay in append order, so
	 * folding tracks one after another keeps earlier tracks first on ties.
	 */
	mergeWith(other: Track): void {
		if (other === this) return
		for (const cue of other.entries.splice(0)) {
			this.entries.push(cue)
		}
		this.sort()
	}

	/**
	 * Deep copy; cues are cloned so speaker changes don't leak back.
	 */
	clone(): Track {
		return new Track(this.entries.map((cue) => cue.clone()))
	}

	equals(other: Track): boolean {
		return (
			this.entries.length === other.entries.length &&
			this.entries.every((cue, index) => {
				const counterpart = other.entries[index]
				return counterpart !== undefined && cue.equals(counterpart)
			})
		)
	}

	/**
	 * Serialize as a WebVTT document.
	 */
	format(): string {
		return `${HEADER}\n${this.entries.map((cue) => cue.format()).join('')}`
	}

	toString(): string {
		return this.format()
	}
}
