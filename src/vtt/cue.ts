/**
 * A single timed line of subtitle text.
 *
 * @module vtt/cue
 */

import type { Timerange } from './timerange.js'

export class Cue {
	/** Voice label rendered as `<v speaker>`; unset until assigned. */
	speaker: string | undefined

	constructor(
		readonly range: Timerange,
		readonly text: string,
		speaker?: string,
	) {
		this.speaker = speaker
	}

	/**
	 * Copy with its own speaker slot. The range is immutable and shared.
	 */
	clone(): Cue {
		return new Cue(this.range, this.text, this.speaker)
	}

	equals(other: Cue): boolean {
		return (
			this.range.equals(other.range) &&
			this.speaker === other.speaker &&
			this.text === other.text
		)
	}

	/**
	 * Render the cue block. The leading newline is the blank line separating it
	 * from whatever precedes it in the document.
	 */
	format(): string {
		const voice = this.speaker === undefined ? '' : `<v ${this.speaker}>`
		return `\n${this.range.format()}\n${voice}${this.text}\n`
	}

	toString(): string {
		return this.format()
	}
}
