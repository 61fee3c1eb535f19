/**
 * Cue timing lines (`<start> --> <end>`).
 *
 * @module vtt/timerange
 */

import { VttParseError } from './errors.js'
import { Timestamp } from './timestamp.js'

/** Token separating start and end on a timing line. */
export const ARROW = '-->'

/**
 * Start and end of a cue. `start <= end` is not enforced.
 */
export class Timerange {
	constructor(
		readonly start: Timestamp,
		readonly end: Timestamp,
	) {}

	/**
	 * Parse a timing line. Tokens are split on single spaces, so the arrow must
	 * be surrounded by exactly one space on each side. Anything after the end
	 * timestamp (cue settings) is ignored.
	 *
	 * @throws VttParseError for a missing or malformed start, arrow, or end
	 *
	 * @example
	 * ```ts
	 * Timerange.parse("00:00:01.000 --> 00:00:02.500").format();
	 * // "00:00:01.000 --> 00:00:02.500"
	 * ```
	 */
	static parse(line: string): Timerange {
		const [start, separator = '', end] = line.split(' ')
		if (start === undefined) {
			throw new VttParseError('a starting time', '')
		}
		const startTime = Timestamp.parse(start)

		if (separator !== ARROW) {
			throw new VttParseError(ARROW, separator)
		}

		if (end === undefined) {
			throw new VttParseError('a end time', '')
		}
		return new Timerange(startTime, Timestamp.parse(end))
	}

	equals(other: Timerange): boolean {
		return this.start.equals(other.start) && this.end.equals(other.end)
	}

	format(): string {
		return `${this.start.format()} ${ARROW} ${this.end.format()}`
	}

	toString(): string {
		return this.format()
	}
}
