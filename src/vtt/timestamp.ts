/**
 * Cue timestamps (`HH:MM:SS.mmm` and friends).
 *
 * @module vtt/timestamp
 */

import { VttParseError } from './errors.js'

const MS_PER_SECOND = 1000
const SECONDS_PER_UNIT = 60

const SECONDS_PATTERN = /^(\d*)(?:\.(\d*))?$/
const INTEGER_PATTERN = /^\d+$/

/**
 * Parse the trailing seconds component ("03", "03.5", ".5", "3.") to whole
 * milliseconds. Digits past the third decimal place are truncated.
 */
function parseSeconds(segment: string): number {
	const match = SECONDS_PATTERN.exec(segment)
	const whole = match?.[1] ?? ''
	const fraction = match?.[2] ?? ''
	if (!match || (whole === '' && fraction === '')) {
		throw new VttParseError('a decimal number', segment)
	}
	const millis = Number(`${fraction}000`.slice(0, 3))
	return Number(whole || '0') * MS_PER_SECOND + millis
}

/**
 * A point in a track, stored as milliseconds since the track start.
 *
 * @example
 * ```ts
 * Timestamp.parse("01:02:03.456").milliseconds; // 3723456
 * Timestamp.parse("90.5").format(); // "00:01:30.500"
 * ```
 */
export class Timestamp {
	private constructor(readonly milliseconds: number) {}

	/**
	 * Create a timestamp from a millisecond count.
	 *
	 * @throws RangeError if `milliseconds` is negative or not an integer
	 */
	static fromMilliseconds(milliseconds: number): Timestamp {
		if (!Number.isSafeInteger(milliseconds) || milliseconds < 0) {
			throw new RangeError(
				`Timestamp must be a non-negative whole number of milliseconds (got: ${milliseconds})`,
			)
		}
		return new Timestamp(milliseconds)
	}

	/**
	 * Parse a `:`-separated timestamp.
	 *
	 * The last component is decimal seconds; each earlier component is an
	 * integer worth `60^n` seconds, n counting up from 1 for minutes. Any number
	 * of components is accepted, so `"1:00:00:00.000"` is one day.
	 *
	 * @throws VttParseError if a component is not numeric, or the total does
	 * not fit in a safe integer number of milliseconds
	 */
	static parse(text: string): Timestamp {
		const [seconds = '', ...units] = text.split(':').reverse()
		let milliseconds = parseSeconds(seconds)
		if (!Number.isSafeInteger(milliseconds)) {
			throw new VttParseError('a decimal number', seconds)
		}

		units.forEach((segment, index) => {
			if (!INTEGER_PATTERN.test(segment)) {
				throw new VttParseError('a number', segment)
			}
			milliseconds +=
				SECONDS_PER_UNIT ** (index + 1) * Number(segment) * MS_PER_SECOND
			// past 2^53 the sum is no longer exact
			if (!Number.isSafeInteger(milliseconds)) {
				throw new VttParseError('a number', segment)
			}
		})

		return new Timestamp(milliseconds)
	}

	/** Negative when this timestamp is earlier than `other`. */
	compare(other: Timestamp): number {
		return this.milliseconds - other.milliseconds
	}

	equals(other: Timestamp): boolean {
		return this.milliseconds === other.milliseconds
	}

	/**
	 * Render as `HH:MM:SS.mmm`. Hours are not wrapped, so long tracks produce
	 * three or more hour digits.
	 */
	format(): string {
		const totalSeconds = Math.floor(this.milliseconds / MS_PER_SECOND)
		const hours = Math.floor(totalSeconds / 3600)
		const minutes = Math.floor(totalSeconds / 60) % 60
		const seconds = totalSeconds % 60
		const millis = this.milliseconds % MS_PER_SECOND

		return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`
	}

	toString(): string {
		return this.format()
	}
}

function pad(value: number, width: number): string {
	return value.toString().padStart(width, '0')
}
