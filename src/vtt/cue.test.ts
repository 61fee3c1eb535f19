import { describe, expect, test } from 'vitest'
import { Cue } from './cue.js'
import { Timerange } from './timerange.js'

const range = Timerange.parse('00:00:01.000 --> 00:00:02.000')

describe('Cue', () => {
	test('starts without a speaker', () => {
		expect(new Cue(range, 'hello').speaker).toBeUndefined()
	})

	test('formats a bare cue block', () => {
		expect(new Cue(range, 'hello').format()).toBe('\n00:00:01.000 --> 00:00:02.000\nhello\n')
	})

	test('formats a voice tag when a speaker is set', () => {
		const cue = new Cue(range, 'hello')
		cue.speaker = 'Alice'
		expect(cue.format()).toBe('\n00:00:01.000 --> 00:00:02.000\n<v Alice>hello\n')
	})

	test('clone has its own speaker', () => {
		const cue = new Cue(range, 'hello', 'Alice')
		const copy = cue.clone()
		copy.speaker = 'Bob'
		expect(cue.speaker).toBe('Alice')
		expect(copy.range).toBe(cue.range)
	})

	test('equals compares range, speaker, and text', () => {
		const cue = new Cue(range, 'hello', 'Alice')
		expect(cue.equals(new Cue(Timerange.parse('1 --> 2'), 'hello', 'Alice'))).toBe(true)
		expect(cue.equals(new Cue(range, 'hello'))).toBe(false)
		expect(cue.equals(new Cue(range, 'hello!', 'Alice'))).toBe(false)
	})
})
