import { join } from 'node:path'
import { afterEach, describe, expect, test } from 'vitest'
import { VERSION } from '../index.js'
import { cleanupTestDir, setupTestDir } from '../testing/index.js'
import { type CliIo, defaultIo, run, USAGE } from './run.js'

const ALICE = 'WEBVTT\n\n00:00:05.000 --> 00:00:06.000\nhello from alice\n'
const BOB = 'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nhello from bob\n'
const MERGED =
	'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\n<v Bob>hello from bob\n\n00:00:05.000 --> 00:00:06.000\n<v Alice>hello from alice\n\n'

function memoryIo(files: Record<string, string>) {
	const stdout: string[] = []
	const stderr: string[] = []
	const reads: string[] = []
	const io: CliIo = {
		readFile: async (path) => {
			reads.push(path)
			const text = files[path]
			if (text === undefined) {
				throw new Error(`File not found: ${path}`)
			}
			return text
		},
		stdout: (text) => {
			stdout.push(text)
		},
		stderr: (text) => {
			stderr.push(text)
		},
	}
	return { io, stdout, stderr, reads }
}

describe('run', () => {
	test('prints the merged track', async () => {
		const { io, stdout, stderr } = memoryIo({ 'alice.vtt': ALICE, 'bob.vtt': BOB })

		const code = await run(['--speakers', 'Alice,Bob', 'alice.vtt', 'bob.vtt'], io)

		expect(code).toBe(0)
		expect(stdout).toEqual([MERGED])
		expect(stderr).toEqual([])
	})

	test('accepts repeated and equals-style speaker flags', async () => {
		for (const argv of [
			['--speakers', 'Alice', '--speakers', 'Bob', 'alice.vtt', 'bob.vtt'],
			['alice.vtt', 'bob.vtt', '--speakers=Alice, Bob'],
		]) {
			const { io, stdout } = memoryIo({ 'alice.vtt': ALICE, 'bob.vtt': BOB })
			expect(await run(argv, io)).toBe(0)
			expect(stdout).toEqual([MERGED])
		}
	})

	test('fails before reading files when counts differ', async () => {
		const { io, stdout, stderr, reads } = memoryIo({ 'alice.vtt': ALICE, 'bob.vtt': BOB })

		const code = await run(['--speakers', 'Alice', 'alice.vtt', 'bob.vtt'], io)

		expect(code).toBe(1)
		expect(reads).toEqual([])
		expect(stdout).toEqual([])
		expect(stderr).toEqual([
			'Error: differing number of speakers and files. every file needs one speaker defined\n',
		])
	})

	test('requires input files', async () => {
		const { io, stderr } = memoryIo({})

		expect(await run([], io)).toBe(1)
		expect(stderr).toEqual(['Error: at least one input file is required\n'])
	})

	test('requires speakers', async () => {
		const { io, stderr } = memoryIo({ 'alice.vtt': ALICE })

		expect(await run(['alice.vtt'], io)).toBe(1)
		expect(stderr).toEqual(['Error: at least one speaker is required\n'])
	})

	test('rejects unknown options', async () => {
		const { io, stderr, reads } = memoryIo({ 'alice.vtt': ALICE })

		expect(await run(['--speaker', 'Alice', 'alice.vtt'], io)).toBe(1)
		expect(stderr).toEqual(['Error: unknown option: --speaker\n'])
		expect(reads).toEqual([])
	})

	test('stops at the first malformed file and names it', async () => {
		const { io, stdout, stderr, reads } = memoryIo({
			'alice.vtt': ALICE,
			'bob.vtt': 'WEBVTT\n\n00:00:01.000 => 00:00:02.000\nhi\n',
			'carol.vtt': BOB,
		})

		const code = await run(
			['--speakers', 'Alice,Bob,Carol', 'alice.vtt', 'bob.vtt', 'carol.vtt'],
			io,
		)

		expect(code).toBe(1)
		expect(reads).toEqual(['alice.vtt', 'bob.vtt'])
		expect(stdout).toEqual([])
		expect(stderr).toEqual([
			"Error: while parsing bob.vtt: parsing error: expected -->, got '=>'\n",
		])
	})

	test('reports unreadable files with their path', async () => {
		const { io, stderr } = memoryIo({})

		expect(await run(['--speakers', 'Alice', 'missing.vtt'], io)).toBe(1)
		expect(stderr).toEqual([
			'Error: while parsing missing.vtt: File not found: missing.vtt\n',
		])
	})

	test('warns about unsorted inputs and still merges them', async () => {
		const { io, stdout, stderr } = memoryIo({
			'late.vtt':
				'WEBVTT\n\n00:00:09.000 --> 00:00:10.000\nlate\n\n00:00:03.000 --> 00:00:04.000\nearly\n',
		})

		expect(await run(['--speakers', 'Alice', 'late.vtt'], io)).toBe(0)
		expect(stderr).toEqual(['unsorted: late.vtt\n'])
		expect(stdout).toEqual([
			'WEBVTT\n\n00:00:03.000 --> 00:00:04.000\n<v Alice>early\n\n00:00:09.000 --> 00:00:10.000\n<v Alice>late\n\n',
		])
	})

	test('prints usage', async () => {
		const { io, stdout, reads } = memoryIo({})

		expect(await run(['--help', 'alice.vtt'], io)).toBe(0)
		expect(stdout).toEqual([USAGE])
		expect(reads).toEqual([])
	})

	test('prints the version', async () => {
		const { io, stdout } = memoryIo({})

		expect(await run(['--version'], io)).toBe(0)
		expect(stdout).toEqual([`${VERSION}\n`])
	})

	test('accepts -h and -V', async () => {
		const help = memoryIo({})
		expect(await run(['-h', 'alice.vtt'], help.io)).toBe(0)
		expect(help.stdout).toEqual([USAGE])
		expect(help.reads).toEqual([])

		const version = memoryIo({})
		expect(await run(['-V'], version.io)).toBe(0)
		expect(version.stdout).toEqual([`${VERSION}\n`])
	})

	test('rejects unknown short options', async () => {
		const { io, stderr, reads } = memoryIo({ 'alice.vtt': ALICE })

		expect(await run(['-s', 'Alice', 'alice.vtt'], io)).toBe(1)
		expect(stderr).toEqual(['Error: unknown option: -s\n'])
		expect(reads).toEqual([])
	})
})

describe('run with files on disk', () => {
	let dir = ''

	afterEach(() => {
		cleanupTestDir(dir)
	})

	test('reads inputs through the default reader', async () => {
		dir = setupTestDir('vtt-merge-run-', {
			'alice.vtt': ALICE,
			'bob.txt': BOB,
		})
		const stdout: string[] = []
		const stderr: string[] = []

		const code = await run(
			['--speakers', 'Alice,Bob', join(dir, 'alice.vtt'), join(dir, 'bob.txt')],
			{
				...defaultIo,
				stdout: (text) => {
					stdout.push(text)
				},
				stderr: (text) => {
					stderr.push(text)
				},
			},
		)

		expect(code).toBe(0)
		expect(stdout).toEqual([MERGED])
		expect(stderr).toEqual([])
	})

	test('reports a missing file through the default reader', async () => {
		dir = setupTestDir('vtt-merge-run-', {})
		const missing = join(dir, 'missing.vtt')
		const stderr: string[] = []

		const code = await run(['--speakers', 'Alice', missing], {
			...defaultIo,
			stdout: () => {},
			stderr: (text) => {
				stderr.push(text)
			},
		})

		expect(code).toBe(1)
		expect(stderr).toEqual([
			`Error: while parsing ${missing}: File not found: ${missing}\n`,
		])
	})
})
