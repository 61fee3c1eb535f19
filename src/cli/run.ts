/**
 * The `vtt-merge` command.
 *
 * Reads one WebVTT file per speaker, tags every cue with that speaker, and
 * prints the merged track ordered by cue start time.
 */

import { resolveInputs } from '../config/options.js'
import { ConfigurationError, InputFileError } from '../errors/input-errors.js'
import { isStructuredError } from '../errors/structured-error.js'
import { readTextFile } from '../fs/index.js'
import { VERSION } from '../index.js'
import { cliLogger, createCorrelationId } from '../logger.js'
import { foldSpeakerTrack } from '../merge/pipeline.js'
import { isVttFile } from '../vtt/files.js'
import { Track } from '../vtt/track.js'
import { getListFlag, parseArgs } from './args.js'

export const USAGE = `Usage: vtt-merge --speakers <name>[,<name>...] <file.vtt>...

Merge WebVTT transcripts, one per speaker, into a single track ordered by cue
start time. The n-th speaker is assigned to the n-th file.

Options:
  --speakers <names>  Comma-separated speaker names (may be repeated)
  -h, --help          Show this help
  -V, --version       Show the version
`

const BOOLEAN_FLAGS = ['help', 'version'] as const
const KNOWN_FLAGS = new Set<string>(['speakers', ...BOOLEAN_FLAGS])
const SHORT_ALIASES = { h: 'help', V: 'version' }

/**
 * Side effects of a run, injectable for tests.
 */
export interface CliIo {
	readFile: (path: string) => Promise<string>
	stdout: (text: string) => void
	stderr: (text: string) => void
}

export const defaultIo: CliIo = {
	readFile: readTextFile,
	stdout: (text) => {
		process.stdout.write(text)
	},
	stderr: (text) => {
		process.stderr.write(text)
	},
}

async function loadInput(io: CliIo, path: string): Promise<string> {
	try {
		return await io.readFile(path)
	} catch (error: unknown) {
		throw new InputFileError(
			path,
			error instanceof Error ? error : new Error(String(error)),
		)
	}
}

/**
 * Run the command with the given arguments (without the node/script prefix).
 *
 * Inputs are read one at a time; the first failure stops the run before any
 * later file is read and nothing is written to stdout.
 *
 * @returns Process exit code
 */
export async function run(
	argv: readonly string[],
	io: CliIo = defaultIo,
): Promise<number> {
	const { positional, flags } = parseArgs(argv, {
		booleanFlags: BOOLEAN_FLAGS,
		aliases: SHORT_ALIASES,
	})

	if (flags.help !== undefined) {
		io.stdout(USAGE)
		return 0
	}
	if (flags.version !== undefined) {
		io.stdout(`${VERSION}\n`)
		return 0
	}

	const cid = createCorrelationId()

	try {
		const unknown = Object.keys(flags).find((key) => !KNOWN_FLAGS.has(key))
		if (unknown !== undefined) {
			const dashes = unknown.length === 1 ? '-' : '--'
			throw new ConfigurationError(`unknown option: ${dashes}${unknown}`, {
				option: unknown,
			})
		}

		const inputs = resolveInputs({
			files: positional,
			speakers: getListFlag(flags, 'speakers'),
		})
		cliLogger.info('Merge started', {
			cid,
			inputs: inputs.map(({ speaker, path }) => ({ speaker, path })),
		})

		const merged = new Track()
		for (const { speaker, path } of inputs) {
			if (!isVttFile(path)) {
				cliLogger.warning('Input does not have a .vtt extension', {
					cid,
					path,
				})
			}
			const text = await loadInput(io, path)
			const { unsorted } = foldSpeakerTrack(
				merged,
				{ speaker, source: path, text },
				cid,
			)
			if (unsorted) {
				io.stderr(`unsorted: ${path}\n`)
			}
		}

		io.stdout(`${merged.format()}\n`)
		cliLogger.info('Merge complete', { cid, cues: merged.length })
		return 0
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error)
		cliLogger.error('Merge failed', {
			cid,
			error: isStructuredError(error) ? error.toJSON() : message,
		})
		io.stderr(`Error: ${message}\n`)
		return 1
	}
}
