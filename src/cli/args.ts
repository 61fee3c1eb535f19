/**
 * Lightweight CLI argument parsing.
 *
 * - Three flag formats (--flag value, --flag=value, --flag)
 * - Single-letter short flags (-h)
 * - Repeated flags collected into arrays
 * - Comma-separated list values
 */

/** Value of a parsed flag; repeated flags become arrays. */
export type FlagValue = string | boolean | (string | boolean)[]

/** Parsed command line. */
export interface ParsedArgs {
	positional: string[]
	flags: Record<string, FlagValue>
}

const SHORT_FLAG = /^-([A-Za-z])$/

/** Options for {@link parseArgs}. */
export interface ParseArgsOptions {
	/**
	 * Flags that never take a value, so `--help file.vtt` keeps `file.vtt`
	 * positional.
	 */
	booleanFlags?: readonly string[]
	/** Short flag letters mapped to the long flag they stand for. */
	aliases?: Readonly<Record<string, string>>
}

/**
 * Parse command-line arguments into positional arguments and flags.
 *
 * Handles three flag formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 *
 * Duplicate flags are stored as arrays:
 * - `--speakers A --speakers B` → flags.speakers = ["A", "B"]
 * - `--speakers A` → flags.speakers = "A"
 *
 * A single-letter `-x` is read like `--x`, or like the long flag `aliases`
 * maps it to. Everything after a bare `--` is positional.
 *
 * @example
 * parseArgs(["--speakers", "Alice,Bob", "a.vtt", "b.vtt"])
 * // → { positional: ["a.vtt", "b.vtt"], flags: { speakers: "Alice,Bob" } }
 *
 * @example
 * parseArgs(["--help", "a.vtt"], { booleanFlags: ["help"] })
 * // → { positional: ["a.vtt"], flags: { help: true } }
 */
export function parseArgs(
	argv: readonly string[],
	options: ParseArgsOptions = {},
): ParsedArgs {
	const booleanFlags = new Set(options.booleanFlags ?? [])
	const aliases = options.aliases ?? {}
	const positional: string[] = []
	const flags: Record<string, FlagValue> = {}

	const setValue = (key: string, newValue: string | boolean) => {
		const existing = flags[key]
		if (existing === undefined) {
			flags[key] = newValue
		} else if (Array.isArray(existing)) {
			existing.push(newValue)
		} else {
			flags[key] = [existing, newValue]
		}
	}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (arg === undefined) continue
		if (arg === '--') {
			positional.push(...argv.slice(i + 1))
			break
		}
		const short = SHORT_FLAG.exec(arg)?.[1]
		if (!short && !arg.startsWith('--')) {
			positional.push(arg)
			continue
		}

		const separator = short ? -1 : arg.indexOf('=')
		const key = short
			? (aliases[short] ?? short)
			: arg.slice(2, separator === -1 ? undefined : separator)
		if (!key) continue
		const next = argv[i + 1]

		if (separator !== -1) {
			setValue(key, arg.slice(separator + 1))
		} else if (!booleanFlags.has(key) && next && !next.startsWith('--')) {
			setValue(key, next)
			i++
		} else {
			setValue(key, true)
		}
	}

	return { positional, flags }
}

/**
 * Parse comma-separated list from CLI flag value.
 *
 * Trims whitespace and filters empty strings.
 * Returns empty array for non-string inputs.
 *
 * @example
 * parseCommaSeparatedList("a,b,c") // → ["a", "b", "c"]
 * parseCommaSeparatedList("a, b , c") // → ["a", "b", "c"]
 * parseCommaSeparatedList("a,,b") // → ["a", "b"]
 * parseCommaSeparatedList(true) // → []
 */
export function parseCommaSeparatedList(
	value: string | boolean | undefined,
): string[] {
	if (typeof value !== 'string') return []
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean)
}

/**
 * Collect a list flag that may be comma-separated, repeated, or both.
 *
 * @example
 * const { flags } = parseArgs(["--speakers", "A,B", "--speakers", "C"]);
 * getListFlag(flags, "speakers") // → ["A", "B", "C"]
 */
export function getListFlag(
	flags: Record<string, FlagValue>,
	key: string,
): string[] {
	const value = flags[key]
	const values = Array.isArray(value) ? value : [value]
	return values.flatMap((entry) => parseCommaSeparatedList(entry))
}
