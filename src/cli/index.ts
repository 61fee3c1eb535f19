/**
 * Command-line entry points and argument helpers.
 *
 * @module cli
 */

export {
	type FlagValue,
	getListFlag,
	type ParseArgsOptions,
	type ParsedArgs,
	parseArgs,
	parseCommaSeparatedList,
} from './args.js'
export { type CliIo, defaultIo, run, USAGE } from './run.js'
