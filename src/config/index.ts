/**
 * Option validation for merge runs.
 *
 * @module config
 */

export {
	type InputPair,
	type MergeOptions,
	MergeOptionsSchema,
	resolveInputs,
} from './options.js'
