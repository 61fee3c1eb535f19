/**
 * Loggers for the vtt-merge tool.
 */

import { createCliLogger } from './logging/index.js'

const { initLogger, createCorrelationId, getSubsystemLogger } =
	createCliLogger({
		name: 'vtt-merge',
		subsystems: ['cli', 'pipeline'],
	})

export { createCorrelationId, initLogger }
export const cliLogger = getSubsystemLogger('cli')
export const pipelineLogger = getSubsystemLogger('pipeline')
