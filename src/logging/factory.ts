/**
 * CLI Logger Factory.
 *
 * Creates configured LogTape loggers with:
 * - JSONL file output with rotation
 * - Hierarchical categories for subsystem filtering
 * - A per-user log location (~/.vtt-merge/logs/<name>.jsonl)
 */

import { existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from './config.js'
import { createCorrelationId } from './correlation.js'

/**
 * Options for creating a CLI logger.
 */
export interface CliLoggerOptions {
	/** Tool name (used for log file name and root category). Should be kebab-case. */
	name: string

	/**
	 * Subsystem names for hierarchical loggers.
	 *
	 * @example ["cli", "pipeline"] → loggers for ["vtt-merge", "cli"], ["vtt-merge", "pipeline"]
	 */
	subsystems?: readonly string[]

	/** Log directory. Defaults to ~/.vtt-merge/logs/ */
	logDir?: string

	/**
	 * Log file name (without extension). Defaults to `name`.
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest log level to capture. Defaults to "debug". */
	lowestLevel?: LogLevel
}

/**
 * Result of creating a CLI logger.
 */
export interface CliLogger {
	/**
	 * Initialize the logging system. Must be called before logging.
	 * Safe to call multiple times - only initializes once.
	 */
	initLogger: () => Promise<void>

	/** Generate a correlation ID for a run. */
	createCorrelationId: typeof createCorrelationId

	/** Root logger for the tool category. */
	rootLogger: Logger

	/** Get a logger for `[name, subsystem]`. */
	getSubsystemLogger: (subsystem: string) => Logger

	/** Log directory path */
	logDir: string

	/** Log file path */
	logFile: string

	/** Pre-created loggers for the subsystems named in the options. */
	subsystemLoggers: Record<string, Logger>
}

/**
 * Create a configured logger for a command-line tool.
 *
 * Loggers are usable right away; they only emit once `initLogger()` has run.
 * Library code can therefore log unconditionally.
 *
 * @example
 * ```typescript
 * // In the tool's logger.ts
 * const { initLogger, getSubsystemLogger } = createCliLogger({
 *   name: "vtt-merge",
 *   subsystems: ["cli", "pipeline"],
 * });
 *
 * export { initLogger };
 * export const pipelineLogger = getSubsystemLogger("pipeline");
 * ```
 */
export function createCliLogger(options: CliLoggerOptions): CliLogger {
	const {
		name,
		subsystems = [],
		logDir = DEFAULT_LOG_DIR,
		logFileName = name,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false

	async function initLogger(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		// Sink name is per tool so configs from several tools don't collide
		const sinkName = `file_${name}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [name],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// LogTape was configured elsewhere (e.g. by a test or an embedding
			// program); keep that configuration.
			if (
				error instanceof Error &&
				error.message.includes('Already configured')
			) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([name]).info('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
		})

		isInitialized = true
	}

	const rootLogger = getLogger([name])

	function getSubsystemLogger(subsystem: string): Logger {
		return getLogger([name, subsystem])
	}

	const subsystemLoggers: Record<string, Logger> = {}
	for (const subsystem of subsystems) {
		subsystemLoggers[subsystem] = getSubsystemLogger(subsystem)
	}

	return {
		initLogger,
		createCorrelationId,
		rootLogger,
		getSubsystemLogger,
		logDir,
		logFile,
		subsystemLoggers,
	}
}
