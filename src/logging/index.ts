/**
 * Logging for the merge tool.
 *
 * Provides a factory for LogTape-based loggers with:
 * - JSONL file output with rotation (1MB default, 5 files)
 * - Hierarchical categories for subsystem filtering
 * - Correlation IDs to group the records of one run
 *
 * @example
 * ```typescript
 * import { createCliLogger } from "vtt-merge/logging";
 *
 * const { initLogger, rootLogger, getSubsystemLogger } = createCliLogger({
 *   name: "vtt-merge",
 *   subsystems: ["cli", "pipeline"],
 * });
 *
 * await initLogger();
 * rootLogger.info("Merge started");
 * getSubsystemLogger("pipeline").debug("Parsed track", { cues: 12 });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from './config.js'
export { createCorrelationId } from './correlation.js'
export {
	type CliLogger,
	type CliLoggerOptions,
	createCliLogger,
} from './factory.js'
