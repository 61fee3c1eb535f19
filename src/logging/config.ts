/**
 * Logging configuration defaults.
 *
 * These values can be overridden when creating a CLI logger.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

/** Default log directory */
export const DEFAULT_LOG_DIR: string = join(homedir(), '.vtt-merge', 'logs')

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/**
 * Logging level conventions.
 *
 * Note: LogTape uses "warning" not "warn" for the level name.
 *
 * - DEBUG: per-input parse details (cue counts)
 * - INFO: run start/complete
 * - WARNING: inputs that were not time-ordered, unexpected file extensions
 * - ERROR: failed runs
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'debug'
