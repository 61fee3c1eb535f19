/**
 * Correlation IDs link the log entries of one merge run.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character correlation ID.
 *
 * @returns Short UUID prefix (e.g., "a1b2c3d4")
 *
 * @example
 * ```typescript
 * const cid = createCorrelationId();
 * logger.info("Merge started", { cid });
 * ```
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
