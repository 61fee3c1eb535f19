/**
 * Test fixtures for filesystem-backed tests.
 *
 * @example
 * ```ts
 * import { setupTestDir, cleanupTestDir } from "../testing/index.js";
 *
 * const dir = setupTestDir("merge-", {
 *   "alice.vtt": "WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nhi\n",
 * });
 * // ...
 * cleanupTestDir(dir);
 * ```
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

/**
 * Create a unique directory under the system temp directory.
 *
 * @param prefix - Prefix for the directory name (default: "test-")
 * @returns Absolute path to the created directory
 */
export function createTempDir(prefix = 'test-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/**
 * Write a file below `dir`, creating parent directories as needed.
 *
 * @returns Absolute path of the written file
 */
export function writeTestFile(
	dir: string,
	relativePath: string,
	content: string,
): string {
	const fullPath = path.join(dir, relativePath)
	fs.mkdirSync(path.dirname(fullPath), { recursive: true })
	fs.writeFileSync(fullPath, content, 'utf8')
	return fullPath
}

/**
 * Create a temp directory populated with the given files.
 *
 * @param files - Relative paths mapped to file contents
 */
export function setupTestDir(
	prefix: string,
	files: Record<string, string>,
): string {
	const dir = createTempDir(prefix)
	for (const [relativePath, content] of Object.entries(files)) {
		writeTestFile(dir, relativePath, content)
	}
	return dir
}

/** Remove a test directory and everything in it. */
export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}
