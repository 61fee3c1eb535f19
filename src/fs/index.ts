/**
 * Filesystem helpers for loading input documents.
 */

import { readFile, stat } from 'node:fs/promises'
import { StructuredError } from '../errors/structured-error.js'

/**
 * Check if a path exists (file or directory).
 */
export async function pathExists(filePath: string): Promise<boolean> {
	try {
		await stat(filePath)
		return true
	} catch {
		return false
	}
}

/**
 * Read a UTF-8 text file.
 *
 * @param filePath - Path to file
 * @returns File contents as string
 * @throws StructuredError (`NOT_FOUND`) if the file doesn't exist
 */
export async function readTextFile(filePath: string): Promise<string> {
	if (!(await pathExists(filePath))) {
		throw new StructuredError(
			`File not found: ${filePath}`,
			'NOT_FOUND',
			'FILE_NOT_FOUND',
			false,
			{ path: filePath },
		)
	}
	return readFile(filePath, 'utf8')
}
