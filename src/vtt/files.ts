/**
 * File name checks for WebVTT inputs.
 *
 * @module vtt/files
 */

/**
 * Check if a file path is a VTT file.
 *
 * @param filePath - Path to check
 * @returns True if the file has a .vtt extension (case-insensitive)
 */
export function isVttFile(filePath: string): boolean {
	return filePath.toLowerCase().endsWith('.vtt')
}
