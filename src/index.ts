/**
 * vtt-merge
 *
 * Merge per-speaker WebVTT transcripts into one speaker-tagged track.
 *
 * Import from subpath exports:
 *   import { Track } from "vtt-merge/vtt";
 *   import { mergeSpeakerTracks } from "vtt-merge/merge";
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

const PackageManifestSchema = z.object({ version: z.string().min(1) })

// src/ and dist/ both sit one level below package.json
const manifest = PackageManifestSchema.parse(
	JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')),
)

export const VERSION = manifest.version
