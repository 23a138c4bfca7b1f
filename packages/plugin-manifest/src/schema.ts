/**
 * @module @plugin-host/plugin-manifest/schema
 * Zod validation schema for plugin manifests
 */

import { z } from 'zod';
import { jsonValueSchema } from '@plugin-host/plugin-contracts';

/**
 * Manifest as written on disk. `exec_path` may be relative to the manifest's
 * directory; unknown keys are ignored.
 */
export const rawManifestSchema = z.object({
  name: z.string().min(1, 'name must not be empty'),
  version: z.string(),
  exec_path: z.string().min(1, 'exec_path must not be empty'),
  configuration: jsonValueSchema.optional(),
});

export type RawManifest = z.output<typeof rawManifestSchema>;

export type ManifestFormat = 'toml' | 'json';

/**
 * Manifest file names looked up in each plugin directory, in priority order
 */
export const MANIFEST_FILE_NAMES: ReadonlyArray<{ file: string; format: ManifestFormat }> = [
  { file: 'manifest.toml', format: 'toml' },
  { file: 'manifest.json', format: 'json' },
];
