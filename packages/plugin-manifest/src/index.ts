/**
 * @module @plugin-host/plugin-manifest
 *
 * Reads plugin manifests into {@link PluginDescription}s.
 */

export { rawManifestSchema, MANIFEST_FILE_NAMES } from './schema.js';
export type { RawManifest, ManifestFormat } from './schema.js';
export { parseManifest, loadManifest, findAllManifests, manifestFormatOf } from './loader.js';
