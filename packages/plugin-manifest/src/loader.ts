/**
 * @module @plugin-host/plugin-manifest/loader
 *
 * Manifest discovery and loading.
 *
 * Layout: `<pluginsDir>/<plugin>/manifest.toml` (or `manifest.json`), one
 * manifest per plugin directory.
 */

import * as path from 'node:path';
import { readFile, realpath } from 'node:fs/promises';
import { glob } from 'glob';
import { parse as parseToml } from 'smol-toml';
import { ManifestError, normalizeError, type PluginDescription } from '@plugin-host/plugin-contracts';
import { rawManifestSchema, MANIFEST_FILE_NAMES, type ManifestFormat, type RawManifest } from './schema.js';

/**
 * Detect manifest format from the file extension
 */
export function manifestFormatOf(manifestPath: string): ManifestFormat {
  return path.extname(manifestPath).toLowerCase() === '.json' ? 'json' : 'toml';
}

/**
 * Parse and validate manifest text.
 *
 * @throws Error describing the syntax or schema problem
 */
export function parseManifest(text: string, format: ManifestFormat): RawManifest {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(text) : datesToStrings(parseToml(text));
  } catch (error) {
    throw new Error(`Invalid ${format.toUpperCase()} in manifest: ${normalizeError(error).message}`);
  }

  const result = rawManifestSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid manifest: ${problems}`);
  }
  return result.data;
}

/**
 * TOML date and time values become their ISO 8601 text so the manifest stays
 * plain JSON.
 */
function datesToStrings(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(datesToStrings);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, datesToStrings(entry)]));
  }
  return value;
}

/**
 * Load a manifest file and resolve its paths.
 *
 * `dir` becomes the canonical manifest directory and `execPath` the canonical
 * path of `exec_path` joined onto it. Both must exist.
 *
 * @throws ManifestError when the file is unreadable, malformed, or exec_path does not exist
 */
export async function loadManifest(manifestPath: string): Promise<PluginDescription> {
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf8');
  } catch (error) {
    throw new ManifestError(manifestPath, `Cannot read manifest: ${normalizeError(error).message}`, { cause: error });
  }

  let raw: RawManifest;
  try {
    raw = parseManifest(text, manifestFormatOf(manifestPath));
  } catch (error) {
    throw new ManifestError(manifestPath, normalizeError(error).message, { cause: error });
  }

  const parent = path.dirname(manifestPath);
  let dir: string;
  let execPath: string;
  try {
    dir = await realpath(parent);
  } catch (error) {
    throw new ManifestError(manifestPath, `Cannot resolve plugin directory ${parent}`, { cause: error });
  }
  try {
    execPath = await realpath(path.resolve(parent, raw.exec_path));
  } catch (error) {
    throw new ManifestError(manifestPath, `exec_path "${raw.exec_path}" does not exist`, { cause: error });
  }

  const description: PluginDescription = {
    name: raw.name,
    version: raw.version,
    execPath,
    dir,
    ...(raw.configuration !== undefined ? { configuration: raw.configuration } : {}),
  };
  return Object.freeze(description);
}

/**
 * Find every plugin manifest under the plugins root.
 *
 * Each direct subdirectory contributes at most one manifest (TOML preferred
 * over JSON). A missing root yields an empty list.
 */
export async function findAllManifests(pluginsDir: string): Promise<string[]> {
  const pattern = `*/{${MANIFEST_FILE_NAMES.map(({ file }) => file).join(',')}}`;
  const matches = await glob(pattern, { cwd: pluginsDir, absolute: true, nodir: true });

  const byDir = new Map<string, string>();
  for (const match of matches.sort()) {
    const dir = path.dirname(match);
    const current = byDir.get(dir);
    if (current === undefined || rank(match) < rank(current)) {
      byDir.set(dir, match);
    }
  }

  return [...byDir.values()].sort();
}

function rank(manifestPath: string): number {
  const name = path.basename(manifestPath);
  return MANIFEST_FILE_NAMES.findIndex(({ file }) => file === name);
}
