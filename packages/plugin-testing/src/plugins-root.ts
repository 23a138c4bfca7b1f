/**
 * @module @plugin-host/plugin-testing/plugins-root
 * Temporary plugins directory for discovery and catalog tests
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

export interface TestPluginSpec {
  /**
   * Object manifests are written as manifest.json, strings as manifest.toml.
   * Omit to create a plugin directory without a manifest.
   */
  manifest?: string | Record<string, unknown>;
  /** Extra files (e.g. the plugin module), relative to the plugin directory */
  files?: Record<string, Uint8Array | string>;
}

export class PluginsRootFixture {
  private constructor(readonly root: string) {}

  static async create(prefix = 'plugin-host-test-'): Promise<PluginsRootFixture> {
    return new PluginsRootFixture(await mkdtemp(path.join(tmpdir(), prefix)));
  }

  /**
   * Create `<root>/<dirName>` with its manifest and files.
   *
   * @returns the plugin directory
   */
  async addPlugin(dirName: string, spec: TestPluginSpec): Promise<string> {
    const dir = path.join(this.root, dirName);
    await mkdir(dir, { recursive: true });

    if (typeof spec.manifest === 'string') {
      await writeFile(path.join(dir, 'manifest.toml'), spec.manifest);
    } else if (spec.manifest) {
      await writeFile(path.join(dir, 'manifest.json'), JSON.stringify(spec.manifest));
    }

    for (const [file, content] of Object.entries(spec.files ?? {})) {
      await mkdir(path.dirname(path.join(dir, file)), { recursive: true });
      await writeFile(path.join(dir, file), content);
    }
    return dir;
  }

  async removePlugin(dirName: string): Promise<void> {
    await rm(path.join(this.root, dirName), { recursive: true, force: true });
  }

  async cleanup(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}
