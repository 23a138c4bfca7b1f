/**
 * @module @plugin-host/plugin-catalog/__tests__/catalog
 *
 * Catalog lifecycle against real plugin directories. WebAssembly plugins run
 * in the real sandbox; legacy plugins go through a fake launcher.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as path from 'node:path';
import { pino } from 'pino';
import {
  Dispatcher,
  type LspServerRegistry,
  type PluginDescription,
  type PluginId,
  type RunningPlugin,
} from '@plugin-host/plugin-contracts';
import { SandboxPlugin } from '@plugin-host/plugin-runtime';
import {
  PluginsRootFixture,
  buildCorruptModule,
  buildGuestModule,
  notificationLine,
} from '@plugin-host/plugin-testing';
import { PluginCatalog, type ProcessLauncher } from '../catalog.js';
import { PluginIdCounter } from '../ids.js';

function tomlManifest(name: string, execPath: string, version = '0.1.0'): string {
  return `name = "${name}"\nversion = "${version}"\nexec_path = "${execPath}"\n`;
}

const idle = buildGuestModule({ steps: [] });

class FakeRunningPlugin implements RunningPlugin {
  readonly kind = 'process';
  id: PluginId | undefined;
  readonly activate = vi.fn((id: PluginId) => {
    this.id = id;
  });
  readonly dispose = vi.fn();

  constructor(readonly description: PluginDescription) {}
}

describe('PluginCatalog', () => {
  let fixture: PluginsRootFixture;
  let ids: PluginIdCounter;
  let startServer: Mock<LspServerRegistry['startServer']>;
  let dispatcher: Dispatcher;
  let launched: FakeRunningPlugin[];
  let launchProcess: Mock<ProcessLauncher>;
  let catalog: PluginCatalog;

  function createCatalog(): PluginCatalog {
    return new PluginCatalog({
      pluginsDir: fixture.root,
      logLevel: 'silent',
      logger: pino({ level: 'silent' }),
      ids,
      launchProcess,
      env: {},
    });
  }

  beforeEach(async () => {
    fixture = await PluginsRootFixture.create('catalog-test-');
    ids = new PluginIdCounter();
    startServer = vi.fn<LspServerRegistry['startServer']>();
    dispatcher = new Dispatcher({ startServer });
    launched = [];
    launchProcess = vi.fn<ProcessLauncher>(async (description) => {
      const plugin = new FakeRunningPlugin(description);
      launched.push(plugin);
      return plugin;
    });
    catalog = createCatalog();
  });

  afterEach(async () => {
    catalog.shutdown();
    await fixture.cleanup();
  });

  describe('load', () => {
    it('loads one description per plugin directory', async () => {
      await fixture.addPlugin('alpha', { manifest: tomlManifest('alpha', './alpha.wasm'), files: { 'alpha.wasm': idle } });
      await fixture.addPlugin('beta', {
        manifest: { name: 'beta', version: '2.0.0', exec_path: 'bin/beta', configuration: { depth: 2 } },
        files: { 'bin/beta': '#!/bin/sh\n' },
      });

      await catalog.load();

      expect([...catalog.descriptions.keys()].sort()).toEqual(['alpha', 'beta']);
      expect(catalog.get('beta')).toEqual({
        name: 'beta',
        version: '2.0.0',
        execPath: path.join(fixture.root, 'beta', 'bin', 'beta'),
        dir: path.join(fixture.root, 'beta'),
        configuration: { depth: 2 },
      });
    });

    it('skips manifests that fail to load', async () => {
      await fixture.addPlugin('good', { manifest: tomlManifest('good', './good.wasm'), files: { 'good.wasm': idle } });
      await fixture.addPlugin('missing-exec', { manifest: tomlManifest('missing-exec', './nope.wasm') });
      await fixture.addPlugin('broken', { manifest: 'name = "broken' });
      await fixture.addPlugin('no-manifest', { files: { 'readme.txt': 'hello' } });

      await catalog.load();

      expect([...catalog.descriptions.keys()]).toEqual(['good']);
    });

    it('yields nothing for a missing plugins root', async () => {
      const missing = new PluginCatalog({
        pluginsDir: path.join(fixture.root, 'does-not-exist'),
        logLevel: 'silent',
        logger: pino({ level: 'silent' }),
        ids,
        env: {},
      });

      await missing.load();

      expect(missing.descriptions.size).toBe(0);
    });

    it('keeps the last discovered manifest for a duplicate name', async () => {
      await fixture.addPlugin('a-first', { manifest: tomlManifest('dup', './dup.wasm', '1.0.0'), files: { 'dup.wasm': idle } });
      await fixture.addPlugin('b-second', { manifest: tomlManifest('dup', './dup.wasm', '2.0.0'), files: { 'dup.wasm': idle } });

      await catalog.load();

      expect(catalog.descriptions.size).toBe(1);
      expect(catalog.get('dup')?.version).toBe('2.0.0');
      expect(catalog.get('dup')?.dir).toBe(path.join(fixture.root, 'b-second'));
    });

    it('is idempotent', async () => {
      await fixture.addPlugin('alpha', { manifest: tomlManifest('alpha', './alpha.wasm'), files: { 'alpha.wasm': idle } });

      await catalog.load();
      const first = new Map(catalog.descriptions);
      await catalog.load();

      expect(catalog.descriptions).toEqual(first);
    });

    it('mints no ids', async () => {
      await fixture.addPlugin('alpha', { manifest: tomlManifest('alpha', './alpha.wasm'), files: { 'alpha.wasm': idle } });

      await catalog.load();

      expect(ids.current).toBe(0);
      expect(catalog.plugins.size).toBe(0);
    });
  });

  describe('reload', () => {
    it('produces the same descriptions when nothing changed', async () => {
      await fixture.addPlugin('alpha', { manifest: tomlManifest('alpha', './alpha.wasm'), files: { 'alpha.wasm': idle } });
      await fixture.addPlugin('beta', { manifest: tomlManifest('beta', './beta.sh'), files: { 'beta.sh': '#!/bin/sh\n' } });
      await catalog.load();
      const before = new Map(catalog.descriptions);

      await catalog.reload();

      expect(catalog.descriptions).toEqual(before);
    });

    it('forgets removed plugins and disposes running instances', async () => {
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      await catalog.load();
      await catalog.startAll(dispatcher);
      await fixture.removePlugin('legacy');

      await catalog.reload();

      expect(launched[0].dispose).toHaveBeenCalledTimes(1);
      expect(catalog.plugins.size).toBe(0);
      expect(catalog.descriptions.size).toBe(0);
    });
  });

  describe('reload after an update', () => {
    const notifying = (languageId: string): Uint8Array =>
      buildGuestModule({
        steps: [
          {
            op: 'write',
            text: notificationLine({ method: 'start_lsp_server', params: { exec_path: '/x', language_id: languageId } }),
          },
          { op: 'notify' },
        ],
      });

    it('runs the module currently on disk', async () => {
      await fixture.addPlugin('p', { manifest: tomlManifest('p', './p.wasm'), files: { 'p.wasm': notifying('v1') } });
      await catalog.load();
      await catalog.startAll(dispatcher);

      await fixture.addPlugin('p', { files: { 'p.wasm': notifying('v2') } });
      await catalog.reload();
      await catalog.startAll(dispatcher);

      expect(startServer.mock.calls).toEqual([
        ['/x', 'v1', null],
        ['/x', 'v2', null],
      ]);
    });
  });

  describe('startAll', () => {
    it('starts a WebAssembly plugin with id 1 and hands it its configuration', async () => {
      await fixture.addPlugin('demo', {
        manifest: tomlManifest('demo', './demo.wasm'),
        files: { 'demo.wasm': buildGuestModule({ steps: [{ op: 'echo-stdin' }] }) },
      });
      await catalog.load();

      await catalog.startAll(dispatcher);

      expect([...catalog.plugins.keys()]).toEqual([1]);
      const plugin = catalog.plugins.get(1);
      expect(plugin).toBeInstanceOf(SandboxPlugin);
      if (plugin instanceof SandboxPlugin) {
        expect(plugin.id).toBe(1);
        expect(plugin.env.channel.readObject()).toEqual({});
      }
      expect(launchProcess).not.toHaveBeenCalled();
    });

    it('routes notifications sent during initialize', async () => {
      await fixture.addPlugin('rust', {
        manifest: tomlManifest('rust', './rust.wasm'),
        files: {
          'rust.wasm': buildGuestModule({
            steps: [
              {
                op: 'write',
                text: notificationLine({
                  method: 'start_lsp_server',
                  params: { exec_path: '/usr/bin/rust-analyzer', language_id: 'rust', options: null },
                }),
              },
              { op: 'notify' },
            ],
          }),
        },
      });
      await catalog.load();

      await catalog.startAll(dispatcher);

      expect(startServer).toHaveBeenCalledTimes(1);
      expect(startServer).toHaveBeenCalledWith('/usr/bin/rust-analyzer', 'rust', null);
    });

    it('launches non-WebAssembly executables as process plugins', async () => {
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      await catalog.load();

      const started = await catalog.startAll(dispatcher);

      expect(launchProcess).toHaveBeenCalledTimes(1);
      expect(launchProcess.mock.calls[0][0]).toBe(catalog.get('legacy'));
      expect(launchProcess.mock.calls[0][1]).toBe(dispatcher);
      expect(started).toEqual([launched[0]]);
      expect(launched[0].activate).toHaveBeenCalledWith(1);
    });

    it('skips a plugin that fails to start and keeps the others', async () => {
      await fixture.addPlugin('a-broken', {
        manifest: tomlManifest('a-broken', './broken.wasm'),
        files: { 'broken.wasm': buildCorruptModule() },
      });
      await fixture.addPlugin('b-good', { manifest: tomlManifest('b-good', './good.wasm'), files: { 'good.wasm': idle } });
      await catalog.load();

      await catalog.startAll(dispatcher);

      expect(catalog.plugins.size).toBe(1);
      expect(catalog.plugins.get(1)?.description.name).toBe('b-good');
    });

    it('skips a legacy plugin whose launch fails', async () => {
      launchProcess.mockRejectedValueOnce(new Error('spawn EACCES'));
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      await catalog.load();

      const started = await catalog.startAll(dispatcher);

      expect(started).toEqual([]);
      expect(ids.current).toBe(0);
    });

    it('assigns strictly increasing ids', async () => {
      for (const name of ['one', 'two', 'three']) {
        await fixture.addPlugin(name, { manifest: tomlManifest(name, `./${name}.sh`), files: { [`${name}.sh`]: '#!/bin/sh\n' } });
      }
      await catalog.load();

      await catalog.startAll(dispatcher);

      expect(launched.map((plugin) => plugin.id)).toEqual([1, 2, 3]);
      expect(catalog.nextPluginId()).toBe(4);
    });

    it('never reuses ids across restarts', async () => {
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      await catalog.load();

      await catalog.startAll(dispatcher);
      await catalog.reload();
      await catalog.startAll(dispatcher);

      expect([...catalog.plugins.keys()]).toEqual([2]);
    });

    it('shares the id counter between catalogs', async () => {
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      const other = createCatalog();
      await catalog.load();
      await other.load();

      await catalog.startAll(dispatcher);
      await other.startAll(dispatcher);

      expect([...catalog.plugins.keys()]).toEqual([1]);
      expect([...other.plugins.keys()]).toEqual([2]);
      other.shutdown();
    });
  });

  describe('shutdown', () => {
    it('disposes instances and keeps descriptions', async () => {
      await fixture.addPlugin('legacy', { manifest: tomlManifest('legacy', './legacy.sh'), files: { 'legacy.sh': '#!/bin/sh\n' } });
      await catalog.load();
      await catalog.startAll(dispatcher);

      catalog.shutdown();

      expect(launched[0].dispose).toHaveBeenCalledTimes(1);
      expect(catalog.plugins.size).toBe(0);
      expect(catalog.descriptions.size).toBe(1);
    });
  });
});
