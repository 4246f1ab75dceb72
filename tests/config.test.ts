import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { loadConfig, parseConfig, resolveEngineTimeoutMs } from '../src/core/config/reader.js';

const dirs: string[] = [];

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((d) => rm(d, { recursive: true, force: true })));
});

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'shuttle-config-'));
  dirs.push(dir);
  return dir;
}

describe('loadConfig', () => {
  it('falls back to defaults when no config file exists', async () => {
    const cwd = await tempDir();
    const { config, sourcePath } = await loadConfig({ cwd, env: {} });

    expect(sourcePath).toBeNull();
    expect(config.stateDir).toBe(join(cwd, '.shuttle'));
    expect(config.storage.tables).toBe(join(cwd, 'Dependencies/PCG_HD/Out/CSV'));
    expect(config.engine.timeoutMs).toBe(1_800_000);
    expect(config.import.strategies).toEqual(['import-task', 'asset-subsystem', 'content-browser']);
    expect(config.run).toEqual({ inputMode: 'mesh', continueOnOptionalFailure: false });
  });

  it('reads shuttle.yaml and resolves paths against its directory', async () => {
    const cwd = await tempDir();
    await writeFile(
      join(cwd, 'shuttle.yaml'),
      ['storage:', '  tables: out/tables', 'assets:', '  tables: /Game/Tables/', 'import:', '  strategies: [content-browser]', ''].join('\n'),
      'utf8'
    );

    const { config, sourcePath } = await loadConfig({ cwd, env: {} });
    expect(sourcePath).toBe(join(cwd, 'shuttle.yaml'));
    expect(config.storage.tables).toBe(join(cwd, 'out/tables'));
    expect(config.assets.tables).toBe('/Game/Tables');
    expect(config.import.strategies).toEqual(['content-browser']);
  });

  it('applies environment overrides', async () => {
    const cwd = await tempDir();
    const { config } = await loadConfig({
      cwd,
      env: {
        SHUTTLE_BRIDGE_URL: 'http://127.0.0.1:9999',
        SHUTTLE_ENGINE_EXECUTABLE: '/opt/engine/bin/hython',
        SHUTTLE_ENGINE_TIMEOUT_MS: '60000'
      }
    });
    expect(config.editor.bridgeUrl).toBe('http://127.0.0.1:9999');
    expect(config.engine.executable).toBe('/opt/engine/bin/hython');
    expect(config.engine.timeoutMs).toBe(60_000);
  });

  it('fails for a missing explicit config file', async () => {
    const cwd = await tempDir();
    await expect(loadConfig({ cwd, explicitPath: 'custom.yaml', env: {} })).rejects.toThrow(
      `Config file not found: ${join(cwd, 'custom.yaml')}`
    );
  });

  it('rejects relative asset folders', () => {
    expect(() => parseConfig({ assets: { roads: 'Game/Road' } }, '/work')).toThrow(/asset folders are absolute content paths/);
  });
});

describe('resolveEngineTimeoutMs', () => {
  it('uses the configured value when unset', () => {
    expect(resolveEngineTimeoutMs(90_000, {})).toBe(90_000);
    expect(resolveEngineTimeoutMs(undefined, {})).toBe(1_800_000);
  });

  it('falls back for non-numeric values', () => {
    expect(resolveEngineTimeoutMs(90_000, { SHUTTLE_ENGINE_TIMEOUT_MS: 'soon' })).toBe(90_000);
  });

  it('clamps values below one second', () => {
    expect(resolveEngineTimeoutMs(90_000, { SHUTTLE_ENGINE_TIMEOUT_MS: '250' })).toBe(1_000);
  });

  it('floors decimals', () => {
    expect(resolveEngineTimeoutMs(90_000, { SHUTTLE_ENGINE_TIMEOUT_MS: '45000.9' })).toBe(45_000);
  });
});
