import { dirname, isAbsolute, resolve } from 'node:path';

import { fileExists, readYaml } from '../../utils/fs.js';
import { ShuttleConfig, type ShuttleConfigInput } from './types.js';

export const DEFAULT_CONFIG_FILE = 'shuttle.yaml';

const DEFAULT_ENGINE_TIMEOUT_MS = 1_800_000;
const MIN_ENGINE_TIMEOUT_MS = 1_000;

export interface LoadedConfig {
  config: ShuttleConfig;
  /** Directory relative paths were resolved against. */
  baseDir: string;
  /** Config file that was read; null when defaults were used. */
  sourcePath: string | null;
}

/**
 * Read `shuttle.yaml` (or `explicitPath`), apply env overrides and resolve every
 * filesystem path against the config file's directory.
 *
 * A missing default config file is not an error: defaults apply. A missing explicit
 * file is.
 */
export async function loadConfig(opts: { cwd?: string; explicitPath?: string; env?: NodeJS.ProcessEnv } = {}): Promise<LoadedConfig> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const env = opts.env ?? process.env;

  let sourcePath: string | null = null;
  let raw: unknown = {};
  if (opts.explicitPath) {
    sourcePath = resolve(cwd, opts.explicitPath);
    if (!(await fileExists(sourcePath))) throw new Error(`Config file not found: ${sourcePath}`);
    raw = (await readYaml(sourcePath)) ?? {};
  } else {
    const candidate = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (await fileExists(candidate)) {
      sourcePath = candidate;
      raw = (await readYaml(candidate)) ?? {};
    }
  }

  const baseDir = sourcePath ? dirname(sourcePath) : cwd;
  const parsed = ShuttleConfig.parse(applyEnvOverrides(raw, env));
  return { config: resolvePaths(parsed, baseDir), baseDir, sourcePath };
}

export function parseConfig(input: ShuttleConfigInput, baseDir: string): ShuttleConfig {
  return resolvePaths(ShuttleConfig.parse(input), baseDir);
}

/**
 * `SHUTTLE_ENGINE_TIMEOUT_MS` wins over the configured timeout when it parses; values
 * below one second are clamped up, decimals floored.
 */
export function resolveEngineTimeoutMs(configured: number | undefined, env: NodeJS.ProcessEnv = process.env): number {
  const fallback = configured ?? DEFAULT_ENGINE_TIMEOUT_MS;
  const raw = env.SHUTTLE_ENGINE_TIMEOUT_MS;
  if (!raw || !raw.trim()) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;

  const ms = Math.floor(parsed);
  if (ms < MIN_ENGINE_TIMEOUT_MS) return MIN_ENGINE_TIMEOUT_MS;
  return ms;
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isPlainObject(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };

  const bridgeUrl = env.SHUTTLE_BRIDGE_URL?.trim();
  if (bridgeUrl) {
    out.editor = { ...(isPlainObject(out.editor) ? out.editor : {}), bridgeUrl };
  }

  const executable = env.SHUTTLE_ENGINE_EXECUTABLE?.trim();
  const engine: Record<string, unknown> = { ...(isPlainObject(out.engine) ? out.engine : {}) };
  if (executable) engine.executable = executable;
  if (env.SHUTTLE_ENGINE_TIMEOUT_MS?.trim()) {
    const configured = typeof engine.timeoutMs === 'number' ? engine.timeoutMs : undefined;
    engine.timeoutMs = resolveEngineTimeoutMs(configured, env);
  }
  out.engine = engine;

  return out;
}

function resolvePaths(config: ShuttleConfig, baseDir: string): ShuttleConfig {
  const abs = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  return {
    ...config,
    stateDir: abs(config.stateDir),
    storage: {
      splines: abs(config.storage.splines),
      meshSets: abs(config.storage.meshSets),
      tables: abs(config.storage.tables),
      geometry: abs(config.storage.geometry)
    },
    engine: {
      ...config.engine,
      driverScript: config.engine.driverScript ? abs(config.engine.driverScript) : undefined,
      jobs: {
        buildings: { ...config.engine.jobs.buildings, graphFile: abs(config.engine.jobs.buildings.graphFile) },
        roads: { ...config.engine.jobs.roads, graphFile: abs(config.engine.jobs.roads.graphFile) }
      }
    }
  };
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}
