import { loadConfig } from '../../core/config/reader.js';
import { buildCategoryTable, isArtifactCategory } from '../../core/naming/categories.js';
import { NamingResolver } from '../../core/naming/resolver.js';
import { getRenderer } from '../ui/renderer.js';
import { parseIteration } from '../runs.js';

export interface ResolveCommandOptions {
  cwd?: string;
  configPath?: string;
  category: string;
  iteration: string;
  piece?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * `shuttle resolve <category> <iteration> [piece]` — print the path/asset/label an artifact gets.
 */
export async function runResolveCommand(opts: ResolveCommandOptions): Promise<{ ok: true; resolved: string } | { ok: false; details: string }> {
  const r = getRenderer();
  if (!isArtifactCategory(opts.category)) return { ok: false, details: `Unknown category: ${opts.category}` };
  const iteration = parseIteration(opts.iteration);
  if (iteration === null) return { ok: false, details: `Invalid iteration: ${opts.iteration}` };
  let piece: number | undefined;
  if (opts.piece !== undefined) {
    const parsed = parseIteration(opts.piece);
    if (parsed === null) return { ok: false, details: `Invalid piece index: ${opts.piece}` };
    piece = parsed;
  }

  const { config } = await loadConfig({ cwd: opts.cwd, explicitPath: opts.configPath, env: opts.env });
  const resolver = new NamingResolver(buildCategoryTable(config));
  try {
    const resolved = resolver.resolve(opts.category, iteration, piece);
    r.text(resolved);
    return { ok: true, resolved };
  } catch (err) {
    return { ok: false, details: err instanceof Error ? err.message : String(err) };
  }
}
