import { loadConfig } from '../../core/config/reader.js';
import { HttpEditorSession } from '../../core/editor/http-session.js';
import type { EditorSession } from '../../core/editor/types.js';
import { buildCategoryTable, isArtifactCategory } from '../../core/naming/categories.js';
import { NamingResolver, type Inspection } from '../../core/naming/resolver.js';
import { getRenderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { parseIteration } from '../runs.js';

export interface DiscoverCommandOptions {
  cwd?: string;
  configPath?: string;
  category: string;
  iteration: string;
  session?: EditorSession;
  env?: NodeJS.ProcessEnv;
}

/**
 * `shuttle discover <category> <iteration>` — list what exists, plus names rejected by
 * strict iteration matching.
 */
export async function runDiscoverCommand(
  opts: DiscoverCommandOptions
): Promise<{ ok: true; inspection: Inspection } | { ok: false; details: string }> {
  const r = getRenderer();
  if (!isArtifactCategory(opts.category)) return { ok: false, details: `Unknown category: ${opts.category}` };
  const iteration = parseIteration(opts.iteration);
  if (iteration === null) return { ok: false, details: `Invalid iteration: ${opts.iteration}` };

  const { config } = await loadConfig({ cwd: opts.cwd, explicitPath: opts.configPath, env: opts.env });
  const table = buildCategoryTable(config);
  const needsEditor = table[opts.category].location.kind !== 'filesystem';
  const session =
    opts.session ??
    (needsEditor ? new HttpEditorSession({ bridgeUrl: config.editor.bridgeUrl, requestTimeoutMs: config.editor.requestTimeoutMs }) : null);

  let inspection: Inspection;
  try {
    inspection = await new NamingResolver(table, session).inspect(opts.category, iteration);
  } catch (err) {
    return { ok: false, details: err instanceof Error ? err.message : String(err) };
  }

  r.text(`${INDENT}${theme.bold(opts.category)} ${theme.dim(`iteration ${iteration} in ${inspection.searched}`)}`);
  if (!inspection.matches.length) r.text(`${INDENT}  ${theme.dim('(nothing found)')}`);
  for (const m of inspection.matches) {
    const piece = m.piece !== null ? theme.dim(` piece ${m.piece}`) : '';
    r.text(`${INDENT}  ${theme.check} ${m.ref}${piece}`);
  }
  for (const name of inspection.mismatches) {
    r.text(`${INDENT}  ${theme.cross} ${name} ${theme.dim('(iteration does not match)')}`);
  }
  return { ok: true, inspection };
}
