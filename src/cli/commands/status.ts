import { loadConfig } from '../../core/config/reader.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import { readLedgerTail, readRunSummary, resolveRunId } from '../runs.js';
import { getRenderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { formatMs, keyValue, stepResultLine } from '../ui/format.js';
import type { RunSummary } from '../../core/report/types.js';

export interface StatusCommandOptions {
  cwd?: string;
  configPath?: string;
  runId?: string;
  tail?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * `shuttle status [run-id]` — reads `<stateDir>/runs/<id>/summary.json` and the ledger tail.
 */
export async function runStatusCommand(
  opts: StatusCommandOptions
): Promise<{ ok: true; runId: string; summary: RunSummary | null; entries: LedgerEntry[] } | { ok: false; details: string }> {
  const r = getRenderer();
  const { config } = await loadConfig({ cwd: opts.cwd, explicitPath: opts.configPath, env: opts.env });
  const runId = await resolveRunId(config.stateDir, opts.runId);
  if (!runId) return { ok: false, details: `No runs found under ${config.stateDir}` };

  const summary = await readRunSummary(config.stateDir, runId);
  const tailN = opts.tail ?? 10;
  const { entries, warnings } = await readLedgerTail(config.stateDir, runId, tailN);
  if (!summary && !entries.length) return { ok: false, details: `Run ${runId} has no summary or ledger` };

  // ── Header ────────────────────────────────────────────────────────────────
  r.text(`${INDENT}${theme.bold(`Run ${runId}`)}`);
  r.blank();

  if (summary) {
    const status = summary.overallStatus;
    r.text(keyValue('Iteration', String(summary.iteration)));
    r.text(keyValue('Variant', `${summary.variant} (${summary.inputMode})`));
    r.text(keyValue('State', summary.state));
    r.text(keyValue('Status', status ? theme.overall(status)(status) : theme.dim('(running)')));
    if (summary.finishedAt) {
      r.text(keyValue('Duration', formatMs(Date.parse(summary.finishedAt) - Date.parse(summary.startedAt))));
    }
    r.blank();
    r.text(`${INDENT}${theme.bold('Steps')}`);
    for (const result of summary.results) r.text(stepResultLine(result));
  } else {
    r.text(keyValue('State', theme.warning('no summary (run interrupted or still running)')));
  }
  r.blank();

  // ── Recent Events ─────────────────────────────────────────────────────────
  r.text(`${INDENT}${theme.bold('Recent Events')} ${theme.dim(`(last ${tailN})`)}`);
  for (const w of warnings) r.text(`${INDENT}  ${theme.warning('⚠')} ${w}`);
  if (!entries.length) r.text(`${INDENT}  ${theme.dim('(no events)')}`);
  for (const e of entries) {
    const detail = eventDetail(e);
    r.text(`${INDENT}  ${theme.dim(formatTimestamp(e.timestamp))}  ${e.type.padEnd(16)}${detail ? `  ${theme.dim(detail)}` : ''}`);
  }
  r.blank();

  return { ok: true, runId, summary, entries };
}

export function eventDetail(e: LedgerEntry): string {
  switch (e.type) {
    case 'run_started':
      return `iteration=${e.data.iteration} variant=${e.data.variant} mode=${e.data.inputMode}`;
    case 'step_started':
      return `${e.data.ordinal}. ${e.data.stepId}`;
    case 'step_completed':
      return `${e.data.ordinal}. ${e.data.stepId} ${e.data.status}`;
    case 'run_completed':
      return e.data.overallStatus;
    case 'run_cancelled':
      return e.data.reason ?? '';
  }
}

function formatTimestamp(iso: string): string {
  return iso.slice(11, 19);
}
