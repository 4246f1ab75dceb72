import { fileExists, readJson } from '../utils/fs.js';
import { LedgerReader } from '../core/ledger/reader.js';
import type { LedgerEntry } from '../core/ledger/types.js';
import { RunSummary } from '../core/report/types.js';
import { getRunPaths, listRunIds } from '../workspace/layout.js';

/**
 * Helpers for CLI commands that read `<stateDir>/runs/`.
 */
export async function resolveRunId(stateDir: string, explicit?: string): Promise<string | null> {
  if (explicit) return explicit;
  const ids = await listRunIds(stateDir);
  return ids.at(-1) ?? null;
}

export async function readRunSummary(stateDir: string, runId: string): Promise<RunSummary | null> {
  const { summaryPath } = getRunPaths(stateDir, runId);
  if (!(await fileExists(summaryPath))) return null;
  return RunSummary.parse(await readJson(summaryPath));
}

export async function readLedgerTail(
  stateDir: string,
  runId: string,
  n: number
): Promise<{ entries: LedgerEntry[]; warnings: string[] }> {
  const reader = new LedgerReader(getRunPaths(stateDir, runId).ledgerPath);
  const { entries, warnings } = await reader.readAllSafe();
  return { entries: entries.slice(Math.max(0, entries.length - n)), warnings };
}

/** Strict decimal parse; `07`, `-1`, `1.5` and `abc` are rejected. */
export function parseIteration(raw: string): number | null {
  if (!/^(0|[1-9]\d*)$/.test(raw.trim())) return null;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) ? n : null;
}
