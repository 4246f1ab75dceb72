import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { listDir } from '../utils/fs.js';
import { nextRunId, parseRunId } from '../utils/id.js';

export interface RunPaths {
  stateDir: string;
  runId: string;
  runDir: string;
  ledgerPath: string;
  summaryPath: string;
}

export function getRunsDir(stateDir: string): string {
  return join(stateDir, 'runs');
}

export function getRunPaths(stateDir: string, runId: string): RunPaths {
  const runDir = join(getRunsDir(stateDir), runId);
  return {
    stateDir,
    runId,
    runDir,
    ledgerPath: join(runDir, 'ledger.jsonl'),
    summaryPath: join(runDir, 'summary.json')
  };
}

/** Run ids present under the state dir, oldest first. */
export async function listRunIds(stateDir: string): Promise<string[]> {
  const entries = await listDir(getRunsDir(stateDir));
  return entries.filter((e) => parseRunId(e) !== null).sort();
}

export async function initRun(stateDir: string, now: Date = new Date()): Promise<RunPaths> {
  const runId = nextRunId(await listRunIds(stateDir), now);
  const paths = getRunPaths(stateDir, runId);
  await mkdir(paths.runDir, { recursive: true });
  return paths;
}
