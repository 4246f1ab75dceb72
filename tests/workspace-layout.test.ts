import { describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { getRunPaths, initRun, listRunIds } from '../src/workspace/layout.js';

describe('workspace layout', () => {
  it('places ledger and summary inside the run folder', () => {
    const paths = getRunPaths('/work/.shuttle', 'r-20260207-001');
    expect(paths.runDir).toBe(join('/work/.shuttle', 'runs', 'r-20260207-001'));
    expect(paths.ledgerPath).toBe(join(paths.runDir, 'ledger.jsonl'));
    expect(paths.summaryPath).toBe(join(paths.runDir, 'summary.json'));
  });

  it('creates numbered run folders and lists them in order', async () => {
    const stateDir = await mkdtemp(join(tmpdir(), 'shuttle-ws-'));
    expect(await listRunIds(stateDir)).toEqual([]);

    const now = new Date('2026-02-07T10:00:00Z');
    const first = await initRun(stateDir, now);
    const second = await initRun(stateDir, now);
    await mkdir(join(stateDir, 'runs', 'scratch'));

    expect(first.runId).toBe('r-20260207-001');
    expect(second.runId).toBe('r-20260207-002');
    expect((await stat(second.runDir)).isDirectory()).toBe(true);
    expect(await listRunIds(stateDir)).toEqual(['r-20260207-001', 'r-20260207-002']);
  });
});
