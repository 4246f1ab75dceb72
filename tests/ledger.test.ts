import { describe, expect, it } from 'vitest';
import { appendFile, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { LedgerReader } from '../src/core/ledger/reader.js';
import { LedgerWriter } from '../src/core/ledger/writer.js';

describe('ledger', () => {
  it('appends JSONL entries with monotonic seq and verifies integrity', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shuttle-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const writer = await LedgerWriter.open(ledgerPath);
    const e1 = await writer.append({
      type: 'run_started',
      data: { runId: 'r-20260207-001', iteration: 2, variant: 'buildings', inputMode: 'mesh', steps: ['generate-buildings'] }
    });
    const e2 = await writer.append({ type: 'step_started', data: { stepId: 'generate-buildings', ordinal: 1 } });

    expect(e1.seq).toBe(1);
    expect(e2.seq).toBe(2);
    expect(e1.timestamp).toMatch(/Z$/);

    const reader = new LedgerReader(ledgerPath);
    const all = await reader.readAll();
    expect(all).toHaveLength(2);
    expect((await reader.findByType('step_started')).map((e) => e.seq)).toEqual([2]);

    const integrity = await reader.verifyIntegrity();
    expect(integrity.ok).toBe(true);
  });

  it('continues the sequence when reopened after a partial write', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shuttle-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const first = await LedgerWriter.open(ledgerPath);
    await first.append({ type: 'run_cancelled', data: { signal: 'SIGINT' } });
    await appendFile(ledgerPath, '{"seq":2,"timest', 'utf8');

    const second = await LedgerWriter.open(ledgerPath);
    const entry = await second.append({ type: 'run_cancelled', data: { reason: 'again' } });
    expect(entry.seq).toBe(2);
  });

  it('rejects events that do not fit their schema', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shuttle-ledger-'));
    const writer = await LedgerWriter.open(join(dir, 'ledger.jsonl'));
    await expect(writer.append({ type: 'step_started', data: { stepId: 'generate-buildings', ordinal: 0 } })).rejects.toThrow();
  });

  it('detects sequence gaps', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'shuttle-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    await writeFile(
      ledgerPath,
      `${JSON.stringify({ seq: 1, timestamp: new Date().toISOString(), type: 'run_cancelled', data: {} })}\n` +
        `${JSON.stringify({ seq: 3, timestamp: new Date().toISOString(), type: 'run_cancelled', data: {} })}\n`,
      'utf8'
    );

    const reader = new LedgerReader(ledgerPath);
    const res = await reader.verifyIntegrity();
    expect(res).toEqual({ ok: false, message: 'Sequence gap at index 1 (expected seq=2, got 3)' });
  });
});
