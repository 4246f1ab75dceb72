import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoException } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput } from './types.js';

export class LedgerWriter {
  private nextSeq: number;
  private ledgerPath: string;

  private constructor(ledgerPath: string, nextSeq: number) {
    this.ledgerPath = ledgerPath;
    this.nextSeq = nextSeq;
  }

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });

    const nextSeq = await computeNextSeq(ledgerPath);
    return new LedgerWriter(ledgerPath, nextSeq);
  }

  get path(): string {
    return this.ledgerPath;
  }

  async append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry: LedgerEntry = LedgerEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });

    // One JSON object per line (JSONL). Append-only.
    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }
}

async function computeNextSeq(ledgerPath: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return 1;
    throw err;
  }

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // A trailing partial line (crash mid-write) is skipped.
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = seqOf(lines[i] ?? '');
    if (seq !== null) return seq + 1;
  }
  return 1;
}

function seqOf(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
      return parsed.seq;
    }
    return null;
  } catch {
    return null;
  }
}
