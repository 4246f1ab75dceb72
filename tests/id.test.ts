import { describe, expect, it } from 'vitest';

import { nextRunId, parseRunId } from '../src/utils/id.js';

describe('run id', () => {
  it('generates sortable ids with YYYYMMDD-NNN', () => {
    const now = new Date('2026-02-07T00:00:00Z');
    const id1 = nextRunId([], now);
    const id2 = nextRunId([id1], now);

    expect(id1).toBe('r-20260207-001');
    expect(parseRunId(id2)).toEqual({ yyyyMMdd: '20260207', nnn: '002' });
  });

  it('restarts the sequence on a new day and ignores foreign names', () => {
    const next = nextRunId(['r-20260206-009', 'notes', 'r-20260207-003'], new Date('2026-02-07T23:59:00Z'));
    expect(next).toBe('r-20260207-004');
    expect(nextRunId(['r-20260206-009'], new Date('2026-02-07T00:00:00Z'))).toBe('r-20260207-001');
  });

  it('rejects malformed ids', () => {
    expect(parseRunId('r-2026020-001')).toBeNull();
    expect(parseRunId('job-20260207-001')).toBeNull();
  });
});
