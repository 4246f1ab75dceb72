import { describe, expect, it } from 'vitest';

import { logLine, overallStatusOf, Reporter } from '../src/core/report/reporter.js';
import type { StepResult, StepStatus } from '../src/core/report/types.js';

function result(ordinal: number, status: StepStatus, extra: Partial<StepResult> = {}): StepResult {
  return {
    stepId: 'import-tables',
    ordinal,
    name: 'Import tables',
    kind: 'in-session',
    optional: false,
    status,
    artifacts: [],
    diagnostic: `step ${ordinal}`,
    elapsedMs: 5,
    ...extra
  };
}

describe('overallStatusOf', () => {
  it('ranks failure over warnings over success', () => {
    expect(overallStatusOf([])).toBe('all-success');
    expect(overallStatusOf([result(1, 'succeeded'), result(2, 'skipped')])).toBe('all-success');
    expect(overallStatusOf([result(1, 'warned'), result(2, 'succeeded')])).toBe('completed-with-warnings');
    expect(overallStatusOf([result(1, 'warned'), result(2, 'failed')])).toBe('halted-on-failure');
  });
});

describe('Reporter', () => {
  const run = { runId: 'r-20260207-001', iteration: 2, variant: 'full', inputMode: 'mesh' } as const;

  it('refuses results before the run starts and freezes recorded ones', () => {
    const reporter = new Reporter(run);
    expect(() => reporter.record(result(1, 'succeeded'))).toThrow('Cannot record a step result while the run is pending');

    reporter.start();
    const input = result(1, 'succeeded', { artifacts: ['a.csv'] });
    const stored = reporter.record(input);
    input.artifacts.push('b.csv');

    expect(stored.artifacts).toEqual(['a.csv']);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.artifacts)).toBe(true);
    expect(() => reporter.start()).toThrow('Run r-20260207-001 already running');
  });

  it('summarizes counts, log lines and the final status', () => {
    const reporter = new Reporter(run);
    reporter.start();
    reporter.record(result(1, 'succeeded'));
    reporter.record(
      result(2, 'skipped', {
        issue: {
          kind: 'discovery_empty',
          category: 'spline-actors',
          iteration: 2,
          searched: 'current level',
          mismatches: []
        }
      })
    );
    reporter.record(result(3, 'warned'));
    expect(reporter.snapshot().overallStatus).toBeNull();

    const summary = reporter.finalize();
    expect(summary.state).toBe('completed');
    expect(summary.overallStatus).toBe('completed-with-warnings');
    expect(summary.counts).toEqual({ succeeded: 1, warned: 1, failed: 0, skipped: 1 });
    expect(summary.log).toEqual([
      '[1] import-tables SUCCEEDED (5ms): step 1',
      '[2] import-tables SKIPPED (5ms): no spline-actors found for iteration 2 in current level',
      '[3] import-tables WARNED (5ms): step 3'
    ]);
    expect(summary.finishedAt).not.toBeNull();
  });

  it('reports a cancelled run as halted', () => {
    const reporter = new Reporter(run);
    reporter.start();
    reporter.record(result(1, 'succeeded'));
    const summary = reporter.finalize({ cancelled: true });
    expect(summary.cancelled).toBe(true);
    expect(summary.overallStatus).toBe('halted-on-failure');
  });

  it('renders a bare log line when there is no diagnostic', () => {
    expect(logLine(result(4, 'failed', { diagnostic: '', elapsedMs: 12 }))).toBe('[4] import-tables FAILED (12ms)');
  });
});
