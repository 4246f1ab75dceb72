import type { InputMode } from '../config/types.js';
import { describeIssue } from '../issues.js';
import type { WorkflowVariant } from '../workflow/variants.js';
import type { OverallStatus, RunState, RunSummary, StepCounts, StepResult } from './types.js';

export function overallStatusOf(results: readonly StepResult[]): OverallStatus {
  if (results.some((r) => r.status === 'failed')) return 'halted-on-failure';
  if (results.some((r) => r.status === 'warned')) return 'completed-with-warnings';
  return 'all-success';
}

export function countResults(results: readonly StepResult[]): StepCounts {
  const counts: StepCounts = { succeeded: 0, warned: 0, failed: 0, skipped: 0 };
  for (const r of results) counts[r.status] += 1;
  return counts;
}

/** One log line per step; a projection of the result, never a separate source. */
export function logLine(r: StepResult): string {
  const head = `[${r.ordinal}] ${r.stepId} ${r.status.toUpperCase()} (${r.elapsedMs}ms)`;
  const detail = r.issue ? describeIssue(r.issue) : r.diagnostic;
  return detail ? `${head}: ${detail}` : head;
}

/**
 * Owns the StepResults of one run. Results are frozen on record; `snapshot` can be taken
 * at any point for incremental progress.
 */
export class Reporter {
  private readonly results: StepResult[] = [];
  private state: RunState = 'pending';
  private finishedAt: string | null = null;
  private overall: OverallStatus | null = null;
  private cancelled = false;
  private readonly startedAt = new Date().toISOString();

  constructor(
    private readonly run: { runId: string; iteration: number; variant: WorkflowVariant; inputMode: InputMode }
  ) {}

  start(): void {
    if (this.state !== 'pending') throw new Error(`Run ${this.run.runId} already ${this.state}`);
    this.state = 'running';
  }

  record(result: StepResult): StepResult {
    if (this.state !== 'running') throw new Error(`Cannot record a step result while the run is ${this.state}`);
    const frozen = deepFreeze(structuredClone(result));
    this.results.push(frozen);
    return frozen;
  }

  /** Overall status as of now; final once the run is completed. */
  get overallStatus(): OverallStatus {
    return this.overall ?? overallStatusOf(this.results);
  }

  snapshot(): RunSummary {
    return {
      ...this.run,
      state: this.state,
      overallStatus: this.overall,
      cancelled: this.cancelled,
      counts: countResults(this.results),
      results: [...this.results],
      log: this.results.map(logLine),
      startedAt: this.startedAt,
      finishedAt: this.finishedAt
    };
  }

  finalize(opts: { cancelled?: boolean } = {}): RunSummary {
    if (this.state === 'completed') return this.snapshot();
    this.state = 'completed';
    this.cancelled = opts.cancelled === true;
    this.overall = this.cancelled ? 'halted-on-failure' : overallStatusOf(this.results);
    this.finishedAt = new Date().toISOString();
    return this.snapshot();
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}
