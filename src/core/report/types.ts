import { z } from 'zod';

import { InputMode } from '../config/types.js';
import { ImportAttempt, Issue } from '../issues.js';
import { STEP_IDS } from '../steps/types.js';
import { WORKFLOW_VARIANTS } from '../workflow/variants.js';

export const StepStatus = z.enum(['succeeded', 'warned', 'failed', 'skipped']);
export type StepStatus = z.infer<typeof StepStatus>;

export const OverallStatus = z.enum(['all-success', 'completed-with-warnings', 'halted-on-failure']);
export type OverallStatus = z.infer<typeof OverallStatus>;

export const RunState = z.enum(['pending', 'running', 'completed']);
export type RunState = z.infer<typeof RunState>;

export const ImportRecord = z.object({
  status: z.enum(['success', 'failure']),
  strategyUsed: z.string().nullable(),
  attempts: z.array(ImportAttempt),
  assets: z.array(z.string()),
  updatedInPlace: z.boolean(),
  path: z.string(),
  target: z.string()
});
export type ImportRecord = z.infer<typeof ImportRecord>;

export const ProcessRecord = z.object({
  executable: z.string(),
  args: z.array(z.string()),
  exitCode: z.number().nullable(),
  timedOut: z.boolean(),
  aborted: z.boolean(),
  durationMs: z.number(),
  errorLines: z.array(z.string()),
  /** Last lines of the captured output. */
  outputTail: z.array(z.string())
});
export type ProcessRecord = z.infer<typeof ProcessRecord>;

export const StepResult = z.object({
  stepId: z.enum(STEP_IDS),
  ordinal: z.number().int().positive(),
  name: z.string(),
  kind: z.enum(['in-session', 'external']),
  optional: z.boolean(),
  status: StepStatus,
  /** Output artifacts actually observed after the step. */
  artifacts: z.array(z.string()),
  diagnostic: z.string(),
  elapsedMs: z.number().nonnegative(),
  issue: Issue.optional(),
  imports: z.array(ImportRecord).optional(),
  process: ProcessRecord.optional()
});
export type StepResult = z.infer<typeof StepResult>;

export const StepCounts = z.object({
  succeeded: z.number().int().nonnegative(),
  warned: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative()
});
export type StepCounts = z.infer<typeof StepCounts>;

export const RunSummary = z.object({
  runId: z.string(),
  iteration: z.number().int().nonnegative(),
  variant: z.enum(WORKFLOW_VARIANTS),
  inputMode: InputMode,
  state: RunState,
  overallStatus: OverallStatus.nullable(),
  /** Set when the run stopped because it was cancelled. */
  cancelled: z.boolean(),
  counts: StepCounts,
  results: z.array(StepResult),
  log: z.array(z.string()),
  startedAt: z.string(),
  finishedAt: z.string().nullable()
});
export type RunSummary = z.infer<typeof RunSummary>;
