import { z } from 'zod';

import { InputMode } from '../config/types.js';
import { OverallStatus, StepCounts, StepResult } from '../report/types.js';
import { STEP_IDS } from '../steps/types.js';
import { WORKFLOW_VARIANTS } from '../workflow/variants.js';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

const Envelope = {
  seq: z.number().int().positive(),
  timestamp: TimestampIso
};

export const RunStartedEvent = z.object({
  ...Envelope,
  type: z.literal('run_started'),
  data: z.object({
    runId: z.string(),
    iteration: z.number().int().nonnegative(),
    variant: z.enum(WORKFLOW_VARIANTS),
    inputMode: InputMode,
    steps: z.array(z.enum(STEP_IDS))
  })
});

export const StepStartedEvent = z.object({
  ...Envelope,
  type: z.literal('step_started'),
  data: z.object({
    stepId: z.enum(STEP_IDS),
    ordinal: z.number().int().positive()
  })
});

export const StepCompletedEvent = z.object({
  ...Envelope,
  type: z.literal('step_completed'),
  data: StepResult
});

export const RunCompletedEvent = z.object({
  ...Envelope,
  type: z.literal('run_completed'),
  data: z.object({
    overallStatus: OverallStatus,
    counts: StepCounts
  })
});

export const RunCancelledEvent = z.object({
  ...Envelope,
  type: z.literal('run_cancelled'),
  data: z.object({
    signal: z.string().optional(),
    reason: z.string().optional()
  })
});

export const LedgerEntrySchema = z.discriminatedUnion('type', [
  RunStartedEvent,
  StepStartedEvent,
  StepCompletedEvent,
  RunCompletedEvent,
  RunCancelledEvent
]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
export type LedgerEventType = LedgerEntry['type'];

type WithoutEnvelope<T> = T extends unknown ? Omit<T, 'seq' | 'timestamp'> : never;
export type LedgerEntryInput = WithoutEnvelope<LedgerEntry>;
