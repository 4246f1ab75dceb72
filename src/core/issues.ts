import { z } from 'zod';

import { ARTIFACT_CATEGORIES } from './naming/categories.js';

export const ImportAttempt = z.object({
  strategy: z.string(),
  ok: z.boolean(),
  error: z.string().optional()
});
export type ImportAttempt = z.infer<typeof ImportAttempt>;

const Category = z.enum(ARTIFACT_CATEGORIES);

export const Issue = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('discovery_empty'),
    category: Category,
    iteration: z.number(),
    searched: z.string(),
    /** Items rejected by strict iteration matching. */
    mismatches: z.array(z.string())
  }),
  z.object({
    kind: z.literal('external_tool_failure'),
    iteration: z.number(),
    executable: z.string(),
    args: z.array(z.string()),
    exitCode: z.number().nullable(),
    timedOut: z.boolean(),
    aborted: z.boolean(),
    detail: z.string()
  }),
  z.object({
    kind: z.literal('output_missing_after_success'),
    source: z.enum(['engine', 'editor']),
    category: Category,
    iteration: z.number(),
    expected: z.string(),
    searched: z.string()
  }),
  z.object({
    kind: z.literal('import_exhausted'),
    category: Category,
    iteration: z.number(),
    path: z.string(),
    target: z.string(),
    attempts: z.array(ImportAttempt)
  }),
  z.object({
    kind: z.literal('naming_mismatch'),
    category: Category,
    iteration: z.number(),
    names: z.array(z.string())
  }),
  z.object({
    kind: z.literal('editor_error'),
    iteration: z.number(),
    operation: z.string(),
    message: z.string()
  })
]);
export type Issue = z.infer<typeof Issue>;

export type IssueKind = Issue['kind'];

export function describeIssue(issue: Issue): string {
  switch (issue.kind) {
    case 'discovery_empty': {
      const base = `no ${issue.category} found for iteration ${issue.iteration} in ${issue.searched}`;
      if (!issue.mismatches.length) return base;
      return `${base}; rejected by iteration match: ${issue.mismatches.join(', ')}`;
    }
    case 'external_tool_failure':
      return `${issue.detail} (iteration ${issue.iteration}): ${[issue.executable, ...issue.args].join(' ')}`;
    case 'output_missing_after_success':
      return `${issue.source} reported success but ${issue.category} for iteration ${issue.iteration} is missing (expected ${issue.expected} in ${issue.searched})`;
    case 'import_exhausted': {
      const tried = issue.attempts.map((a) => `${a.strategy}: ${a.error ?? 'failed'}`).join('; ');
      return `every import strategy failed for ${issue.path} -> ${issue.target} (${tried || 'no strategies configured'})`;
    }
    case 'naming_mismatch':
      return `${issue.category} items with the wrong iteration for ${issue.iteration}: ${issue.names.join(', ')}`;
    case 'editor_error':
      return `editor call ${issue.operation} failed (iteration ${issue.iteration}): ${issue.message}`;
  }
}
