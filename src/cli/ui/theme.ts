import chalk, { type ChalkInstance } from 'chalk';

import type { OverallStatus, StepStatus } from '../../core/report/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  skip: chalk.dim('○'),

  // Step kinds get their own color in the step list.
  kind: (kind: 'in-session' | 'external'): ChalkInstance => (kind === 'external' ? chalk.magenta : chalk.cyan),

  status: (status: StepStatus): ChalkInstance => {
    const map: Record<StepStatus, ChalkInstance> = {
      succeeded: chalk.green,
      warned: chalk.yellow,
      failed: chalk.red,
      skipped: chalk.dim
    };
    return map[status];
  },

  overall: (status: OverallStatus): ChalkInstance => {
    const map: Record<OverallStatus, ChalkInstance> = {
      'all-success': chalk.green,
      'completed-with-warnings': chalk.yellow,
      'halted-on-failure': chalk.red
    };
    return map[status];
  }
} as const;

export function statusSymbol(status: StepStatus): string {
  switch (status) {
    case 'succeeded':
      return theme.check;
    case 'warned':
      return theme.warn;
    case 'failed':
      return theme.cross;
    case 'skipped':
      return theme.skip;
  }
}

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;

/** Column width for step ids in the step list. */
export const STEP_LABEL_WIDTH = 24;
