import type { StepResult } from '../../core/report/types.js';
import { theme, INDENT, RULE_WIDTH, STEP_LABEL_WIDTH, statusSymbol } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

export function padLeft(str: string, width: number): string {
  if (str.length >= width) return str;
  return ' '.repeat(width - str.length) + str;
}

// ── Section Banners ─────────────────────────────────────────────────────────

/**
 * A section banner:  ── Iteration 4 ────────────────────────
 */
export function sectionBanner(title: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - title.length - 1);
  return theme.dim(prefix) + theme.bold(title) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Variant     full"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Step Results ────────────────────────────────────────────────────────────

/**
 * One step result line:
 *   ✔ [3] generate-buildings        12.4s  buildings job finished in 12400ms
 */
export function stepResultLine(result: StepResult): string {
  return `${INDENT}${statusSymbol(result.status)} ${stepResultText(result)}`;
}

/** The result line without indent and status symbol; the step spinner supplies those. */
export function stepResultText(result: StepResult): string {
  const label = padRight(`[${result.ordinal}] ${result.stepId}`, STEP_LABEL_WIDTH + 4);
  const elapsed = padLeft(formatMs(result.elapsedMs), 7);
  const color = theme.status(result.status);
  return `${color(label)} ${theme.dim(elapsed)}  ${result.diagnostic}`;
}
