import type { InputMode } from '../../core/config/types.js';
import { describeIssue } from '../../core/issues.js';
import type { RunSummary, StepResult } from '../../core/report/types.js';
import type { StepKind } from '../../core/steps/types.js';
import type { WorkflowVariant } from '../../core/workflow/variants.js';
import { theme, INDENT } from './theme.js';
import { formatMs, keyValue, sectionBanner, stepResultLine } from './format.js';
import { startStepSpinner, type StepSpinner } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

export interface RunHeaderInfo {
  runId: string;
  iteration: number;
  variant: WorkflowVariant;
  inputMode: InputMode;
  steps: number;
  ledgerPath?: string;
}

export interface StepStartInfo {
  ordinal: number;
  total: number;
  stepId: string;
  name: string;
  kind: StepKind;
}

/**
 * The Renderer is the single output coordinator for the CLI.
 * - InteractiveRenderer for rich TTY output (colors, spinners)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Run progress ──
  runHeader(info: RunHeaderInfo): void;
  stepStart(info: StepStartInfo): void;
  engineLine(stepId: string, line: string): void;
  stepResult(result: StepResult): void;
  runSummary(summary: RunSummary, summaryPath?: string): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Generic Output ──
  text(message: string): void;
  blank(): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private active: StepSpinner | null = null;

  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  runHeader(info: RunHeaderInfo): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner(`Iteration ${info.iteration}`));
    this.writeln();
    this.writeln(keyValue('Run', info.runId));
    this.writeln(keyValue('Variant', `${info.variant} (${info.steps} steps)`));
    this.writeln(keyValue('Input mode', info.inputMode));
    if (info.ledgerPath) this.writeln(keyValue('Ledger', theme.dim(info.ledgerPath)));
    this.writeln();
  }

  stepStart(info: StepStartInfo): void {
    this.active?.stop();
    const kind = theme.kind(info.kind)(info.kind);
    this.active = startStepSpinner(`[${info.ordinal}/${info.total}] ${info.name} ${theme.dim(`(${kind})`)}`);
  }

  engineLine(_stepId: string, line: string): void {
    if (process.env.SHUTTLE_VERBOSE !== '1') return;
    this.writeln(`${INDENT}${INDENT}${theme.dim(line)}`);
  }

  stepResult(result: StepResult): void {
    if (this.active) this.active.finish(result);
    else this.writeln(stepResultLine(result));
    this.active = null;
    if (result.issue && result.status !== 'succeeded') {
      this.writeln(`${INDENT}    ${theme.dim(describeIssue(result.issue))}`);
    }
    for (const imp of result.imports ?? []) {
      for (const a of imp.attempts.filter((x) => !x.ok)) {
        this.writeln(`${INDENT}    ${theme.dim(`${a.strategy}: ${a.error ?? 'failed'}`)}`);
      }
    }
  }

  runSummary(summary: RunSummary, summaryPath?: string): void {
    this.active?.stop();
    this.active = null;
    const status = summary.overallStatus ?? 'halted-on-failure';
    const { succeeded, warned, failed, skipped } = summary.counts;
    const elapsed = summary.finishedAt ? Date.parse(summary.finishedAt) - Date.parse(summary.startedAt) : 0;

    this.writeln();
    this.writeln(INDENT + sectionBanner('Summary'));
    this.writeln();
    this.writeln(keyValue('Status', theme.overall(status)(status) + (summary.cancelled ? theme.dim(' (cancelled)') : '')));
    this.writeln(keyValue('Steps', `${succeeded} ok, ${warned} warned, ${failed} failed, ${skipped} skipped`));
    this.writeln(keyValue('Duration', formatMs(elapsed)));
    if (summaryPath) this.writeln(keyValue('Summary', theme.dim(summaryPath)));
    this.writeln();
    if (status === 'halted-on-failure' && !summary.cancelled) {
      this.writeln(`${INDENT}${theme.dim(`Fix the failing step and re-run iteration ${summary.iteration}; every step runs again.`)}`);
      this.writeln();
    }
  }

  error(title: string, details: string, tip?: string): void {
    this.active?.stop();
    this.active = null;
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warn} ${theme.warning(message)}`);
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }
}

// ── Quiet Renderer ──────────────────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  runHeader(info: RunHeaderInfo): void {
    this.emit('run_start', { ...info });
  }

  stepStart(info: StepStartInfo): void {
    this.emit('step_start', { ...info });
  }

  engineLine(): void { /* no-op in quiet mode */ }

  stepResult(result: StepResult): void {
    this.emit('step_result', {
      stepId: result.stepId,
      ordinal: result.ordinal,
      status: result.status,
      elapsedMs: result.elapsedMs,
      artifacts: result.artifacts,
      diagnostic: result.diagnostic,
      issue: result.issue
    });
  }

  runSummary(summary: RunSummary, summaryPath?: string): void {
    this.emit('run_summary', {
      runId: summary.runId,
      overallStatus: summary.overallStatus,
      cancelled: summary.cancelled,
      counts: summary.counts,
      summaryPath
    });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.SHUTTLE_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
