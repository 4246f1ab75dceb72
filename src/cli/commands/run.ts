import { loadConfig, resolveEngineTimeoutMs } from '../../core/config/reader.js';
import type { InputMode } from '../../core/config/types.js';
import { HttpEditorSession } from '../../core/editor/http-session.js';
import type { EditorSession } from '../../core/editor/types.js';
import { LedgerWriter } from '../../core/ledger/writer.js';
import { Orchestrator } from '../../core/orchestrator.js';
import { ExecaProcessRunner } from '../../core/process/runner.js';
import type { ProcessRunner } from '../../core/process/types.js';
import type { RunSummary } from '../../core/report/types.js';
import { selectionError } from '../../core/steps/registry.js';
import type { StepId } from '../../core/steps/types.js';
import type { WorkflowVariant } from '../../core/workflow/variants.js';
import { writeJson } from '../../utils/fs.js';
import { Logger, resolveLogLevel } from '../../utils/logger.js';
import { initRun } from '../../workspace/layout.js';
import { installCliCancellation } from '../cancel.js';
import { getRenderer } from '../ui/renderer.js';

export interface RunCommandOptions {
  cwd?: string;
  configPath?: string;
  iteration: number;
  variant?: WorkflowVariant;
  inputMode?: InputMode;
  only?: StepId[];
  continueOnFailure?: boolean;
  timeoutMs?: number;
  /** Injected in tests; defaults to the HTTP bridge from config. */
  session?: EditorSession;
  runner?: ProcessRunner;
  /** Injected in tests; defaults to SIGINT/SIGTERM handling. */
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface RunFlags {
  variant?: WorkflowVariant;
  inputMode?: InputMode;
  only?: StepId[];
  continueOnFailure?: boolean;
  timeout?: number;
  config?: string;
}

/** Maps parsed `run` flags to command options; an absent flag leaves the config value in force. */
export function runOptionsFromFlags(iteration: number, flags: RunFlags): RunCommandOptions {
  return {
    iteration,
    variant: flags.variant,
    inputMode: flags.inputMode,
    only: flags.only,
    continueOnFailure: flags.continueOnFailure ? true : undefined,
    timeoutMs: flags.timeout,
    configPath: flags.config
  };
}

export type RunCommandResult =
  | { ok: true; runId: string; summary: RunSummary; summaryPath: string }
  | { ok: false; runId?: string; summary?: RunSummary; summaryPath?: string; details: unknown };

/**
 * `shuttle run <iteration>` — one orchestrated run, persisted under `<stateDir>/runs/<id>/`.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const r = getRenderer();
  const env = opts.env ?? process.env;
  const { config } = await loadConfig({ cwd: opts.cwd, explicitPath: opts.configPath, env });
  const logger = new Logger({ level: resolveLogLevel() });

  const unselectable = selectionError(opts.variant ?? 'full', opts.only);
  if (unselectable) return { ok: false, details: unselectable };

  const paths = await initRun(config.stateDir);
  const ledger = await LedgerWriter.open(paths.ledgerPath);
  const session =
    opts.session ?? new HttpEditorSession({ bridgeUrl: config.editor.bridgeUrl, requestTimeoutMs: config.editor.requestTimeoutMs, logger });
  const runner = opts.runner ?? new ExecaProcessRunner(logger);
  const engineTimeoutMs = opts.timeoutMs ?? resolveEngineTimeoutMs(config.engine.timeoutMs, env);

  const orchestrator = new Orchestrator({
    config,
    session,
    runner,
    logger,
    hooks: {
      onRunStart: ({ runId, iteration, variant, inputMode, steps }) =>
        r.runHeader({ runId, iteration, variant, inputMode, steps: steps.length, ledgerPath: paths.ledgerPath }),
      onStepStart: ({ step, ordinal, total }) => r.stepStart({ ordinal, total, stepId: step.id, name: step.name, kind: step.kind }),
      onEngineLine: ({ stepId, line }) => r.engineLine(stepId, line),
      onStepComplete: ({ result }) => r.stepResult(result)
    }
  });

  const cancellation = opts.signal ? null : installCliCancellation({ onCancel: () => r.warn('Cancelling run…') });
  const signal = opts.signal ?? cancellation?.signal;

  let summary: RunSummary;
  try {
    summary = await orchestrator.run({
      iteration: opts.iteration,
      variant: opts.variant,
      inputMode: opts.inputMode,
      only: opts.only,
      continueOnOptionalFailure: opts.continueOnFailure,
      engineTimeoutMs,
      signal,
      runId: paths.runId,
      ledger
    });
  } finally {
    cancellation?.dispose();
  }

  await writeJson(paths.summaryPath, summary);
  r.runSummary(summary, paths.summaryPath);

  if (summary.cancelled) {
    return { ok: false, runId: paths.runId, summary, summaryPath: paths.summaryPath, details: { reason: 'cancelled' } };
  }
  if (summary.overallStatus === 'halted-on-failure') {
    const failed = summary.results.find((x) => x.status === 'failed');
    return {
      ok: false,
      runId: paths.runId,
      summary,
      summaryPath: paths.summaryPath,
      details: failed ? `step ${failed.stepId} failed: ${failed.diagnostic}` : 'run halted'
    };
  }
  return { ok: true, runId: paths.runId, summary, summaryPath: paths.summaryPath };
}
