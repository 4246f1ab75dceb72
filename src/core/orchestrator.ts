import type { InputMode, ShuttleConfig } from './config/types.js';
import type { EditorSession } from './editor/types.js';
import { EditorBridgeError } from './editor/http-session.js';
import { ImportAdapter } from './import/adapter.js';
import { strategiesFor } from './import/strategies.js';
import type { Issue } from './issues.js';
import type { LedgerWriter } from './ledger/writer.js';
import { buildCategoryTable, type ArtifactCategory } from './naming/categories.js';
import { NamingResolver } from './naming/resolver.js';
import { isIteration } from './naming/template.js';
import type { ProcessOutcome, ProcessRunner } from './process/types.js';
import { logLine, Reporter } from './report/reporter.js';
import type { ProcessRecord, RunSummary, StepResult } from './report/types.js';
import { selectionError, STEP_REGISTRY, stepsForVariant, type StepRegistry } from './steps/registry.js';
import type { StepDefinition, StepExecution, StepId } from './steps/types.js';
import type { WorkflowVariant } from './workflow/variants.js';
import { Logger, silentLogger } from '../utils/logger.js';

export interface OrchestratorHooks {
  onRunStart?: (args: { runId: string; iteration: number; variant: WorkflowVariant; inputMode: InputMode; steps: StepDefinition[] }) => void;
  onStepStart?: (args: { step: StepDefinition; ordinal: number; total: number }) => void;
  onStepComplete?: (args: { result: StepResult; snapshot: RunSummary }) => void;
  /** Live output of the Headless Engine while an external step runs. */
  onEngineLine?: (args: { stepId: StepId; line: string }) => void;
  onRunComplete?: (summary: RunSummary) => void;
}

export interface OrchestratorDeps {
  config: ShuttleConfig;
  session: EditorSession;
  runner: ProcessRunner;
  resolver?: NamingResolver;
  registry?: StepRegistry;
  logger?: Logger;
  hooks?: OrchestratorHooks;
}

export interface RunOptions {
  iteration: number;
  variant?: WorkflowVariant;
  inputMode?: InputMode;
  /** Run only these steps; the others are recorded as skipped. */
  only?: readonly StepId[];
  /** Keep going when a step marked optional fails. */
  continueOnOptionalFailure?: boolean;
  engineTimeoutMs?: number;
  signal?: AbortSignal;
  runId?: string;
  ledger?: LedgerWriter;
}

const OUTPUT_TAIL_LINES = 20;

/**
 * Runs one workflow variant for one iteration, strictly in order, against one Editor session.
 *
 * Each step's required inputs are discovered first (empty → skipped), its declared outputs
 * re-discovered after it reports success (missing → failed). The first failure halts the
 * run unless the step is optional and the run continues past optional failures.
 */
export class Orchestrator {
  private readonly resolver: NamingResolver;
  private readonly registry: StepRegistry;
  private readonly logger: Logger;
  private readonly hooks: OrchestratorHooks;
  private active = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.resolver = deps.resolver ?? new NamingResolver(buildCategoryTable(deps.config), deps.session);
    this.registry = deps.registry ?? STEP_REGISTRY;
    this.logger = deps.logger ?? silentLogger;
    this.hooks = deps.hooks ?? {};
  }

  get running(): boolean {
    return this.active;
  }

  async run(opts: RunOptions): Promise<RunSummary> {
    if (this.active) throw new Error('A run is already in progress on this orchestrator');
    this.active = true;
    try {
      return await this.execute(opts);
    } finally {
      this.active = false;
    }
  }

  private async execute(opts: RunOptions): Promise<RunSummary> {
    const { config } = this.deps;
    const iteration = opts.iteration;
    const variant = opts.variant ?? 'full';
    const inputMode = opts.inputMode ?? config.run.inputMode;
    const continueOnOptionalFailure = opts.continueOnOptionalFailure ?? config.run.continueOnOptionalFailure;
    const signal = opts.signal ?? new AbortController().signal;
    const runId = opts.runId ?? `run-${iteration}`;
    const ledger = opts.ledger;
    const logger = this.logger.child({ runId, iteration });

    if (!isIteration(iteration)) throw new Error(`Iteration must be a non-negative integer, got ${iteration}`);

    const steps = stepsForVariant(variant, this.registry);
    const unselectable = selectionError(variant, opts.only);
    if (unselectable) throw new Error(unselectable);
    const reporter = new Reporter({ runId, iteration, variant, inputMode });
    reporter.start();
    await ledger?.append({ type: 'run_started', data: { runId, iteration, variant, inputMode, steps: steps.map((s) => s.id) } });
    this.hooks.onRunStart?.({ runId, iteration, variant, inputMode, steps });
    logger.debug('run started', { variant, inputMode, steps: steps.map((s) => s.id) });

    const importer = new ImportAdapter(this.deps.session, this.resolver, strategiesFor(config.import.strategies), logger);
    let cancelled = false;

    for (const [index, step] of steps.entries()) {
      if (signal.aborted) {
        cancelled = true;
        break;
      }
      const ordinal = index + 1;
      const started = Date.now();

      let result: StepResult;
      if (opts.only && !opts.only.includes(step.id)) {
        result = this.resultOf(step, ordinal, started, { status: 'skipped', diagnostic: 'not selected for this run' });
      } else {
        result = await this.runStep(step, ordinal, steps.length, {
          iteration,
          inputMode,
          signal,
          importer,
          logger,
          engineTimeoutMs: opts.engineTimeoutMs ?? config.engine.timeoutMs,
          ledger
        });
      }

      const frozen = reporter.record(result);
      await ledger?.append({ type: 'step_completed', data: frozen });
      logger.debug(logLine(frozen));
      this.hooks.onStepComplete?.({ result: frozen, snapshot: reporter.snapshot() });

      if (frozen.status !== 'failed') continue;
      if (signal.aborted) {
        cancelled = true;
        break;
      }
      if (step.optional && continueOnOptionalFailure) {
        logger.debug('optional step failed; continuing', { stepId: step.id });
        continue;
      }
      break;
    }

    const summary = reporter.finalize({ cancelled });
    if (cancelled) {
      const reason = signal.reason instanceof Error ? signal.reason.message : typeof signal.reason === 'string' ? signal.reason : undefined;
      await ledger?.append({ type: 'run_cancelled', data: { reason } });
    }
    await ledger?.append({ type: 'run_completed', data: { overallStatus: reporter.overallStatus, counts: summary.counts } });
    logger.debug('run completed', { overallStatus: summary.overallStatus, counts: summary.counts, cancelled });
    this.hooks.onRunComplete?.(summary);
    return summary;
  }

  private async runStep(
    step: StepDefinition,
    ordinal: number,
    total: number,
    run: {
      iteration: number;
      inputMode: InputMode;
      signal: AbortSignal;
      importer: ImportAdapter;
      logger: Logger;
      engineTimeoutMs: number;
      ledger?: LedgerWriter;
    }
  ): Promise<StepResult> {
    const started = Date.now();
    const { iteration, inputMode } = run;

    try {
      for (const category of step.inputs(inputMode)) {
        const found = await this.resolver.inspect(category, iteration);
        if (found.matches.length) continue;
        const issue: Issue = found.nearMisses.length
          ? { kind: 'naming_mismatch', category, iteration, names: found.nearMisses }
          : { kind: 'discovery_empty', category, iteration, searched: found.searched, mismatches: found.mismatches };
        return this.resultOf(step, ordinal, started, {
          status: 'skipped',
          diagnostic: `required input ${category} not found${nearMissNote(found.nearMisses)}`,
          issue
        });
      }
    } catch (err) {
      return this.resultOf(step, ordinal, started, this.thrown(err, step, iteration));
    }

    await run.ledger?.append({ type: 'step_started', data: { stepId: step.id, ordinal } });
    this.hooks.onStepStart?.({ step, ordinal, total });
    run.logger.debug('step running', { stepId: step.id, ordinal });

    let exec: StepExecution;
    try {
      exec = await step.execute({
        iteration,
        inputMode,
        config: this.deps.config,
        session: this.deps.session,
        resolver: this.resolver,
        importer: run.importer,
        runner: this.deps.runner,
        engineTimeoutMs: run.engineTimeoutMs,
        signal: run.signal,
        logger: run.logger.child({ stepId: step.id }),
        onEngineLine: this.hooks.onEngineLine ? (line) => this.hooks.onEngineLine?.({ stepId: step.id, line }) : undefined
      });
    } catch (err) {
      return this.resultOf(step, ordinal, started, this.thrown(err, step, iteration));
    }

    if (exec.status === 'failed') return this.resultOf(step, ordinal, started, exec);

    const artifacts: string[] = [];
    try {
      for (const category of step.outputs(inputMode)) {
        const found = await this.resolver.inspect(category, iteration);
        if (!found.matches.length) {
          const issue: Issue = found.nearMisses.length
            ? { kind: 'naming_mismatch', category, iteration, names: found.nearMisses }
            : {
                kind: 'output_missing_after_success',
                source: step.kind === 'external' ? 'engine' : 'editor',
                category,
                iteration,
                expected: this.expectedName(category, iteration),
                searched: found.searched
              };
          return this.resultOf(step, ordinal, started, {
            ...exec,
            status: 'failed',
            diagnostic: `${exec.diagnostic}; declared output ${category} missing${nearMissNote(found.nearMisses)}`,
            issue
          });
        }
        artifacts.push(...found.matches.map((m) => m.ref));
      }
    } catch (err) {
      return this.resultOf(step, ordinal, started, this.thrown(err, step, iteration));
    }

    return this.resultOf(step, ordinal, started, exec, artifacts);
  }

  private resultOf(
    step: StepDefinition,
    ordinal: number,
    started: number,
    exec: Omit<StepExecution, 'status'> & { status: StepResult['status'] },
    artifacts: string[] = []
  ): StepResult {
    return {
      stepId: step.id,
      ordinal,
      name: step.name,
      kind: step.kind,
      optional: step.optional,
      status: exec.status,
      artifacts,
      diagnostic: exec.diagnostic,
      elapsedMs: Date.now() - started,
      issue: exec.issue,
      imports: exec.imports,
      process: exec.process ? toProcessRecord(exec.process) : undefined
    };
  }

  private thrown(err: unknown, step: StepDefinition, iteration: number): StepExecution {
    const message = err instanceof Error ? err.message : String(err);
    const operation = err instanceof EditorBridgeError ? err.command : step.id;
    return { status: 'failed', diagnostic: message, issue: { kind: 'editor_error', iteration, operation, message } };
  }

  private expectedName(category: ArtifactCategory, iteration: number): string {
    const spec = this.resolver.spec(category);
    if (spec.template.hasPiece) return spec.template.source.replace('{iteration}', String(iteration));
    return this.resolver.importName(category, iteration);
  }
}

function toProcessRecord(outcome: ProcessOutcome): ProcessRecord {
  const lines = outcome.capturedOutput.split(/\r?\n/).filter((l) => l.length > 0);
  return {
    executable: outcome.executable,
    args: outcome.args,
    exitCode: outcome.exitCode,
    timedOut: outcome.timedOut,
    aborted: outcome.aborted,
    durationMs: outcome.durationMs,
    errorLines: outcome.errorLines,
    outputTail: lines.slice(-OUTPUT_TAIL_LINES)
  };
}

function nearMissNote(names: readonly string[]): string {
  return names.length ? ` (found ${names.join(', ')} instead)` : '';
}
