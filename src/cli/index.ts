#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { InputMode } from '../core/config/types.js';
import { isStepId, type StepId } from '../core/steps/types.js';
import { WORKFLOW_VARIANTS, type WorkflowVariant } from '../core/workflow/variants.js';
import { runDiscoverCommand } from './commands/discover.js';
import { runResolveCommand } from './commands/resolve.js';
import { runOptionsFromFlags, runRunCommand, type RunFlags } from './commands/run.js';
import { runStatusCommand } from './commands/status.js';
import { runStepsCommand } from './commands/steps.js';
import { parseIteration } from './runs.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('shuttle')
    .description('Drive the editor ↔ headless-engine content pipeline for one iteration at a time')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output and live engine output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    process.env.SHUTTLE_VERBOSE = o.verbose ? '1' : '0';
    process.env.SHUTTLE_QUIET = o.quiet ? '1' : '0';
    createRenderer({ quiet: !!o.quiet });
  });

  const variantOption = () =>
    new Option('--variant <variant>', 'Workflow variant').choices([...WORKFLOW_VARIANTS]).default('full');
  const inputModeOption = () => new Option('--input-mode <mode>', 'Engine input: mesh-driven or spline-driven').choices([...InputMode.options]);

  // ── Pipeline ─────────────────────────────────────────────────────────────

  program
    .command('run')
    .description('Run the step sequence for one iteration')
    .argument('<iteration>', 'Iteration number', parseIterationArg)
    .addOption(variantOption())
    .addOption(inputModeOption())
    .option('--only <steps...>', 'Run only these steps (others are recorded as skipped)', parseStepIds)
    .option('--continue-on-failure', 'Continue past failed optional steps')
    .option('--timeout <ms>', 'Headless Engine timeout per step', parsePositiveInt)
    .option('--config <path>', 'Config file (default: ./shuttle.yaml)')
    .action(async (iteration: number, opts: RunFlags) => {
      const res = await runRunCommand(runOptionsFromFlags(iteration, opts));
      if (res.ok) return;
      const r = getRenderer();
      if (res.summary?.cancelled) {
        r.warn('Cancelled.');
        process.exitCode = 130;
        return;
      }
      r.error('Run halted', String(res.details), `Inspect with \`shuttle status ${res.runId ?? ''}\`, fix the cause and re-run.`);
      process.exitCode = 1;
    });

  program
    .command('steps')
    .description('List the step sequence of a variant')
    .addOption(variantOption())
    .addOption(inputModeOption())
    .action((opts: { variant: WorkflowVariant; inputMode?: InputMode }) => {
      runStepsCommand({ variant: opts.variant, inputMode: opts.inputMode });
    });

  // ── Naming ───────────────────────────────────────────────────────────────

  program
    .command('resolve')
    .description('Print the path or asset name of an artifact')
    .argument('<category>', 'Artifact category')
    .argument('<iteration>', 'Iteration number')
    .argument('[piece]', 'Piece index for multi-piece categories')
    .option('--config <path>', 'Config file (default: ./shuttle.yaml)')
    .action(async (category: string, iteration: string, piece: string | undefined, opts: { config?: string }) => {
      const res = await runResolveCommand({ category, iteration, piece, configPath: opts.config });
      if (!res.ok) {
        getRenderer().error('Resolve failed', res.details);
        process.exitCode = 1;
      }
    });

  program
    .command('discover')
    .description('List existing artifacts of a category for an iteration')
    .argument('<category>', 'Artifact category')
    .argument('<iteration>', 'Iteration number')
    .option('--config <path>', 'Config file (default: ./shuttle.yaml)')
    .action(async (category: string, iteration: string, opts: { config?: string }) => {
      const res = await runDiscoverCommand({ category, iteration, configPath: opts.config });
      if (!res.ok) {
        getRenderer().error('Discover failed', res.details);
        process.exitCode = 1;
      }
    });

  // ── Observability ────────────────────────────────────────────────────────

  program
    .command('status')
    .description('Show a persisted run')
    .argument('[run-id]', 'Run id (defaults to latest)')
    .option('--tail <n>', 'Ledger tail entries', parsePositiveInt, 10)
    .option('--config <path>', 'Config file (default: ./shuttle.yaml)')
    .action(async (runId: string | undefined, opts: { tail: number; config?: string }) => {
      const res = await runStatusCommand({ runId, tail: opts.tail, configPath: opts.config });
      if (!res.ok) {
        getRenderer().error('Status failed', res.details);
        process.exitCode = 1;
      }
    });

  await program.parseAsync(argv);
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected error', err instanceof Error ? err.message : String(err), 'Run with --verbose for more details.');
  process.exitCode = 1;
});

function parseIterationArg(value: string): number {
  const n = parseIteration(value);
  if (n === null) throw new InvalidArgumentError('Iteration must be a non-negative integer.');
  return n;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function parseStepIds(value: string, previous: StepId[] | undefined): StepId[] {
  if (!isStepId(value)) throw new InvalidArgumentError(`Unknown step "${value}".`);
  return [...(previous ?? []), value];
}

function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') return parsed.version;
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}
