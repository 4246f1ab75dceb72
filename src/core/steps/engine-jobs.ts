import { ensureDir, removeFiles } from '../../utils/fs.js';
import { buildEngineInvocation, inputCategoryFor, type EngineJobDefinition, ENGINE_JOBS } from '../engine/invocation.js';
import { describeProcessFailure, processSucceeded } from '../process/types.js';
import { joinWarnings, type StepContext, type StepDefinition, type StepExecution } from './types.js';

async function runEngineJob(ctx: StepContext, job: EngineJobDefinition): Promise<StepExecution> {
  const { resolver, iteration } = ctx;
  const available = {
    splines: (await resolver.discover('spline-description', iteration)).length > 0,
    meshSet: (await resolver.discover('export-mesh-set', iteration)).length > 0
  };
  const invocation = buildEngineInvocation({
    job: job.id,
    iteration,
    inputMode: ctx.inputMode,
    engine: ctx.config.engine,
    resolver,
    available
  });
  const outputPaths = invocation.outputs.map((o) => o.path);

  // Same-iteration outputs are overwritten, never left next to fresh ones.
  await removeFiles(outputPaths);
  await ensureDir(invocation.outputDir);

  ctx.logger.info(`engine job ${job.id} starting`, { iteration, executable: invocation.executable });
  const outcome = await ctx.runner.invoke(invocation.executable, invocation.args, {
    timeoutMs: ctx.engineTimeoutMs,
    signal: ctx.signal,
    onLine: ctx.onEngineLine
  });

  if (!processSucceeded(outcome)) {
    await removeFiles(outputPaths);
    const detail = describeProcessFailure(outcome);
    return {
      status: 'failed',
      diagnostic: joinWarnings(detail, outcome.errorLines.slice(0, 3)),
      process: outcome,
      issue: {
        kind: 'external_tool_failure',
        iteration,
        executable: invocation.executable,
        args: invocation.args,
        exitCode: outcome.exitCode,
        timedOut: outcome.timedOut,
        aborted: outcome.aborted,
        detail
      }
    };
  }

  const base = `${job.id} job finished in ${outcome.durationMs}ms`;
  if (outcome.errorLines.length) {
    return {
      status: 'warned',
      diagnostic: joinWarnings(`${base}; engine logged ${outcome.errorLines.length} error line(s)`, outcome.errorLines.slice(0, 3)),
      process: outcome
    };
  }
  return { status: 'succeeded', diagnostic: base, process: outcome };
}

export const generateBuildings: StepDefinition = {
  id: 'generate-buildings',
  name: 'Generate buildings (engine)',
  kind: 'external',
  optional: false,
  inputs: (mode) => [inputCategoryFor(mode)],
  outputs: () => ENGINE_JOBS.buildings.outputs.map((o) => o.category),
  execute: (ctx) => runEngineJob(ctx, ENGINE_JOBS.buildings)
};

export const generateRoads: StepDefinition = {
  id: 'generate-roads',
  name: 'Generate sidewalks and roads (engine)',
  kind: 'external',
  optional: false,
  inputs: (mode) => [inputCategoryFor(mode)],
  outputs: () => ENGINE_JOBS.roads.outputs.map((o) => o.category),
  execute: (ctx) => runEngineJob(ctx, ENGINE_JOBS.roads)
};
