import { join } from 'node:path';

import type { EngineJobConfig, InputMode, ShuttleConfig } from '../config/types.js';
import type { ArtifactCategory } from '../naming/categories.js';
import type { NamingResolver } from '../naming/resolver.js';
import { templatePrefix } from '../naming/template.js';

export type EngineJobId = 'buildings' | 'roads';

export interface EngineJobOutput {
  category: ArtifactCategory;
  flag: string;
}

export interface EngineJobDefinition {
  id: EngineJobId;
  outputs: readonly EngineJobOutput[];
}

export const ENGINE_JOBS: Readonly<Record<EngineJobId, EngineJobDefinition>> = {
  buildings: {
    id: 'buildings',
    outputs: [
      { category: 'mesh-table', flag: '--rop_pcg_export1_mesh_path' },
      { category: 'material-table', flag: '--rop_pcg_export1_mat_path' }
    ]
  },
  roads: {
    id: 'roads',
    outputs: [
      { category: 'sidewalk-batch', flag: '--rop_fbx_sidewalks_path' },
      { category: 'road-batch', flag: '--rop_fbx_road_path' }
    ]
  }
};

export interface EngineInvocation {
  executable: string;
  args: string[];
  /** Directory the outputs land in; created before launch. */
  outputDir: string;
  /** Resolved output path per declared category. */
  outputs: Array<{ category: ArtifactCategory; path: string }>;
}

export function inputCategoryFor(mode: InputMode): ArtifactCategory {
  return mode === 'mesh' ? 'export-mesh-set' : 'spline-description';
}

/**
 * Build the argument list for one engine job.
 *
 * Layout: `[driver] --hip <graph> --topnet <net> --iteration_number N --switch_bool 0|1
 * [--base_path p] [--file1_path p] <per-output flag> <path>...`
 *
 * `--base_path` is the spline description path without iteration and extension; the graph
 * appends both itself.
 */
export function buildEngineInvocation(args: {
  job: EngineJobId;
  iteration: number;
  inputMode: InputMode;
  engine: ShuttleConfig['engine'];
  resolver: NamingResolver;
  /** Which input files actually exist; absent ones are not passed. */
  available: { splines: boolean; meshSet: boolean };
}): EngineInvocation {
  const def = ENGINE_JOBS[args.job];
  const jobConfig: EngineJobConfig = args.engine.jobs[args.job];
  const { resolver, iteration } = args;

  const outputs = def.outputs.map((o) => ({ category: o.category, flag: o.flag, path: resolver.resolve(o.category, iteration) }));
  const first = outputs[0];
  if (!first) throw new Error(`Engine job ${args.job} declares no outputs`);
  const spec = resolver.spec(first.category);
  if (spec.location.kind !== 'filesystem') throw new Error(`Engine output ${first.category} must live on the filesystem`);
  const outputDir = spec.location.dir;

  const argv: string[] = [];
  if (args.engine.driverScript) argv.push(args.engine.driverScript);
  argv.push('--hip', jobConfig.graphFile);
  argv.push('--topnet', jobConfig.topnet);
  argv.push('--iteration_number', String(iteration));
  argv.push('--switch_bool', args.inputMode === 'mesh' ? '1' : '0');
  if (args.available.splines) argv.push('--base_path', splinesBasePath(resolver));
  if (args.available.meshSet) argv.push('--file1_path', resolver.resolve('export-mesh-set', iteration));
  for (const o of outputs) argv.push(o.flag, o.path);

  return {
    executable: args.engine.executable,
    args: argv,
    outputDir,
    outputs: outputs.map(({ category, path }) => ({ category, path }))
  };
}

function splinesBasePath(resolver: NamingResolver): string {
  const spec = resolver.spec('spline-description');
  if (spec.location.kind !== 'filesystem') throw new Error('spline-description must live on the filesystem');
  return join(spec.location.dir, templatePrefix(spec.template));
}
