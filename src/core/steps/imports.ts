import { readText } from '../../utils/fs.js';
import type { ImportFormat } from '../editor/types.js';
import type { ImportOutcome } from '../import/types.js';
import type { ArtifactCategory } from '../naming/categories.js';
import { checkTable, parseCsv } from '../payloads/csv.js';
import { joinWarnings, type StepContext, type StepDefinition, type StepExecution } from './types.js';

interface ImportPair {
  source: ArtifactCategory;
  target: ArtifactCategory;
  format: ImportFormat;
  validate?: (path: string) => Promise<string[]>;
}

async function importPairs(ctx: StepContext, pairs: readonly ImportPair[]): Promise<StepExecution> {
  const imports: ImportOutcome[] = [];
  const warnings: string[] = [];
  const done: string[] = [];

  for (const pair of pairs) {
    const [source] = await ctx.resolver.discover(pair.source, ctx.iteration);
    if (!source) {
      // Inputs are checked before the step runs; only a race with the filesystem lands here.
      return { status: 'failed', diagnostic: `${pair.source} for iteration ${ctx.iteration} vanished before import`, imports };
    }
    if (pair.validate) warnings.push(...(await pair.validate(source.ref)).map((w) => `${source.name}: ${w}`));

    const outcome = await ctx.importer.importArtifact(source.ref, pair.target, ctx.iteration, pair.format);
    imports.push(outcome);
    if (outcome.status === 'failure') {
      return {
        status: 'failed',
        diagnostic: `could not import ${source.name} into ${outcome.target}`,
        imports,
        issue: {
          kind: 'import_exhausted',
          category: pair.target,
          iteration: ctx.iteration,
          path: outcome.path,
          target: outcome.target,
          attempts: outcome.attempts
        }
      };
    }
    const how = outcome.updatedInPlace ? 'updated in place' : 'imported';
    done.push(`${source.name} ${how} via ${outcome.strategyUsed ?? 'unknown'} (${outcome.assets.length} asset(s))`);
  }

  return { status: warnings.length ? 'warned' : 'succeeded', diagnostic: joinWarnings(done.join('; '), warnings), imports };
}

async function validateTable(path: string): Promise<string[]> {
  return checkTable(parseCsv(await readText(path))).warnings;
}

const TABLE_FORMAT: ImportFormat = { kind: 'data-table', keepRowStruct: true };
const MESH_FORMAT: ImportFormat = { kind: 'static-mesh' };

export const importTables: StepDefinition = {
  id: 'import-tables',
  name: 'Import mesh and material tables',
  kind: 'in-session',
  optional: false,
  inputs: () => ['mesh-table', 'material-table'],
  outputs: () => ['mesh-table-asset', 'material-table-asset'],
  execute: (ctx) =>
    importPairs(ctx, [
      { source: 'mesh-table', target: 'mesh-table-asset', format: TABLE_FORMAT, validate: validateTable },
      { source: 'material-table', target: 'material-table-asset', format: TABLE_FORMAT, validate: validateTable }
    ])
};

export const importRoadMeshes: StepDefinition = {
  id: 'import-road-meshes',
  name: 'Import sidewalk and road meshes',
  kind: 'in-session',
  optional: false,
  inputs: () => ['sidewalk-batch', 'road-batch'],
  outputs: () => ['sidewalk-pieces', 'road-pieces'],
  execute: (ctx) =>
    importPairs(ctx, [
      { source: 'sidewalk-batch', target: 'sidewalk-pieces', format: MESH_FORMAT },
      { source: 'road-batch', target: 'road-pieces', format: MESH_FORMAT }
    ])
};
