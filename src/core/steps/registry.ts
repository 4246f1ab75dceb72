import type { WorkflowVariant } from '../workflow/variants.js';
import { stepSequence } from '../workflow/variants.js';
import { createPcgGraph } from './create-pcg-graph.js';
import { generateBuildings, generateRoads } from './engine-jobs.js';
import { exportGenzoneMeshes } from './export-genzone-meshes.js';
import { exportSplines } from './export-splines.js';
import { importRoadMeshes, importTables } from './imports.js';
import { placeRoadMeshes } from './place-road-meshes.js';
import type { StepDefinition, StepId } from './types.js';

export type StepRegistry = Readonly<Record<StepId, StepDefinition>>;

export const STEP_REGISTRY: StepRegistry = {
  'export-splines': exportSplines,
  'export-genzone-meshes': exportGenzoneMeshes,
  'generate-buildings': generateBuildings,
  'import-tables': importTables,
  'create-pcg-graph': createPcgGraph,
  'generate-roads': generateRoads,
  'import-road-meshes': importRoadMeshes,
  'place-road-meshes': placeRoadMeshes
};

export function stepsForVariant(variant: WorkflowVariant, registry: StepRegistry = STEP_REGISTRY): StepDefinition[] {
  return stepSequence(variant).map((id) => registry[id]);
}

/** Why a step selection cannot run under the variant, or null when every id belongs to it. */
export function selectionError(variant: WorkflowVariant, only: readonly StepId[] | undefined): string | null {
  const sequence = stepSequence(variant);
  const outside = only?.filter((id) => !sequence.includes(id)) ?? [];
  if (!outside.length) return null;
  return `Step(s) ${outside.join(', ')} are not part of the ${variant} workflow (${sequence.join(', ')})`;
}
