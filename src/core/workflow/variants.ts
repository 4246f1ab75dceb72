import type { StepId } from '../steps/types.js';

export const WORKFLOW_VARIANTS = ['full', 'buildings', 'roads'] as const;
export type WorkflowVariant = (typeof WORKFLOW_VARIANTS)[number];

const SEQUENCES: Readonly<Record<WorkflowVariant, readonly StepId[]>> = {
  full: [
    'export-splines',
    'export-genzone-meshes',
    'generate-buildings',
    'import-tables',
    'create-pcg-graph',
    'generate-roads',
    'import-road-meshes',
    'place-road-meshes'
  ],
  buildings: ['export-splines', 'export-genzone-meshes', 'generate-buildings', 'import-tables', 'create-pcg-graph'],
  roads: ['export-splines', 'export-genzone-meshes', 'generate-roads', 'import-road-meshes', 'place-road-meshes']
};

export function stepSequence(variant: WorkflowVariant): readonly StepId[] {
  return SEQUENCES[variant];
}
