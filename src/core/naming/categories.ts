import type { ShuttleConfig } from '../config/types.js';
import { compileTemplate, type CompiledTemplate } from './template.js';

export const ARTIFACT_CATEGORIES = [
  'spline-actors',
  'genzone-actors',
  'spline-description',
  'export-mesh-set',
  'genzone-transforms',
  'mesh-table',
  'material-table',
  'sidewalk-batch',
  'road-batch',
  'mesh-table-asset',
  'material-table-asset',
  'sidewalk-pieces',
  'road-pieces',
  'pcg-graph-asset',
  'pcg-graph-actor',
  'placed-sidewalks',
  'placed-roads'
] as const;

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

export type Direction = 'editor-to-engine' | 'engine-to-editor' | 'editor-internal';

export type ArtifactLocation =
  | { kind: 'filesystem'; dir: string }
  | { kind: 'assets'; folder: string }
  | {
      kind: 'level';
      /** Only actors of this class are considered. */
      className?: string;
      /** Also match the actor's static mesh name, not only its label. */
      matchMeshName?: boolean;
    };

export interface CategorySpec {
  id: ArtifactCategory;
  description: string;
  direction: Direction;
  location: ArtifactLocation;
  template: CompiledTemplate;
  /** Base name an import targets; pieces the Editor splits it into follow `template`. */
  importAs?: CompiledTemplate;
}

export type CategoryTable = Readonly<Record<ArtifactCategory, CategorySpec>>;

export function isArtifactCategory(value: string): value is ArtifactCategory {
  return ARTIFACT_CATEGORIES.some((c) => c === value);
}

export function buildCategoryTable(config: ShuttleConfig): CategoryTable {
  const { storage, assets, level } = config;
  const fs = (dir: string): ArtifactLocation => ({ kind: 'filesystem', dir });
  const folder = (f: string): ArtifactLocation => ({ kind: 'assets', folder: f });

  const entry = (
    id: ArtifactCategory,
    description: string,
    direction: Direction,
    location: ArtifactLocation,
    template: string,
    importAs?: string
  ): CategorySpec => ({
    id,
    description,
    direction,
    location,
    template: compileTemplate(template),
    importAs: importAs ? compileTemplate(importAs) : undefined
  });

  return {
    'spline-actors': entry(
      'spline-actors',
      'spline actors in the level',
      'editor-internal',
      { kind: 'level' },
      `${level.splineActorPrefix}*`
    ),
    'genzone-actors': entry(
      'genzone-actors',
      'generation-zone mesh actors in the level',
      'editor-internal',
      { kind: 'level', className: 'StaticMeshActor', matchMeshName: true },
      `*${level.genzoneMarker}*`
    ),
    'spline-description': entry(
      'spline-description',
      'spline description',
      'editor-to-engine',
      fs(storage.splines),
      'splines_export_from_UE_{iteration}.json'
    ),
    'export-mesh-set': entry(
      'export-mesh-set',
      'export mesh set',
      'editor-to-engine',
      fs(storage.meshSets),
      'SM_genzones_PCG_HD_{iteration}.fbx'
    ),
    'genzone-transforms': entry(
      'genzone-transforms',
      'generation-zone actor transforms',
      'editor-to-engine',
      fs(storage.meshSets),
      'SM_genzones_PCG_HD_{iteration}_transforms.json'
    ),
    'mesh-table': entry('mesh-table', 'mesh table', 'engine-to-editor', fs(storage.tables), 'mesh_{iteration}.csv'),
    'material-table': entry('material-table', 'material table', 'engine-to-editor', fs(storage.tables), 'mat_{iteration}.csv'),
    'sidewalk-batch': entry(
      'sidewalk-batch',
      'sidewalk geometry batch',
      'engine-to-editor',
      fs(storage.geometry),
      'sidewalks_{iteration}.fbx'
    ),
    'road-batch': entry('road-batch', 'road geometry batch', 'engine-to-editor', fs(storage.geometry), 'road_{iteration}.fbx'),
    'mesh-table-asset': entry(
      'mesh-table-asset',
      'mesh table asset',
      'editor-internal',
      folder(assets.tables),
      'mesh_{iteration}'
    ),
    'material-table-asset': entry(
      'material-table-asset',
      'material table asset',
      'editor-internal',
      folder(assets.tables),
      'mat_{iteration}'
    ),
    'sidewalk-pieces': entry(
      'sidewalk-pieces',
      'imported sidewalk pieces',
      'editor-internal',
      folder(assets.sidewalks),
      'sidewalks_{iteration}_piece_{piece}',
      'sidewalks_{iteration}'
    ),
    'road-pieces': entry(
      'road-pieces',
      'imported road pieces',
      'editor-internal',
      folder(assets.roads),
      'road_{iteration}_piece_{piece}',
      'road_{iteration}'
    ),
    'pcg-graph-asset': entry(
      'pcg-graph-asset',
      'PCG graph blueprint',
      'editor-internal',
      folder(assets.pcgGraphs),
      'BPi_PCG_HD_{iteration}'
    ),
    'pcg-graph-actor': entry(
      'pcg-graph-actor',
      'PCG graph actor in the level',
      'editor-internal',
      { kind: 'level' },
      'BPi_PCG_HD_{iteration}'
    ),
    'placed-sidewalks': entry(
      'placed-sidewalks',
      'placed sidewalk pieces',
      'editor-internal',
      { kind: 'level' },
      'sidewalks_{iteration}_piece_{piece}'
    ),
    'placed-roads': entry(
      'placed-roads',
      'placed road pieces',
      'editor-internal',
      { kind: 'level' },
      'road_{iteration}_piece_{piece}'
    )
  };
}
