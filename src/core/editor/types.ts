import { z } from 'zod';

export const Vector3 = z.object({ x: z.number(), y: z.number(), z: z.number() });
export type Vector3 = z.infer<typeof Vector3>;

export const Rotator = z.object({ roll: z.number(), pitch: z.number(), yaw: z.number() });
export type Rotator = z.infer<typeof Rotator>;

export const ActorTransform = z.object({
  location: Vector3,
  rotation: Rotator,
  scale: Vector3
});
export type ActorTransform = z.infer<typeof ActorTransform>;

export const LevelActor = z
  .object({
    label: z.string(),
    path: z.string(),
    className: z.string(),
    /** Object path of the static mesh, for static-mesh actors. */
    meshAsset: z.string().optional(),
    /** Outliner folder the actor lives in. */
    folder: z.string().optional(),
    transform: ActorTransform.optional()
  })
  .passthrough();
export type LevelActor = z.infer<typeof LevelActor>;

export const SplinePointData = z
  .object({
    location: Vector3,
    tangent: Vector3,
    rotation: Rotator,
    scale: Vector3,
    pointType: z.string()
  })
  .passthrough();
export type SplinePointData = z.infer<typeof SplinePointData>;

export const SplineComponentData = z
  .object({
    name: z.string(),
    points: z.array(SplinePointData)
  })
  .passthrough();
export type SplineComponentData = z.infer<typeof SplineComponentData>;

export const MeshExportResult = z.object({
  exported: z.array(z.string()),
  failed: z.array(z.object({ asset: z.string(), error: z.string() }))
});
export type MeshExportResult = z.infer<typeof MeshExportResult>;

/**
 * How the Editor reads an imported file. A CSV sent without `data-table` lands as a plain
 * asset instead of a DataTable; `keepRowStruct` reuses the row struct of the table being replaced.
 */
export type ImportFormat = { kind: 'data-table'; keepRowStruct: boolean } | { kind: 'static-mesh' };

export interface ImportTaskRequest {
  filename: string;
  destinationPath: string;
  destinationName: string;
  replaceExisting: boolean;
  automated: boolean;
  save: boolean;
  format?: ImportFormat;
}

export interface SpawnActorRequest {
  /** Asset to spawn from: a static mesh or a blueprint class. */
  asset: string;
  label: string;
  folder?: string;
  transform?: ActorTransform;
}

/**
 * Handle on one live Editor session. Every in-session step receives it explicitly;
 * nothing reaches the Editor through module state.
 *
 * Asset paths are package paths without the object suffix (`/Game/X/mesh_2`).
 */
export interface EditorSession {
  readonly id: string;
  listLevelActors(): Promise<LevelActor[]>;
  getSplineComponents(actorPath: string): Promise<SplineComponentData[]>;
  /** Export the given static meshes into one FBX file. */
  exportStaticMeshes(meshAssets: readonly string[], filename: string): Promise<MeshExportResult>;
  listAssets(folder: string, opts?: { recursive?: boolean }): Promise<string[]>;
  assetExists(assetPath: string): Promise<boolean>;
  /** Returns the asset paths the task reports as imported. */
  runImportTask(task: ImportTaskRequest): Promise<string[]>;
  reimportAsset(assetPath: string): Promise<boolean>;
  importAsset(filename: string, destinationAssetPath: string, format?: ImportFormat): Promise<string[]>;
  contentBrowserImport(files: readonly string[], destinationPath: string): Promise<string[]>;
  duplicateAsset(sourceAssetPath: string, destinationPath: string, name: string): Promise<string>;
  spawnActor(req: SpawnActorRequest): Promise<LevelActor>;
}

export const ZERO_TRANSFORM: ActorTransform = {
  location: { x: 0, y: 0, z: 0 },
  rotation: { roll: 0, pitch: 0, yaw: 0 },
  scale: { x: 1, y: 1, z: 1 }
};

export function assetName(assetPath: string): string {
  const last = assetPath.slice(assetPath.lastIndexOf('/') + 1);
  const dot = last.indexOf('.');
  return dot === -1 ? last : last.slice(0, dot);
}
