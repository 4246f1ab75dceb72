import type { ImportStrategyId } from '../config/types.js';
import type { EditorSession, ImportFormat } from '../editor/types.js';
import type { ImportAttempt } from '../issues.js';
import type { ArtifactCategory } from '../naming/categories.js';

export interface ImportContext {
  session: EditorSession;
  /** Source file on disk. */
  path: string;
  category: ArtifactCategory;
  iteration: number;
  /** Asset folder the import lands in. */
  folder: string;
  /** Exact asset name the import targets (`mesh_2`, `sidewalks_4`). */
  name: string;
  /** Assets of the target category present before this attempt. */
  existing: string[];
  format?: ImportFormat;
}

export type StrategyResult = { ok: true; assets: string[] } | { ok: false; error: string };

export interface ImportStrategy {
  readonly id: ImportStrategyId;
  attempt(ctx: ImportContext): Promise<StrategyResult>;
}

export interface ImportOutcome {
  status: 'success' | 'failure';
  strategyUsed: ImportStrategyId | null;
  attempts: ImportAttempt[];
  /** Target-category assets discovered after the import. */
  assets: string[];
  /** The target existed beforehand and was replaced under the same name. */
  updatedInPlace: boolean;
  path: string;
  target: string;
}
