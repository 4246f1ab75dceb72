import type { InputMode, ShuttleConfig } from '../config/types.js';
import type { EditorSession } from '../editor/types.js';
import type { ImportAdapter } from '../import/adapter.js';
import type { ImportOutcome } from '../import/types.js';
import type { Issue } from '../issues.js';
import type { ArtifactCategory } from '../naming/categories.js';
import type { NamingResolver } from '../naming/resolver.js';
import type { ProcessOutcome, ProcessRunner } from '../process/types.js';
import type { Logger } from '../../utils/logger.js';

export const STEP_IDS = [
  'export-splines',
  'export-genzone-meshes',
  'generate-buildings',
  'import-tables',
  'create-pcg-graph',
  'generate-roads',
  'import-road-meshes',
  'place-road-meshes'
] as const;

export type StepId = (typeof STEP_IDS)[number];

export type StepKind = 'in-session' | 'external';

export function isStepId(value: string): value is StepId {
  return STEP_IDS.some((id) => id === value);
}

export interface StepContext {
  iteration: number;
  inputMode: InputMode;
  config: ShuttleConfig;
  session: EditorSession;
  resolver: NamingResolver;
  importer: ImportAdapter;
  runner: ProcessRunner;
  engineTimeoutMs: number;
  signal: AbortSignal;
  logger: Logger;
  onEngineLine?: (line: string) => void;
}

/** What a step reports back; the orchestrator turns it into a frozen StepResult. */
export interface StepExecution {
  status: 'succeeded' | 'warned' | 'failed';
  diagnostic: string;
  issue?: Issue;
  imports?: ImportOutcome[];
  process?: ProcessOutcome;
}

export interface StepDefinition {
  id: StepId;
  name: string;
  kind: StepKind;
  /** May be passed over when the run continues past optional failures. */
  optional: boolean;
  inputs(mode: InputMode): readonly ArtifactCategory[];
  /** Categories that must be discoverable once the step reports success. */
  outputs(mode: InputMode): readonly ArtifactCategory[];
  execute(ctx: StepContext): Promise<StepExecution>;
}

export function joinWarnings(base: string, warnings: readonly string[]): string {
  if (!warnings.length) return base;
  return `${base}; ${warnings.join('; ')}`;
}
