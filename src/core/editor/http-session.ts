import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { Logger, silentLogger } from '../../utils/logger.js';
import {
  LevelActor,
  MeshExportResult,
  SplineComponentData,
  type EditorSession,
  type ImportFormat,
  type ImportTaskRequest,
  type SpawnActorRequest
} from './types.js';

const Envelope = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string() })
]);

const AssetList = z.array(z.string());

export class EditorBridgeError extends Error {
  constructor(
    readonly command: string,
    message: string
  ) {
    super(`${command}: ${message}`);
    this.name = 'EditorBridgeError';
  }
}

export interface HttpEditorSessionOptions {
  bridgeUrl: string;
  requestTimeoutMs: number;
  logger?: Logger;
}

/**
 * Editor session reached through the bridge served inside the Editor.
 *
 * Each call is `POST <bridgeUrl>/commands/<command>` with a JSON params body; replies are
 * `{ ok: true, result }` or `{ ok: false, error }`. Bridge-side errors, transport errors
 * and malformed replies all throw `EditorBridgeError`.
 */
export class HttpEditorSession implements EditorSession {
  readonly id = randomUUID();
  private readonly base: string;
  private readonly logger: Logger;

  constructor(private readonly opts: HttpEditorSessionOptions) {
    this.base = opts.bridgeUrl.replace(/\/+$/, '');
    this.logger = (opts.logger ?? silentLogger).child({ editorSession: this.id });
  }

  async listLevelActors() {
    return this.call('listLevelActors', {}, z.array(LevelActor));
  }

  async getSplineComponents(actorPath: string) {
    return this.call('getSplineComponents', { actorPath }, z.array(SplineComponentData));
  }

  async exportStaticMeshes(meshAssets: readonly string[], filename: string) {
    return this.call('exportStaticMeshes', { meshAssets, filename }, MeshExportResult);
  }

  async listAssets(folder: string, opts: { recursive?: boolean } = {}) {
    return this.call('listAssets', { folder, recursive: opts.recursive ?? true }, AssetList);
  }

  async assetExists(assetPath: string) {
    return this.call('assetExists', { assetPath }, z.boolean());
  }

  async runImportTask(task: ImportTaskRequest) {
    return this.call('runImportTask', task, AssetList);
  }

  async reimportAsset(assetPath: string) {
    return this.call('reimportAsset', { assetPath }, z.boolean());
  }

  async importAsset(filename: string, destinationAssetPath: string, format?: ImportFormat) {
    return this.call('importAsset', { filename, destinationAssetPath, format }, AssetList);
  }

  async contentBrowserImport(files: readonly string[], destinationPath: string) {
    return this.call('contentBrowserImport', { files, destinationPath }, AssetList);
  }

  async duplicateAsset(sourceAssetPath: string, destinationPath: string, name: string) {
    return this.call('duplicateAsset', { sourceAssetPath, destinationPath, name }, z.string());
  }

  async spawnActor(req: SpawnActorRequest) {
    return this.call('spawnActor', req, LevelActor);
  }

  private async call<T>(command: string, params: object, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${this.base}/commands/${command}`;
    this.logger.debug('editor call', { command });

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(this.opts.requestTimeoutMs)
      });
    } catch (err) {
      throw new EditorBridgeError(command, `bridge unreachable at ${this.base} (${errorMessage(err)})`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new EditorBridgeError(command, `bridge answered HTTP ${res.status} without a JSON body`);
    }

    const envelope = Envelope.safeParse(body);
    if (!envelope.success) {
      throw new EditorBridgeError(command, `unexpected reply shape (HTTP ${res.status})`);
    }
    if (!envelope.data.ok) throw new EditorBridgeError(command, envelope.data.error);

    const parsed = schema.safeParse(envelope.data.result);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first?.path.length ? ` at ${first.path.join('.')}` : '';
      throw new EditorBridgeError(command, `invalid result${where}: ${first?.message ?? 'schema mismatch'}`);
    }
    return parsed.data;
  }
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
