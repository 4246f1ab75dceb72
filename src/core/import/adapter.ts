import type { EditorSession, ImportFormat } from '../editor/types.js';
import type { ImportAttempt } from '../issues.js';
import type { ArtifactCategory } from '../naming/categories.js';
import type { NamingResolver } from '../naming/resolver.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import type { ImportOutcome, ImportStrategy, StrategyResult } from './types.js';

/**
 * Imports a produced file into the Editor through an ordered fallback chain.
 *
 * The resolver is the judge: the target is re-discovered after every attempt, whatever the
 * strategy reported. A target that was absent and is now present counts as imported even when
 * the strategy reported failure; the next strategy sees the refreshed `existing` list.
 */
export class ImportAdapter {
  constructor(
    private readonly session: EditorSession,
    private readonly resolver: NamingResolver,
    private readonly strategies: readonly ImportStrategy[],
    private readonly logger: Logger = silentLogger
  ) {}

  async importArtifact(
    path: string,
    targetCategory: ArtifactCategory,
    iteration: number,
    format?: ImportFormat
  ): Promise<ImportOutcome> {
    const spec = this.resolver.spec(targetCategory);
    if (spec.location.kind !== 'assets') {
      throw new Error(`Import target ${targetCategory} is not an asset category`);
    }
    const folder = spec.location.folder;
    const name = this.resolver.importName(targetCategory, iteration);
    const target = `${folder}/${name}`;

    const before = (await this.resolver.discover(targetCategory, iteration)).map((a) => a.ref);
    let existing = before;
    const attempts: ImportAttempt[] = [];

    for (const strategy of this.strategies) {
      let res: StrategyResult;
      try {
        res = await strategy.attempt({ session: this.session, path, category: targetCategory, iteration, folder, name, existing, format });
      } catch (err) {
        res = { ok: false, error: err instanceof Error ? err.message : String(err) };
      }

      const after = (await this.resolver.discover(targetCategory, iteration)).map((a) => a.ref);
      // With a previous version present, discovery alone cannot tell a replacement happened.
      const landed = after.length > 0 && (res.ok || existing.length === 0);
      if (landed) {
        attempts.push({ strategy: strategy.id, ok: true });
        if (!res.ok) {
          this.logger.warn('import strategy reported failure but the target is present', {
            path,
            target,
            strategy: strategy.id,
            error: res.error
          });
        }
        this.logger.debug('import succeeded', { path, target, strategy: strategy.id, assets: after.length });
        return {
          status: 'success',
          strategyUsed: strategy.id,
          attempts,
          assets: after,
          updatedInPlace: before.length > 0,
          path,
          target
        };
      }

      const error = res.ok ? `reported success but no ${targetCategory} for iteration ${iteration} is present afterwards` : res.error;
      attempts.push({ strategy: strategy.id, ok: false, error });
      this.logger.debug('import strategy failed', { path, target, strategy: strategy.id, error });
      existing = after;
    }

    return { status: 'failure', strategyUsed: null, attempts, assets: [], updatedInPlace: false, path, target };
  }
}
