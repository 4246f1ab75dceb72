import type { ImportStrategyId } from '../config/types.js';
import type { ImportContext, ImportStrategy, StrategyResult } from './types.js';

/** Structured import task: replace existing, unattended, saved. */
export const importTaskStrategy: ImportStrategy = {
  id: 'import-task',
  async attempt(ctx) {
    const assets = await ctx.session.runImportTask({
      filename: ctx.path,
      destinationPath: ctx.folder,
      destinationName: ctx.name,
      replaceExisting: true,
      automated: true,
      save: true,
      format: ctx.format
    });
    if (!assets.length) return { ok: false, error: 'import task reported no imported assets' };
    return { ok: true, assets };
  }
};

/** Reimport every existing asset in place; direct import when there is nothing to reimport. */
export const assetSubsystemStrategy: ImportStrategy = {
  id: 'asset-subsystem',
  async attempt(ctx) {
    if (!ctx.existing.length) {
      const assets = await ctx.session.importAsset(ctx.path, `${ctx.folder}/${ctx.name}`, ctx.format);
      if (!assets.length) return { ok: false, error: 'direct import reported no imported assets' };
      return { ok: true, assets };
    }

    const failed: string[] = [];
    for (const asset of ctx.existing) {
      if (!(await ctx.session.reimportAsset(asset))) failed.push(asset);
    }
    if (failed.length) return { ok: false, error: `reimport refused for ${failed.join(', ')}` };
    return { ok: true, assets: [...ctx.existing] };
  }
};

/** Plain content-browser import; it cannot replace in place, so existing targets rule it out. */
export const contentBrowserStrategy: ImportStrategy = {
  id: 'content-browser',
  async attempt(ctx): Promise<StrategyResult> {
    if (ctx.existing.length) {
      return { ok: false, error: `target already exists (${ctx.existing.join(', ')}); content-browser import would duplicate it` };
    }
    const assets = await ctx.session.contentBrowserImport([ctx.path], ctx.folder);
    if (!assets.length) return { ok: false, error: 'content-browser import reported no imported assets' };
    return { ok: true, assets };
  }
};

export const BUILTIN_STRATEGIES: Readonly<Record<ImportStrategyId, ImportStrategy>> = {
  'import-task': importTaskStrategy,
  'asset-subsystem': assetSubsystemStrategy,
  'content-browser': contentBrowserStrategy
};

export function strategiesFor(order: readonly ImportStrategyId[]): ImportStrategy[] {
  return order.map((id) => BUILTIN_STRATEGIES[id]);
}
