import { removeFiles, writeJson } from '../../utils/fs.js';
import { ZERO_TRANSFORM } from '../editor/types.js';
import { GenzoneTransforms } from '../payloads/splines.js';
import { joinWarnings, type StepDefinition } from './types.js';

export const exportGenzoneMeshes: StepDefinition = {
  id: 'export-genzone-meshes',
  name: 'Export generation-zone meshes',
  kind: 'in-session',
  optional: false,
  inputs: () => ['genzone-actors'],
  outputs: () => ['export-mesh-set', 'genzone-transforms'],

  async execute(ctx) {
    const found = await ctx.resolver.discover('genzone-actors', ctx.iteration);
    const actors = found.flatMap((f) => (f.actor ? [f.actor] : []));
    const meshes = [...new Set(actors.flatMap((a) => (a.meshAsset ? [a.meshAsset] : [])))].sort();

    if (!meshes.length) {
      return { status: 'failed', diagnostic: `${actors.length} generation-zone actor(s) found but none has a static mesh` };
    }

    const meshSet = ctx.resolver.resolve('export-mesh-set', ctx.iteration);
    const transformsPath = ctx.resolver.resolve('genzone-transforms', ctx.iteration);
    await removeFiles([meshSet, transformsPath]);

    const result = await ctx.session.exportStaticMeshes(meshes, meshSet);
    if (!result.exported.length) {
      const reasons = result.failed.map((f) => `${f.asset}: ${f.error}`);
      return { status: 'failed', diagnostic: joinWarnings(`none of ${meshes.length} mesh(es) exported`, reasons) };
    }

    const transforms = GenzoneTransforms.parse({
      actors: actors.map((a) => {
        const t = a.transform ?? ZERO_TRANSFORM;
        return { name: a.label, mesh: a.meshAsset ?? null, location: t.location, rotation: t.rotation, scale: t.scale };
      })
    });
    await writeJson(transformsPath, transforms);

    const warnings = result.failed.map((f) => `${f.asset} not exported: ${f.error}`);
    const base = `exported ${result.exported.length}/${meshes.length} mesh(es) from ${actors.length} actor(s) to ${meshSet}`;
    return { status: warnings.length ? 'warned' : 'succeeded', diagnostic: joinWarnings(base, warnings) };
  }
};
