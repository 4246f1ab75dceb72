import type { ArtifactCategory } from '../naming/categories.js';
import type { StepContext, StepDefinition } from './types.js';

async function placePieces(
  ctx: StepContext,
  pieces: ArtifactCategory,
  placed: ArtifactCategory,
  folder: string
): Promise<{ spawned: number; kept: number }> {
  const assets = await ctx.resolver.discover(pieces, ctx.iteration);
  const already = new Set((await ctx.resolver.discover(placed, ctx.iteration)).map((a) => a.name.toLowerCase()));

  let spawned = 0;
  for (const piece of assets) {
    if (already.has(piece.name.toLowerCase())) continue;
    await ctx.session.spawnActor({ asset: piece.ref, label: piece.name, folder });
    spawned++;
  }
  return { spawned, kept: assets.length - spawned };
}

export const placeRoadMeshes: StepDefinition = {
  id: 'place-road-meshes',
  name: 'Place sidewalks and roads in level',
  kind: 'in-session',
  optional: false,
  inputs: () => ['sidewalk-pieces', 'road-pieces'],
  outputs: () => ['placed-sidewalks', 'placed-roads'],

  async execute(ctx) {
    const { sidewalksFolder, roadsFolder } = ctx.config.level;
    const sidewalks = await placePieces(ctx, 'sidewalk-pieces', 'placed-sidewalks', sidewalksFolder);
    const roads = await placePieces(ctx, 'road-pieces', 'placed-roads', roadsFolder);
    return {
      status: 'succeeded',
      diagnostic:
        `sidewalks: ${sidewalks.spawned} placed, ${sidewalks.kept} already present; ` +
        `roads: ${roads.spawned} placed, ${roads.kept} already present`
    };
  }
};
