import { ZERO_TRANSFORM } from '../editor/types.js';
import type { StepDefinition } from './types.js';

export const createPcgGraph: StepDefinition = {
  id: 'create-pcg-graph',
  name: 'Create PCG graph',
  kind: 'in-session',
  optional: true,
  inputs: () => [],
  outputs: () => ['pcg-graph-asset', 'pcg-graph-actor'],

  async execute(ctx) {
    const { resolver, session, iteration } = ctx;
    const template = ctx.config.assets.pcgTemplate;
    const assetPath = resolver.resolve('pcg-graph-asset', iteration);
    const name = resolver.importName('pcg-graph-asset', iteration);
    const notes: string[] = [];

    const [existing] = await resolver.discover('pcg-graph-asset', iteration);
    let graphAsset = existing?.ref;
    if (graphAsset) {
      notes.push(`graph ${name} already present`);
    } else {
      if (!(await session.assetExists(template))) {
        return { status: 'failed', diagnostic: `template graph ${template} not found` };
      }
      graphAsset = await session.duplicateAsset(template, ctx.config.assets.pcgGraphs, name);
      notes.push(`graph duplicated from ${template} to ${assetPath}`);
    }

    const placed = await resolver.discover('pcg-graph-actor', iteration);
    if (placed.length) {
      notes.push('actor already in level');
    } else {
      await session.spawnActor({ asset: graphAsset, label: name, transform: ZERO_TRANSFORM });
      notes.push('actor placed at origin');
    }

    return { status: 'succeeded', diagnostic: notes.join('; ') };
  }
};
