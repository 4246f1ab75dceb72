import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { parseConfig } from '../src/core/config/reader.js';
import { ARTIFACT_CATEGORIES, buildCategoryTable } from '../src/core/naming/categories.js';
import { NamingResolver } from '../src/core/naming/resolver.js';
import { writeText } from '../src/utils/fs.js';
import { FakeEditorSession } from './fake-editor.js';

const dirs: string[] = [];

afterEach(async () => {
  await Promise.all(dirs.splice(0).map((d) => rm(d, { recursive: true, force: true })));
});

async function setup(session: FakeEditorSession | null = null) {
  const dir = await mkdtemp(join(tmpdir(), 'shuttle-naming-'));
  dirs.push(dir);
  const config = parseConfig({}, dir);
  return { dir, config, resolver: new NamingResolver(buildCategoryTable(config), session) };
}

describe('NamingResolver.resolve', () => {
  it('places filesystem names under the storage dirs and asset names under their folders', async () => {
    const { config, resolver } = await setup();
    expect(resolver.resolve('mesh-table', 2)).toBe(join(config.storage.tables, 'mesh_2.csv'));
    expect(resolver.resolve('export-mesh-set', 5)).toBe(join(config.storage.meshSets, 'SM_genzones_PCG_HD_5.fbx'));
    expect(resolver.resolve('mesh-table-asset', 2)).toBe('/Game/Pipeline/PCG_HD/CSV/mesh_2');
    expect(resolver.resolve('pcg-graph-actor', 3)).toBe('BPi_PCG_HD_3');
    expect(resolver.resolve('sidewalk-pieces', 3, 0)).toBe('/Game/Pipeline/Assets/Sidewalks/sidewalks_3_piece_0');
  });

  it('gives every resolvable category a distinct name for the same iteration', async () => {
    const { resolver } = await setup();
    const names = new Set<string>();
    for (const category of ARTIFACT_CATEGORIES) {
      const spec = resolver.spec(category);
      if (spec.template.hasWildcard) continue;
      const key = `${spec.location.kind}:${resolver.resolve(category, 1, spec.template.hasPiece ? 0 : undefined)}`;
      names.add(key);
    }
    // The two actor-wildcard categories are skipped.
    expect(names.size).toBe(ARTIFACT_CATEGORIES.length - 2);
  });

  it('targets the batch base name when importing piece categories', async () => {
    const { resolver } = await setup();
    expect(resolver.importName('road-pieces', 4)).toBe('road_4');
    expect(resolver.importTarget('road-pieces', 4)).toBe('/Game/Pipeline/Assets/Road/road_4');
    expect(resolver.importName('mesh-table-asset', 4)).toBe('mesh_4');
  });

  it('rejects negative or fractional iterations', async () => {
    const { resolver } = await setup();
    expect(() => resolver.resolve('mesh-table', -1)).toThrow('Iteration must be a non-negative integer, got -1');
    expect(() => resolver.resolve('mesh-table', 1.5)).toThrow('Iteration must be a non-negative integer, got 1.5');
  });
});

describe('NamingResolver.discover', () => {
  it('returns an empty list for a missing directory', async () => {
    const { resolver } = await setup();
    expect(await resolver.discover('mesh-table', 1)).toEqual([]);
  });

  it('matches iterations exactly and reports near misses', async () => {
    const { config, resolver } = await setup();
    for (const name of ['mesh_1.csv', 'mesh_10.csv', 'mesh_01.csv', 'mat_1.csv', 'notes.txt']) {
      await writeText(join(config.storage.tables, name), 'Name,Mesh\n');
    }

    const inspection = await resolver.inspect('mesh-table', 1);
    expect(inspection.matches.map((m) => m.name)).toEqual(['mesh_1.csv']);
    expect(inspection.mismatches).toEqual(['mesh_01.csv', 'mesh_10.csv']);
    expect(inspection.nearMisses).toEqual(['mesh_01.csv']);
    expect(inspection.searched).toBe(config.storage.tables);
  });

  it('orders pieces numerically', async () => {
    const session = new FakeEditorSession();
    for (const p of [10, 2, 0]) session.assets.add(`/Game/Pipeline/Assets/Road/road_4_piece_${p}`);
    session.assets.add('/Game/Pipeline/Assets/Road/road_5_piece_0');
    const { resolver } = await setup(session);

    const found = await resolver.discover('road-pieces', 4);
    expect(found.map((f) => f.piece)).toEqual([0, 2, 10]);
    expect(found[0]?.ref).toBe('/Game/Pipeline/Assets/Road/road_4_piece_0');
  });

  it('finds generation-zone actors by label or mesh name, static mesh actors only', async () => {
    const session = new FakeEditorSession();
    session.addActor({ label: 'Zone_A', meshAsset: '/Game/Meshes/SM_genzone_01.SM_genzone_01' });
    session.addActor({ label: 'genzone_north' });
    session.addActor({ label: 'genzone_light', className: 'PointLight' });
    session.addActor({ label: 'Rock', meshAsset: '/Game/Meshes/SM_rock' });
    const { resolver } = await setup(session);

    const found = await resolver.discover('genzone-actors', 9);
    expect(found.map((f) => f.ref)).toEqual(['genzone_north', 'Zone_A']);
    expect(found.map((f) => f.name)).toEqual(['genzone_north', 'SM_genzone_01']);
  });

  it('needs a session for level and asset categories', async () => {
    const { resolver } = await setup();
    await expect(resolver.discover('spline-actors', 1)).rejects.toThrow('Discovering spline-actors needs an Editor session');
  });
});
