import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseConfig } from '../src/core/config/reader.js';
import { buildEngineInvocation, inputCategoryFor } from '../src/core/engine/invocation.js';
import { buildCategoryTable } from '../src/core/naming/categories.js';
import { NamingResolver } from '../src/core/naming/resolver.js';

const base = '/work/project';

function fixture(driverScript?: string) {
  const config = parseConfig({ engine: { executable: 'hython', driverScript } }, base);
  return { config, resolver: new NamingResolver(buildCategoryTable(config)) };
}

describe('buildEngineInvocation', () => {
  it('lays out the buildings job for mesh input', () => {
    const { config, resolver } = fixture('scripts/cook.py');
    const tables = join(base, 'Dependencies/PCG_HD/Out/CSV');

    const inv = buildEngineInvocation({
      job: 'buildings',
      iteration: 2,
      inputMode: 'mesh',
      engine: config.engine,
      resolver,
      available: { splines: false, meshSet: true }
    });

    expect(inv.executable).toBe('hython');
    expect(inv.outputDir).toBe(tables);
    expect(inv.args).toEqual([
      join(base, 'scripts/cook.py'),
      '--hip',
      join(base, 'genbuildingbase.hip'),
      '--topnet',
      '/obj/geo1/topnet',
      '--iteration_number',
      '2',
      '--switch_bool',
      '1',
      '--file1_path',
      join(base, 'Dependencies/PCG_HD/In/GZ/Mod/SM_genzones_PCG_HD_2.fbx'),
      '--rop_pcg_export1_mesh_path',
      join(tables, 'mesh_2.csv'),
      '--rop_pcg_export1_mat_path',
      join(tables, 'mat_2.csv')
    ]);
    expect(inv.outputs.map((o) => o.category)).toEqual(['mesh-table', 'material-table']);
  });

  it('passes both inputs and clears the switch for spline input', () => {
    const { config, resolver } = fixture();
    const inv = buildEngineInvocation({
      job: 'roads',
      iteration: 4,
      inputMode: 'spline',
      engine: config.engine,
      resolver,
      available: { splines: true, meshSet: true }
    });

    expect(inv.args.slice(0, 4)).toEqual(['--hip', join(base, 'sidewalks.hip'), '--topnet', '/obj/geo1/topnet']);
    expect(inv.args[inv.args.indexOf('--switch_bool') + 1]).toBe('0');
    expect(inv.args[inv.args.indexOf('--base_path') + 1]).toBe(join(base, 'Dependencies/PCG_HD/In/GZ/Splines/splines_export_from_UE_'));
    expect(inv.args).not.toContain('--splines_path');
    expect(inv.args).not.toContain('--output_dir');
    expect(inv.args[inv.args.indexOf('--rop_fbx_road_path') + 1]).toBe(join(base, 'Dependencies/SW_Roads/Out/Mod/road_4.fbx'));
  });

  it('maps input modes to their artifact categories', () => {
    expect(inputCategoryFor('mesh')).toBe('export-mesh-set');
    expect(inputCategoryFor('spline')).toBe('spline-description');
  });
});
