import { describe, expect, it } from 'vitest';

import { compileTemplate, matchTemplate, renderTemplate, templatePrefix } from '../src/core/naming/template.js';

describe('name templates', () => {
  it('renders iteration and piece placeholders', () => {
    expect(renderTemplate(compileTemplate('mesh_{iteration}.csv'), 2)).toBe('mesh_2.csv');
    expect(renderTemplate(compileTemplate('road_{iteration}_piece_{piece}'), 4, 1)).toBe('road_4_piece_1');
  });

  it('matches case-insensitively and captures the iteration text verbatim', () => {
    const tpl = compileTemplate('mesh_{iteration}.csv');
    expect(matchTemplate(tpl, 'MESH_2.CSV')).toEqual({ iteration: '2', piece: null });
    expect(matchTemplate(tpl, 'mesh_02.csv')).toEqual({ iteration: '02', piece: null });
    expect(matchTemplate(tpl, 'mesh_2.csv.bak')).toBeNull();
    expect(matchTemplate(tpl, 'mesh_.csv')).toBeNull();
  });

  it('treats regex characters in literals as text', () => {
    const tpl = compileTemplate('a.b_{iteration}');
    expect(matchTemplate(tpl, 'a.b_1')).not.toBeNull();
    expect(matchTemplate(tpl, 'axb_1')).toBeNull();
  });

  it('captures piece indices as numbers', () => {
    const tpl = compileTemplate('sidewalks_{iteration}_piece_{piece}');
    expect(matchTemplate(tpl, 'sidewalks_3_piece_12')).toEqual({ iteration: '3', piece: 12 });
  });

  it('refuses to resolve wildcard templates and piece templates without a piece', () => {
    expect(() => renderTemplate(compileTemplate('*genzone*'), 1)).toThrow(
      'Name template "*genzone*" contains a wildcard and can only be discovered, not resolved'
    );
    expect(() => renderTemplate(compileTemplate('road_{iteration}_piece_{piece}'), 1)).toThrow(
      'Name template "road_{iteration}_piece_{piece}" needs a piece index'
    );
    expect(() => renderTemplate(compileTemplate('road_{iteration}_piece_{piece}'), 1, -1)).toThrow('Invalid piece index: -1');
  });

  it('rejects unknown placeholders', () => {
    expect(() => compileTemplate('mesh_{iter}.csv')).toThrow('Unknown placeholder "{iter}" in name template "mesh_{iter}.csv"');
  });

  it('takes the literal text before the first placeholder as the prefix', () => {
    expect(templatePrefix(compileTemplate('splines_export_from_UE_{iteration}.json'))).toBe('splines_export_from_UE_');
    expect(templatePrefix(compileTemplate('{iteration}_x'))).toBe('');
  });
});
