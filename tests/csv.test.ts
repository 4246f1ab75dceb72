import { describe, expect, it } from 'vitest';

import { checkTable, keyColumnOf, parseCsv } from '../src/core/payloads/csv.js';

describe('parseCsv', () => {
  it('parses quoted fields, escaped quotes and CRLF line endings', () => {
    const table = parseCsv('\uFEFFName,Mesh,Note\r\nrow_1,"/Game/A, B","say ""hi"""\r\n\r\nrow_2,/Game/C\r\n');
    expect(table.headers).toEqual(['Name', 'Mesh', 'Note']);
    expect(table.rows).toEqual([
      { Name: 'row_1', Mesh: '/Game/A, B', Note: 'say "hi"' },
      { Name: 'row_2', Mesh: '/Game/C', Note: '' }
    ]);
  });

  it('returns an empty table for blank content', () => {
    expect(parseCsv('\n  \n')).toEqual({ headers: [], rows: [] });
  });
});

describe('checkTable', () => {
  it('keys rows by Name in any case, else by the first column', () => {
    expect(keyColumnOf(['id', 'NAME'])).toBe('NAME');
    expect(keyColumnOf(['id', 'mesh'])).toBe('id');
    expect(keyColumnOf([])).toBeNull();
  });

  it('accepts a well-formed table without warnings', () => {
    const check = checkTable(parseCsv('Name,Mesh\na,/Game/A\nb,/Game/B\n'));
    expect(check).toEqual({ keyColumn: 'Name', rowCount: 2, duplicateKeys: [], warnings: [] });
  });

  it('warns about duplicate keys, missing rows and missing payload columns', () => {
    expect(checkTable(parseCsv('Name,Mesh\nb,1\na,2\nb,3\na,4\n')).warnings).toEqual(['duplicate Name keys: a, b']);
    expect(checkTable(parseCsv('Name\n')).warnings).toEqual([
      'table has a header but no rows',
      'table has no payload column besides Name'
    ]);
    expect(checkTable(parseCsv('')).warnings).toEqual(['table has no header row']);
  });
});
