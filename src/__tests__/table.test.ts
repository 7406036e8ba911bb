import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { assembleTable, columnValues, dropColumns, withColumn } from '../dwar/assembleTable.js';
import { planDecode } from '../dwar/decodePlan.js';
import { projectColumns } from '../dwar/projection.js';
import type { ColumnPropertyMap, DwarTable } from '../dwar/types.js';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('assembleTable', () => {
  it('uses the header when its width matches the rows', () => {
    const table = assembleTable(['ID', 'Structure', 'Name'], [['1', 'ABC', 'foo']]);
    expect(table.columns).toEqual(['ID', 'Structure', 'Name']);
    expect(table.rows).toEqual([['1', 'ABC', 'foo']]);
  });

  it('falls back to generic names when widths differ', () => {
    const table = assembleTable(['ID', 'Structure', 'Name'], [['1', 'ABC'], ['2', 'DEF']]);
    expect(table.columns).toEqual(['Column_0', 'Column_1']);
  });

  it('falls back to generic names without a header', () => {
    const table = assembleTable(null, [['1', 'ABC', 'x']]);
    expect(table.columns).toEqual(['Column_0', 'Column_1', 'Column_2']);
  });

  it('pads ragged rows to the widest row', () => {
    const table = assembleTable(['a', 'b', 'c'], [['1', '2', '3'], ['4']]);
    expect(table.rows).toEqual([['1', '2', '3'], ['4', null, null]]);
    for (const row of table.rows) {
      expect(row.length).toBe(table.columns.length);
    }
  });

  it('drops rows that are empty in every position', () => {
    const table = assembleTable(['a', 'b', 'c'], [['', '', ''], ['1', '', ''], ['']]);
    expect(table.rows).toEqual([['1', '', '']]);
  });
});

describe('column helpers', () => {
  const table: DwarTable = { columns: ['a', 'b'], rows: [['1', 'x'], ['2', 'y']] };

  it('reads column values, or nulls for an unknown column', () => {
    expect(columnValues(table, 'b')).toEqual(['x', 'y']);
    expect(columnValues(table, 'zzz')).toEqual([null, null]);
  });

  it('appends a new column', () => {
    expect(withColumn(table, 'c', ['p', null])).toEqual({
      columns: ['a', 'b', 'c'],
      rows: [['1', 'x', 'p'], ['2', 'y', null]],
    });
  });

  it('replaces an existing column in place', () => {
    expect(withColumn(table, 'a', ['9', '8'])).toEqual({
      columns: ['a', 'b'],
      rows: [['9', 'x'], ['8', 'y']],
    });
  });

  it('drops columns by name', () => {
    expect(dropColumns(table, new Set(['a']))).toEqual({
      columns: ['b'],
      rows: [['x'], ['y']],
    });
  });
});

describe('planDecode', () => {
  const properties: ColumnPropertyMap = new Map([
    ['Structure', { type: 'string', specialType: 'idcode' }],
    ['Missing', { type: 'string', specialType: 'idcode' }],
    ['Reactant', { type: 'string', specialType: 'IdCode' }],
    ['FragFp', { type: 'string', specialType: 'FragFp' }],
    ['Name', { type: 'string' }],
  ]);

  it('plans idcode columns present in the table, in declaration order', () => {
    const plan = planDecode(['Name', 'Reactant', 'FragFp', 'Structure'], properties);
    expect(plan.toDecode).toEqual(['Structure', 'Reactant']);
    expect(plan.toRemove).toEqual(['Structure', 'Reactant']);
  });

  it('never plans columns without metadata', () => {
    const plan = planDecode(['Column_0', 'Column_1'], properties);
    expect(plan).toEqual({ toDecode: [], toRemove: [] });
  });
});

describe('projectColumns', () => {
  const table: DwarTable = {
    columns: ['Structure', 'idcoordinates2D', 'ScaffoldAtoms', 'SMILES', 'FragFp', 'Name', 'Structure_SMILES'],
    rows: [['ABC', 'c', 's', 'CC', 'fp', 'foo', 'C1=CC=CC=C1']],
  };
  const plan = { toDecode: ['Structure'], toRemove: ['Structure'] };

  it('drops identifier, coordinate, Smiles and fingerprint columns', () => {
    const projected = projectColumns(table, plan, { excludeStructureColumns: true });
    expect(projected).toEqual({
      columns: ['Name', 'Structure_SMILES'],
      rows: [['foo', 'C1=CC=CC=C1']],
    });
  });

  it('drops only fingerprint columns when structures are kept', () => {
    const projected = projectColumns(table, plan, { excludeStructureColumns: false });
    expect(projected.columns).toEqual(['Structure', 'idcoordinates2D', 'ScaffoldAtoms', 'SMILES', 'Name', 'Structure_SMILES']);
  });

  it('is a no-op when nothing matches', () => {
    const plain: DwarTable = { columns: ['Name', 'MW'], rows: [['foo', '1']] };
    const projected = projectColumns(plain, { toDecode: [], toRemove: [] }, { excludeStructureColumns: true });
    expect(projected).toEqual(plain);
    expect(console.error).toHaveBeenCalledWith('[dwar-mcp] No ID code/coordinate/Smiles columns detected for removal');
  });
});
