import type { Cell, DwarTable } from './types.js';

function isEmptyRow(row: Cell[]): boolean {
  return row.every(cell => cell === null || cell === '');
}

/**
 * Build a rectangular table from the located body. The width is that of the
 * widest data row; shorter rows are padded with nulls. The header names the
 * columns only when its field count matches that width.
 */
export function assembleTable(header: string[] | null, dataRows: string[][]): DwarTable {
  const width = dataRows.reduce((max, row) => Math.max(max, row.length), 0);

  const columns = header !== null && header.length === width
    ? header.map(name => String(name))
    : Array.from({ length: width }, (_, i) => `Column_${i}`);

  const rows: Cell[][] = [];
  for (const raw of dataRows) {
    const row: Cell[] = raw.slice();
    while (row.length < width) row.push(null);
    if (!isEmptyRow(row)) rows.push(row);
  }

  return { columns, rows };
}

export function columnValues(table: DwarTable, column: string): Cell[] {
  const index = table.columns.indexOf(column);
  if (index === -1) return table.rows.map(() => null);
  return table.rows.map(row => row[index] ?? null);
}

/** Set `column` to `values`, appending it when the table has no such column. */
export function withColumn(table: DwarTable, column: string, values: Cell[]): DwarTable {
  const existing = table.columns.indexOf(column);
  if (existing !== -1) {
    return {
      columns: table.columns,
      rows: table.rows.map((row, i) => row.map((cell, j) => (j === existing ? values[i] ?? null : cell))),
    };
  }
  return {
    columns: [...table.columns, column],
    rows: table.rows.map((row, i) => [...row, values[i] ?? null]),
  };
}

export function dropColumns(table: DwarTable, drop: ReadonlySet<string>): DwarTable {
  const keep: number[] = [];
  table.columns.forEach((name, i) => {
    if (!drop.has(name)) keep.push(i);
  });
  return {
    columns: keep.map(i => table.columns[i]!),
    rows: table.rows.map(row => keep.map(i => row[i] ?? null)),
  };
}
