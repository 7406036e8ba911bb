import * as fs from 'fs';
import Papa from 'papaparse';
import type { DwarTable } from './types.js';

/** Header row plus one line per row; null cells become empty fields. */
export function toCsv(table: DwarTable): string {
  const body = Papa.unparse(
    { fields: table.columns, data: table.rows.map(row => row.map(cell => cell ?? '')) },
    { newline: '\n' }
  );
  return `${body}\n`;
}

export function writeCsv(table: DwarTable, outputPath: string): void {
  fs.writeFileSync(outputPath, toCsv(table), 'utf-8');
}
