import { COLUMN_PROPERTIES_CLOSE, COLUMN_PROPERTIES_OPEN, type LocatedBody } from './types.js';
import { splitLines } from './lines.js';

const MIN_HEADER_FIELDS = 3;

function isMarkup(line: string): boolean {
  return line.startsWith('<') || line.startsWith('>');
}

/**
 * Tab-count heuristic for the table body. The format has no row count, so the
 * header is the first non-markup line after `</column properties>` that splits
 * into at least three tab-separated fields. Data rows are collected only once
 * a header has been accepted; without one the result is empty.
 */
export function locateBody(content: string): LocatedBody {
  let header: string[] | null = null;
  const dataRows: string[][] = [];
  let metadataClosed = false;

  for (const line of splitLines(content)) {
    if (line.includes(COLUMN_PROPERTIES_OPEN)) continue;
    if (line.includes(COLUMN_PROPERTIES_CLOSE)) {
      metadataClosed = true;
      continue;
    }

    // tab-only lines carry no cells; the untrimmed line is still what gets split
    if (line.trim().length === 0 || !line.includes('\t') || isMarkup(line)) continue;

    if (header === null) {
      if (!metadataClosed) continue;
      const fields = line.split('\t');
      if (fields.length >= MIN_HEADER_FIELDS) header = fields;
      continue;
    }

    if (line.startsWith('settings=')) continue;
    dataRows.push(line.split('\t'));
  }

  return { header, dataRows };
}
