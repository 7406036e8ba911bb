/**
 * Column metadata from the `<column properties>` block.
 *
 *   <column properties>
 *   <columnName="Structure">
 *   <columnProperty="specialType	idcode">
 *   <columnName="idcoordinates2D">
 *   <columnProperty="parent	Structure">
 *   </column properties>
 */

import {
  COLUMN_PROPERTIES_CLOSE,
  COLUMN_PROPERTIES_OPEN,
  type ColumnProperties,
  type ColumnPropertyMap,
} from './types.js';
import { splitLines } from './lines.js';

const COLUMN_NAME_RE = /<columnName="([^"]+)">/;
const COLUMN_PROPERTY_RE = /<columnProperty="([^"]+)">/;

function textAfter(prop: string, key: string): string {
  return prop.slice(prop.indexOf(key) + key.length).trim();
}

export function extractColumnProperties(content: string): ColumnPropertyMap {
  const columns: ColumnPropertyMap = new Map();
  let inBlock = false;
  let currentColumn: string | null = null;

  for (const line of splitLines(content)) {
    if (line === COLUMN_PROPERTIES_OPEN) {
      inBlock = true;
      continue;
    }
    if (line === COLUMN_PROPERTIES_CLOSE) {
      inBlock = false;
      continue;
    }
    if (!inBlock) continue;

    if (line.startsWith('<columnName=')) {
      const match = line.match(COLUMN_NAME_RE);
      if (match) {
        currentColumn = match[1]!;
        // Redeclaration resets the column: last declaration wins.
        columns.set(currentColumn, { type: 'string' });
      }
    } else if (line.startsWith('<columnProperty=') && currentColumn !== null) {
      const match = line.match(COLUMN_PROPERTY_RE);
      const props = columns.get(currentColumn);
      if (!match || !props) continue;

      const prop = match[1]!;
      if (prop.includes('specialType')) {
        props.specialType = textAfter(prop, 'specialType');
      } else if (prop.includes('parent')) {
        props.parent = textAfter(prop, 'parent');
      }
    }
  }

  return columns;
}

/** Names of the columns declared as structure identifiers (`specialType idcode`). */
export function listStructureColumns(columns: Iterable<[string, ColumnProperties]>): string[] {
  const names: string[] = [];
  for (const [name, props] of columns) {
    if ((props.specialType ?? '').toLowerCase() === 'idcode') names.push(name);
  }
  return names;
}
