import type { ColumnPropertyMap, DecodePlan } from './types.js';

/**
 * Identifier columns are found from metadata alone; cell contents are never
 * sniffed. Planned in declaration order.
 */
export function planDecode(columns: readonly string[], properties: ColumnPropertyMap): DecodePlan {
  const present = new Set(columns);
  const toDecode: string[] = [];

  for (const [name, props] of properties) {
    if (!present.has(name)) continue;
    if ((props.specialType ?? '').toLowerCase() === 'idcode') {
      toDecode.push(name);
    }
  }

  return { toDecode, toRemove: [...toDecode] };
}
