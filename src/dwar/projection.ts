import { dropColumns } from './assembleTable.js';
import type { DecodePlan, DwarTable } from './types.js';

export const COORDINATE_PATTERNS = ['coordinate', 'coord', 'atomcoord', 'scaffoldatom'] as const;
export const FINGERPRINT_SUFFIX = 'Fp';

export interface ProjectionOptions {
  excludeStructureColumns: boolean;
}

function isCoordinateColumn(name: string): boolean {
  const lower = name.toLowerCase();
  return COORDINATE_PATTERNS.some(pattern => lower.includes(pattern));
}

/**
 * Drop structural by-products once decoding is done. Identifier, coordinate
 * and `Smiles` columns go only when structure columns are excluded;
 * fingerprint columns always go.
 */
export function projectColumns(table: DwarTable, plan: DecodePlan, opts: ProjectionOptions): DwarTable {
  let result = table;

  if (opts.excludeStructureColumns) {
    const drop = new Set<string>(plan.toRemove.filter(name => table.columns.includes(name)));
    for (const name of table.columns) {
      if (isCoordinateColumn(name) || name.toLowerCase() === 'smiles') drop.add(name);
    }

    if (drop.size > 0) {
      result = dropColumns(result, drop);
      console.error(`[dwar-mcp] Removed ID code/coordinate/Smiles columns: ${[...drop].join(', ')}`);
    } else {
      console.error('[dwar-mcp] No ID code/coordinate/Smiles columns detected for removal');
    }
  }

  const fingerprints = new Set(result.columns.filter(name => name.endsWith(FINGERPRINT_SUFFIX)));
  if (fingerprints.size > 0) {
    result = dropColumns(result, fingerprints);
    console.error(`[dwar-mcp] Removed fingerprint columns: ${[...fingerprints].join(', ')}`);
  }

  return result;
}
