import { formatError } from '../shared/index.js';
import { decodeIdcodes, type DecodeOptions } from '../decode/decodeIdcodes.js';
import { assembleTable, columnValues, withColumn } from './assembleTable.js';
import { locateBody } from './bodyLocator.js';
import { extractColumnProperties } from './columnProperties.js';
import { planDecode } from './decodePlan.js';
import { isDwarFile, readDwarText } from './fileInfo.js';
import { projectColumns } from './projection.js';
import type { BodyLocator, DecodePlan, DwarTable } from './types.js';

export const SMILES_SUFFIX = '_SMILES';

export interface LoadOptions extends DecodeOptions {
  /** Drop identifier, coordinate and `Smiles` columns after decoding. Default true. */
  excludeStructureColumns?: boolean;
  bodyLocator?: BodyLocator;
}

async function decodeStructureColumns(table: DwarTable, plan: DecodePlan, opts: DecodeOptions): Promise<DwarTable> {
  if (plan.toDecode.length === 0) {
    console.error('[dwar-mcp] No structure columns found for decoding');
    return table;
  }
  console.error(`[dwar-mcp] Found structure columns: ${plan.toDecode.join(', ')}`);

  let result = table;
  for (const column of plan.toDecode) {
    console.error(`[dwar-mcp] Decoding structures in column: ${column}`);
    const idcodes = columnValues(result, column);
    const smiles = await decodeIdcodes(idcodes, opts);
    result = withColumn(result, `${column}${SMILES_SUFFIX}`, smiles);

    const decoded = smiles.filter(value => value !== null).length;
    const total = idcodes.filter(value => value !== null && value.trim().length > 0).length;
    console.error(`[dwar-mcp] Successfully decoded ${decoded}/${total} structures in ${column}`);
  }
  return result;
}

/**
 * Convert DataWarrior document text into a table, decoding `idcode` columns
 * into `<name>_SMILES` columns.
 */
export async function parseDwar(content: string, opts: LoadOptions = {}): Promise<DwarTable> {
  if (!isDwarFile(content)) {
    throw formatError('File does not appear to be a valid DWAR file');
  }

  const { header, dataRows } = (opts.bodyLocator ?? locateBody)(content);
  if (dataRows.length === 0) {
    console.error('[dwar-mcp] Warning: no data found in DWAR file');
    return { columns: [], rows: [] };
  }

  const properties = extractColumnProperties(content);
  const table = assembleTable(header, dataRows);
  console.error(`[dwar-mcp] Loaded ${table.rows.length} rows with ${table.columns.length} columns`);

  const plan = planDecode(table.columns, properties);
  const decoded = await decodeStructureColumns(table, plan, opts);

  return projectColumns(decoded, plan, {
    excludeStructureColumns: opts.excludeStructureColumns ?? true,
  });
}

export async function loadDwar(filePath: string, opts: LoadOptions = {}): Promise<DwarTable> {
  console.error(`[dwar-mcp] Parsing DWAR file: ${filePath}`);
  return parseDwar(readDwarText(filePath), opts);
}
