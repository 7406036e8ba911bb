export { extractColumnProperties, listStructureColumns } from './columnProperties.js';
export { locateBody } from './bodyLocator.js';
export { assembleTable, columnValues, dropColumns, withColumn } from './assembleTable.js';
export { planDecode } from './decodePlan.js';
export { projectColumns, COORDINATE_PATTERNS, FINGERPRINT_SUFFIX } from './projection.js';
export { describeDwar, getDwarInfo, isDwarFile, readDwarText } from './fileInfo.js';
export { loadDwar, parseDwar, SMILES_SUFFIX } from './loadDwar.js';
export type { LoadOptions } from './loadDwar.js';
export { toCsv, writeCsv } from './csv.js';
export type {
  BodyLocator,
  Cell,
  ColumnProperties,
  ColumnPropertyMap,
  DecodePlan,
  DwarInfo,
  DwarTable,
  LocatedBody,
} from './types.js';
