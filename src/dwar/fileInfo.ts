import * as fs from 'fs';
import { notFound } from '../shared/index.js';
import { locateBody } from './bodyLocator.js';
import { extractColumnProperties } from './columnProperties.js';
import { COLUMN_PROPERTIES_OPEN, FILE_INFO_MARKER, type BodyLocator, type DwarInfo } from './types.js';

const VERSION_RE = /version\s+(\S+)/;
const CREATED_RE = /created\s+(.+)/;

export function isDwarFile(content: string): boolean {
  return content.includes(FILE_INFO_MARKER) || content.includes(COLUMN_PROPERTIES_OPEN);
}

export function readDwarText(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw notFound(`File '${filePath}' not found`, { path: filePath });
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * File-level metadata without building the table. `rowcount` counts the data
 * lines the body locator finds, before empty rows are dropped.
 */
export function describeDwar(content: string, bodyLocator: BodyLocator = locateBody): DwarInfo {
  const info: DwarInfo = { rowcount: 0, columns: {} };

  const version = content.match(VERSION_RE);
  if (version) info.version = version[1]!;

  const created = content.match(CREATED_RE);
  if (created) info.created = created[1]!.trim();

  info.rowcount = bodyLocator(content).dataRows.length;
  info.columns = Object.fromEntries(extractColumnProperties(content));
  return info;
}

export function getDwarInfo(filePath: string, bodyLocator: BodyLocator = locateBody): DwarInfo {
  console.error(`[dwar-mcp] Getting file info for: ${filePath}`);
  const info = describeDwar(readDwarText(filePath), bodyLocator);
  console.error(`[dwar-mcp] File info: ${JSON.stringify(info)}`);
  return info;
}
