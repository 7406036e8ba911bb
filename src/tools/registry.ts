import * as path from 'path';
import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { getDwarInfo, listStructureColumns, loadDwar, writeCsv, type DwarTable } from '../dwar/index.js';
import { defaultCsvPath } from '../cli/convert.js';
import { invalidParams } from '../shared/index.js';
import { DWAR_CONVERT, DWAR_INFO, DWAR_LOAD } from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolHandlerContext {}

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>, ctx: ToolHandlerContext): Promise<unknown>;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

function requireAbsolutePath(value: string, param: string): string {
  if (!path.isAbsolute(value)) {
    throw invalidParams(`${param} must be an absolute path`, { param, value });
  }
  return path.resolve(value);
}

function rowsAsRecords(table: DwarTable, offset: number, limit: number): Array<Record<string, string | null>> {
  return table.rows.slice(offset, offset + limit).map(row => {
    const record: Record<string, string | null> = {};
    table.columns.forEach((name, i) => {
      record[name] = row[i] ?? null;
    });
    return record;
  });
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const DwarInfoSchema = z.object({
  path: z.string().min(1).describe('Absolute path to a .dwar file'),
});

const DwarLoadSchema = z.object({
  path: z.string().min(1).describe('Absolute path to a .dwar file'),
  keep_structures: z.boolean().optional().default(false)
    .describe('Keep idcode, coordinate and Smiles columns next to the decoded *_SMILES columns'),
  offset: z.number().int().min(0).optional().default(0).describe('First row to return'),
  limit: z.number().int().min(1).max(1000).optional().default(100).describe('Maximum rows to return'),
});

const DwarConvertSchema = z.object({
  path: z.string().min(1).describe('Absolute path to a .dwar file'),
  output: z.string().min(1).optional().describe('Absolute CSV output path (default: input path with .csv extension)'),
  keep_structures: z.boolean().optional().default(false)
    .describe('Keep idcode, coordinate and Smiles columns in the CSV'),
});

// ── Tool Specs ────────────────────────────────────────────────────────────

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec<TSchema> {
  return spec;
}

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: DWAR_INFO,
    description: 'Return DataWarrior file metadata: version, creation date, data row count, declared column properties and structure (idcode) columns.',
    exposure: 'standard',
    zodSchema: DwarInfoSchema,
    handler: async (params) => {
      const info = getDwarInfo(requireAbsolutePath(params.path, 'path'));
      return { ...info, structure_columns: listStructureColumns(Object.entries(info.columns)) };
    },
  }),
  defineTool({
    name: DWAR_LOAD,
    description: 'Load a DataWarrior file as a table. Structure (idcode) columns are decoded into <name>_SMILES columns; fingerprint columns are dropped. Returns a page of rows keyed by column name.',
    exposure: 'standard',
    zodSchema: DwarLoadSchema,
    handler: async (params) => {
      const table = await loadDwar(requireAbsolutePath(params.path, 'path'), {
        excludeStructureColumns: !params.keep_structures,
      });
      return {
        columns: table.columns,
        row_count: table.rows.length,
        offset: params.offset,
        rows: rowsAsRecords(table, params.offset, params.limit),
      };
    },
  }),
  defineTool({
    name: DWAR_CONVERT,
    description: 'Convert a DataWarrior file to CSV on disk, decoding structure (idcode) columns to SMILES.',
    exposure: 'full',
    zodSchema: DwarConvertSchema,
    handler: async (params) => {
      const input = requireAbsolutePath(params.path, 'path');
      const output = params.output !== undefined
        ? requireAbsolutePath(params.output, 'output')
        : defaultCsvPath(input);
      const table = await loadDwar(input, { excludeStructureColumns: !params.keep_structures });
      writeCsv(table, output);
      return { output, rows: table.rows.length, columns: table.columns };
    },
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
