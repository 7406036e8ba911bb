import * as fs from 'fs';
import * as path from 'path';
import { checkDecoderDependencies } from '../decode/nodeDecoder.js';
import { getDwarInfo, listStructureColumns, loadDwar, writeCsv } from '../dwar/index.js';

interface ConvertArgs {
  input?: string;
  output?: string;
  keepStructures: boolean;
  info: boolean;
}

function parseArgs(argv: string[]): ConvertArgs {
  const out: ConvertArgs = { keepStructures: false, info: false };
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index]!;
    if (arg === '--output' || arg === '-o') {
      const value = argv[++index];
      if (value === undefined || value.length === 0) throw new Error(`Missing value for ${arg}`);
      out.output = value;
    }
    else if (arg === '--keep-structures') out.keepStructures = true;
    else if (arg === '--info') out.info = true;
    else if (arg === '--help' || arg === '-h') throw new Error('help');
    else if (arg.startsWith('-')) throw new Error(`Unknown arg: ${arg}`);
    else if (out.input === undefined) out.input = arg;
    else throw new Error(`Unexpected argument: ${arg}`);
  }
  return out;
}

function usage(): string {
  return [
    'Convert DataWarrior (.dwar) files to CSV with SMILES decoding',
    '',
    'Usage:',
    '  dwar-mcp convert <input.dwar> [--output|-o <output.csv>] [--keep-structures]',
    '  dwar-mcp convert <input.dwar> --info',
    '',
    'Examples:',
    '  dwar-mcp convert input.dwar --output output.csv',
    '  dwar-mcp convert input.dwar --keep-structures',
    '  dwar-mcp convert input.dwar --info',
  ].join('\n');
}

export function defaultCsvPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.csv`);
}

/**
 * Returns the process exit code. Errors are reported as one line on stderr.
 */
export async function runConvertCli(argv: string[]): Promise<number> {
  let args: ConvertArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === 'help') {
      console.error(usage());
      return 0;
    }
    console.error(`${message}\n${usage()}`);
    return 2;
  }

  if (!args.input) {
    console.error(`Missing input file.\n${usage()}`);
    return 2;
  }

  const input = path.resolve(args.input);
  if (!fs.existsSync(input)) {
    console.error(`Error: File '${args.input}' not found`);
    return 1;
  }

  try {
    if (args.info) {
      const info = getDwarInfo(input);
      const structureColumns = listStructureColumns(Object.entries(info.columns));
      process.stdout.write(`${JSON.stringify({
        file: input,
        version: info.version,
        created: info.created,
        rows: info.rowcount,
        columns: info.columns,
        structure_columns: structureColumns,
      }, null, 2)}\n`);
      return 0;
    }

    const deps = checkDecoderDependencies();
    console.error(`[dwar-mcp] Node.js ${deps.nodeVersion}, decoder ${deps.scriptPath}`);

    const table = await loadDwar(input, { excludeStructureColumns: !args.keepStructures });
    if (table.rows.length === 0) {
      console.error('Error: No data found in DWAR file');
      return 1;
    }

    const output = path.resolve(args.output ?? defaultCsvPath(input));
    writeCsv(table, output);
    process.stdout.write(`Successfully converted ${table.rows.length} rows to ${output}\n`);
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
