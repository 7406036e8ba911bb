#!/usr/bin/env node
/**
 * Decoder script run by `nodeDecoder.ts`.
 *
 * Usage:
 *   node idcodeToSmiles.js <idcode1> [idcode2] ...
 *   printf 'idcode1\nidcode2\n' | node idcodeToSmiles.js
 *
 * Prints one line per identifier: `<i>:<smiles>` or `<i>:ERROR:<reason>`.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Molecule } from 'openchemlib';

export function decodeIdcode(idcode: string): string {
  if (!idcode) {
    throw new Error('IDCode cannot be empty');
  }

  try {
    const smiles = Molecule.fromIDCode(idcode).toSmiles();
    if (!smiles) {
      throw new Error('Failed to generate SMILES');
    }
    return smiles;
  } catch (err) {
    throw new Error(`Failed to decode: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function decodeAll(idcodes: readonly string[]): string[] {
  return idcodes.map((idcode, i) => {
    try {
      return `${i}:${decodeIdcode(idcode)}`;
    } catch (err) {
      return `${i}:ERROR:${err instanceof Error ? err.message : String(err)}`;
    }
  });
}

type InputStream = AsyncIterable<string | Buffer> & { isTTY?: boolean };

async function readLines(stdin: InputStream): Promise<string[]> {
  if (stdin.isTTY) return [];
  let input = '';
  for await (const chunk of stdin) {
    input += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
  }
  return input.split(/\r?\n/).filter(line => line.length > 0);
}

/** Identifiers come from `args`, or from `stdin` when there are none. Returns the exit code. */
export async function runDecoder(args: string[], stdin: InputStream = process.stdin): Promise<number> {
  const idcodes = args.length > 0 ? args : await readLines(stdin);

  if (idcodes.length === 0) {
    console.error('Please provide ID codes as arguments or on stdin');
    console.error('Usage: node idcodeToSmiles.js <idcode1> [idcode2] [idcode3] ...');
    return 1;
  }

  process.stdout.write(`${decodeAll(idcodes).join('\n')}\n`);
  return 0;
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    return entryPath === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  runDecoder(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(err => {
    console.error('[dwar-mcp] Decoder fatal:', err);
    process.exitCode = 1;
  });
}
