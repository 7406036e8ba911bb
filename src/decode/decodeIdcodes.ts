import { parsePositiveIntEnv } from '../shared/index.js';
import type { Cell } from '../dwar/types.js';
import { nodeIdcodeDecoder } from './nodeDecoder.js';

export const DEFAULT_DECODE_TIMEOUT_MS = 30_000;

export interface DecoderCallOptions {
  timeoutMs: number;
}

/**
 * Resolves a batch of identifiers in one call. Output is text with one
 * `<index>:<smiles>` or `<index>:ERROR:<reason>` line per decoded item, where
 * index addresses the submitted batch. Lines may arrive in any order.
 */
export type IdcodeDecoder = (idcodes: string[], opts: DecoderCallOptions) => Promise<string>;

export interface DecodeOptions {
  decoder?: IdcodeDecoder;
  timeoutMs?: number;
}

export function decoderTimeoutMs(): number {
  return parsePositiveIntEnv('DWAR_DECODER_TIMEOUT_MS', DEFAULT_DECODE_TIMEOUT_MS);
}

function isNonBlank(value: Cell): value is string {
  return value !== null && value.trim().length > 0;
}

/** Identifier value → every position holding it, keyed in first-seen order. */
function indexPositions(idcodes: readonly Cell[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  idcodes.forEach((value, i) => {
    if (!isNonBlank(value)) return;
    const seen = positions.get(value);
    if (seen) seen.push(i);
    else positions.set(value, [i]);
  });
  return positions;
}

export function parseDecoderOutput(stdout: string, batch: readonly string[]): Map<string, string> {
  const decoded = new Map<string, string>();
  for (const line of stdout.split(/\r?\n/)) {
    const sep = line.indexOf(':');
    if (sep === -1) continue;

    const value = line.slice(sep + 1);
    if (value.startsWith('ERROR:')) continue;

    const indexText = line.slice(0, sep).trim();
    if (!/^\d+$/.test(indexText)) continue;
    const position = Number(indexText);
    if (position >= batch.length) continue;
    decoded.set(batch[position]!, value);
  }
  return decoded;
}

/**
 * Decode one column of identifiers. The result has the input's length and
 * order; a position is null when it was blank or its identifier did not
 * decode. Each distinct identifier is submitted once and its result is copied
 * to every row that holds it. A failed decoder call is logged and yields an
 * all-null column.
 */
export async function decodeIdcodes(idcodes: readonly Cell[], opts: DecodeOptions = {}): Promise<Cell[]> {
  const results: Cell[] = idcodes.map(() => null);

  const positions = indexPositions(idcodes);
  if (positions.size === 0) return results;

  const batch = [...positions.keys()];
  const decoder = opts.decoder ?? nodeIdcodeDecoder;
  const timeoutMs = opts.timeoutMs ?? decoderTimeoutMs();

  let stdout: string;
  try {
    stdout = await decoder(batch, { timeoutMs });
  } catch (err) {
    console.error('[dwar-mcp] Decoding failed:', err instanceof Error ? err.message : String(err));
    return results;
  }

  for (const [idcode, smiles] of parseDecoderOutput(stdout, batch)) {
    for (const i of positions.get(idcode) ?? []) {
      results[i] = smiles;
    }
  }
  return results;
}
