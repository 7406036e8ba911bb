/**
 * Child-process decoder: runs `idcodeToSmiles.js` under Node.js with the batch
 * on stdin, one identifier per line.
 *
 * Script resolution:
 *   1. DWAR_DECODER_SCRIPT env
 *   2. idcodeToSmiles.js beside this module (present after `npm run build`)
 */

import * as fs from 'fs';
import * as path from 'path';
import { execFileSync } from 'child_process';
import { fileURLToPath } from 'url';
import { invalidParams, readStringEnv, runNodeScript } from '../shared/index.js';
import type { DecoderCallOptions } from './decodeIdcodes.js';

export const DECODER_SCRIPT_ENV = 'DWAR_DECODER_SCRIPT';
export const NODE_BIN_ENV = 'DWAR_NODE_BIN';
export const DECODER_MODULES = ['openchemlib'] as const;

export function resolveDecoderScript(): string {
  return readStringEnv(DECODER_SCRIPT_ENV) ?? fileURLToPath(new URL('./idcodeToSmiles.js', import.meta.url));
}

export function resolveNodeBin(): string {
  return readStringEnv(NODE_BIN_ENV) ?? process.execPath;
}

export async function nodeIdcodeDecoder(idcodes: string[], opts: DecoderCallOptions): Promise<string> {
  return runNodeScript(resolveDecoderScript(), {
    nodeBin: resolveNodeBin(),
    input: `${idcodes.join('\n')}\n`,
    timeoutMs: opts.timeoutMs,
  });
}

export interface DecoderDependencies {
  nodeVersion: string;
  scriptPath: string;
  /** Installed package directory for each of DECODER_MODULES. */
  modules: Record<string, string>;
}

/** Package directory Node's resolver would find for `name` from `fromDir`, or null. */
export function findInstalledModule(name: string, fromDir: string): string | null {
  let dir = path.resolve(fromDir);
  for (;;) {
    const pkgDir = path.join(dir, 'node_modules', name);
    if (fs.existsSync(path.join(pkgDir, 'package.json'))) return pkgDir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * One-time capability check for callers about to decode. Not part of the
 * parsing pipeline, which degrades to undecoded columns on its own.
 */
export function checkDecoderDependencies(): DecoderDependencies {
  const nodeBin = resolveNodeBin();
  let nodeVersion: string;
  try {
    nodeVersion = execFileSync(nodeBin, ['--version'], { encoding: 'utf-8' }).trim();
  } catch (err) {
    throw invalidParams('Node.js is required for structure decoding but is not available', {
      node_bin: nodeBin,
      message: err instanceof Error ? err.message : String(err),
      how_to: `Install Node.js or set ${NODE_BIN_ENV}=/path/to/node`,
    });
  }

  const scriptPath = resolveDecoderScript();
  if (!fs.existsSync(scriptPath)) {
    throw invalidParams(`Required decoder script not found: ${scriptPath}`, {
      script: scriptPath,
      how_to: `Run \`npm run build\` or set ${DECODER_SCRIPT_ENV}=/path/to/idcodeToSmiles.js`,
    });
  }

  const modules: Record<string, string> = {};
  for (const name of DECODER_MODULES) {
    const pkgDir = findInstalledModule(name, path.dirname(scriptPath));
    if (pkgDir === null) {
      throw invalidParams(`Required Node.js module not installed for the decoder: ${name}`, {
        module: name,
        script: scriptPath,
        how_to: `Run \`npm install ${name}\` in the project that holds the decoder script`,
      });
    }
    modules[name] = pkgDir;
  }

  return { nodeVersion, scriptPath, modules };
}
