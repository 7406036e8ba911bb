import { spawn } from 'child_process';
import { parsePositiveIntEnv } from './env.js';
import { DwarError, invalidParams, upstreamError } from './errors.js';

const NODE_MAX_STDOUT_BYTES = parsePositiveIntEnv('DWAR_DECODER_MAX_STDOUT_BYTES', 64 * 1024 * 1024);
const NODE_CONCURRENCY = parsePositiveIntEnv('DWAR_DECODER_CONCURRENCY', 2);

let inFlight = 0;
const queue: Array<() => void> = [];

async function withProcessConcurrencyLimit<T>(fn: () => Promise<T>): Promise<T> {
  if (inFlight >= NODE_CONCURRENCY) {
    await new Promise<void>(resolve => queue.push(resolve));
  }

  inFlight += 1;
  try {
    return await fn();
  } finally {
    inFlight -= 1;
    const next = queue.shift();
    if (next) next();
  }
}

export interface NodeScriptOptions {
  nodeBin: string;
  args?: string[];
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  timeoutMs: number;
}

/**
 * Run a Node.js script and return its stdout. Rejects with an UPSTREAM_ERROR
 * on timeout, non-zero exit or oversized output.
 */
export async function runNodeScript(scriptPath: string, opts: NodeScriptOptions): Promise<string> {
  return withProcessConcurrencyLimit(async () => {
    const args = [scriptPath, ...(opts.args ?? [])];

    const res = await new Promise<{ status: number | null; stdout: string; stderr: string }>((resolve, reject) => {
      const child = spawn(opts.nodeBin, args, { stdio: ['pipe', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';
      let exceeded = false;
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, opts.timeoutMs);

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');

      child.stdout?.on('data', (chunk: string) => {
        if (exceeded) return;
        stdout += chunk;
        if (stdout.length > NODE_MAX_STDOUT_BYTES) {
          exceeded = true;
          child.kill();
        }
      });
      child.stderr?.on('data', (chunk: string) => {
        if (stderr.length > 1024 * 1024) return;
        stderr += chunk;
      });

      // EPIPE when the child exits before reading all of stdin surfaces through 'close'
      child.stdin?.on('error', () => undefined);
      if (opts.input !== undefined) {
        child.stdin?.end(opts.input);
      } else {
        child.stdin?.end();
      }

      child.on('error', err => {
        clearTimeout(timer);
        reject(err);
      });
      child.on('close', status => {
        clearTimeout(timer);
        if (timedOut) {
          reject(upstreamError(`node script timed out after ${opts.timeoutMs} ms`, {
            script: scriptPath,
            timeout_ms: opts.timeoutMs,
          }));
          return;
        }
        if (exceeded) {
          reject(
            upstreamError('node script output exceeded DWAR_DECODER_MAX_STDOUT_BYTES', {
              max_bytes: NODE_MAX_STDOUT_BYTES,
              script: scriptPath,
            })
          );
          return;
        }
        resolve({ status, stdout, stderr });
      });
    }).catch(err => {
      if (err instanceof DwarError) throw err;
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code === 'ENOENT') {
        throw invalidParams(`${opts.nodeBin} not found; install Node.js or set DWAR_NODE_BIN`, {
          which: opts.nodeBin,
        });
      }
      throw upstreamError('node script execution failed', {
        code,
        message: err instanceof Error ? err.message : String(err),
        script: scriptPath,
      });
    });

    if (res.status !== 0) {
      throw upstreamError('node script exited with a non-zero status', {
        status: res.status,
        stderr: res.stderr?.trim() || undefined,
        script: scriptPath,
      });
    }

    return res.stdout;
  });
}
