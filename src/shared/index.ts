export { DwarError, formatError, invalidParams, notFound, upstreamError } from './errors.js';
export type { ErrorCode } from './errors.js';
export { parsePositiveIntEnv, readStringEnv } from './env.js';
export { runNodeScript } from './nodeProcess.js';
export type { NodeScriptOptions } from './nodeProcess.js';
