/**
 * stdout belongs to JSON-RPC while the MCP server runs. The loaders log a line
 * per stage, so every console method that would write to stdout goes to
 * stderr instead.
 */

const STDOUT_METHODS = ['log', 'info', 'debug'] as const;

const toStderr = (...args: unknown[]): void => {
  console.error(...args);
};

for (const method of STDOUT_METHODS) {
  console[method] = toStderr;
}
