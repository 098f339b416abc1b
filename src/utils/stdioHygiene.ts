/**
 * MCP speaks JSON-RPC on stdout, so nothing else may be written there.
 * console.log/info/debug are rerouted to stderr on import; codec errors are
 * reported in tool results and never printed.
 */

const LOG_PREFIX = '[gto-formats-mcp]';

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

for (const method of ['log', 'info', 'debug'] as const) {
  if (console[method] !== routeToStderr) console[method] = routeToStderr;
}

/** Server lifecycle messages, prefixed and written to stderr. */
export function logServer(message: string, ...details: unknown[]): void {
  console.error(`${LOG_PREFIX} ${message}`, ...details);
}
