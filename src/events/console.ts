/**
 * Operational logger used by the bus, agents and distributor.
 *
 * Components take a `Logger` so tests and embedders can capture or silence
 * output; the default writes to the console with a `[mesh]` prefix.
 */

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function write(fn: (...args: unknown[]) => void, message: string, meta?: Record<string, unknown>): void {
  if (meta === undefined) fn(`[mesh] ${message}`);
  else fn(`[mesh] ${message}`, meta);
}

export const consoleLogger: Logger = {
  info: (message, meta) => write(console.info, message, meta),
  warn: (message, meta) => write(console.warn, message, meta),
  error: (message, meta) => write(console.error, message, meta),
};

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Error message for logs, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
