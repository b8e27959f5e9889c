/**
 * Component-tagged logging.
 *
 * CRITICAL: NEVER use console.log() for diagnostics - stdout is reserved for
 * the MCP JSON-RPC stream and for values a CLI caller pipes along.
 * Everything here goes to console.error().
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Create a logger whose lines read `[Tag] LEVEL: message`.
 * Debug lines are dropped unless `verbose` is set.
 */
export function createLogger(tag: string, verbose: boolean = false): Logger {
  const write = (level: string, message: string): void => {
    console.error(`[${tag}] ${level}: ${message}`);
  };
  return {
    debug: (message) => {
      if (verbose) write('DEBUG', message);
    },
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    error: (message) => write('ERROR', message),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
