/**
 * Structured logging to stderr. stdout carries the MCP protocol, so nothing
 * here may write to it.
 */

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Flatten an unknown thrown value into loggable fields
 */
export function errorFields(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, error_name: error.name };
  }
  return { error: String(error) };
}

/**
 * Create a logger that writes one JSON object per line.
 * DEBUG lines are dropped unless `debug` is set.
 */
export function createLogger(component: string, debug = false): Logger {
  const write = (severity: LogSeverity, message: string, fields?: Record<string, unknown>) => {
    if (severity === 'DEBUG' && !debug) {
      return;
    }

    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        severity,
        component,
        message,
        ...fields,
      })
    );
  };

  return {
    debug: (message, fields) => write('DEBUG', message, fields),
    info: (message, fields) => write('INFO', message, fields),
    warn: (message, fields) => write('WARN', message, fields),
    error: (message, fields) => write('ERROR', message, fields),
  };
}

/**
 * Logger that discards everything, for tests and embedding callers
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
