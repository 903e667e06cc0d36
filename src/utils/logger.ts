/**
 * Component logger. Everything goes to stderr: stdout carries the MCP stdio transport.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(component: string, debugEnabled: boolean = false): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...meta) => {
      if (debugEnabled) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...meta);
      }
    },
    info: (message, ...meta) => console.error(`${prefix} ${message}`, ...meta),
    warn: (message, ...meta) => console.error(`${prefix} ⚠️ ${message}`, ...meta),
    error: (message, ...meta) => console.error(`${prefix} ✗ ${message}`, ...meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
