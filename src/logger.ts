/**
 * Prefixed stderr logging.
 * stdout belongs to the MCP stdio transport, so everything goes to stderr.
 */

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} Warning: ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    debug: (message, ...details) => {
      if (process.env.RESEARCH_DEBUG) {
        console.error(`${prefix} ${message}`, ...details);
      }
    },
  };
}
