/**
 * Leveled logger writing to stderr. stdout is reserved for the stdio transport.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;

  return {
    debug: (message, ...args) => {
      if (process.env.DEBUG) {
        console.error(`${prefix('DEBUG')} ${message}`, ...args);
      }
    },

    info: (message, ...args) => {
      console.error(`${prefix('INFO')} ${message}`, ...args);
    },

    warn: (message, ...args) => {
      console.error(`${prefix('WARN')} ${message}`, ...args);
    },

    error: (message, ...args) => {
      console.error(`${prefix('ERROR')} ${message}`, ...args);
    }
  };
}

export const log = createLogger('server');
