/**
 * Console logging with a prefix and a level threshold
 *
 * - Threshold comes from the EDM_LOG_LEVEL environment variable, default "warn"
 * - Errors carry a timestamp
 *
 * Usage:
 *   const log = createLogger('Decoder');
 *   log.debug('Flight header', header);  // Silent unless EDM_LOG_LEVEL=debug
 *   log.warn('Unknown header tag');      // Visible by default
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.EDM_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

function formatMessage(prefix: string, message: string, timestamp: boolean): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : '';
  return `${ts}[${prefix}] ${message}`;
}

function createLogger(prefix: string, level: LogLevel = defaultLevel()): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_RANK[wanted] >= LEVEL_RANK[level];

  return {
    debug(message: string, ...args: unknown[]) {
      if (enabled('debug')) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (enabled('info')) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      if (enabled('warn')) {
        console.warn(formatMessage(prefix, message, false), ...args);
      }
    },

    error(message: string, ...args: unknown[]) {
      if (enabled('error')) {
        console.error(formatMessage(prefix, message, true), ...args);
      }
    },

    /**
     * Sub-logger with an extended prefix and the same threshold
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`, level);
    },
  };
}

export { createLogger };
