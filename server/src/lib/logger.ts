export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger that prefixes every line with a bracketed component tag,
 * e.g. `[mm] matched ...`. Lines below `level` are dropped.
 */
export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const prefix = `[${tag}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
    child: (childTag) => createLogger(childTag, level),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
