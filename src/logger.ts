/**
 * Minimal leveled logger. Components take a `Logger` so tests can pass
 * `silentLogger` and the server can scope output per session.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  /** Logger that prefixes every line with `[scope]` */
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Create a console-backed logger that drops lines below `level`
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  scope?: string
): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = scope ? `[${scope}] ` : '';

  const write =
    (lineLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...meta: unknown[]): void => {
      if (LEVEL_ORDER[lineLevel] < threshold) return;
      console[lineLevel](`${prefix}${message}`, ...meta);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (childScope) =>
      createConsoleLogger(
        level,
        scope ? `${scope}:${childScope}` : childScope
      ),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
