// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Receives one formatted log line. Defaults to stderr so stdout stays parseable. */
export type LogSink = (line: string, args: unknown[]) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = (line, args) => {
  console.error(line, ...args);
};

export function createLogger(level: LogLevel = 'info', options?: LoggerOptions): Logger {
  const threshold = LOG_LEVELS[level];
  const sink = options?.sink ?? stderrSink;
  const scope = options?.scope ? ` [${options.scope}]` : '';

  function log(msgLevel: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] >= threshold) {
      const timestamp = new Date().toISOString();
      sink(`[${timestamp}] ${msgLevel.toUpperCase()}${scope}: ${message}`, args);
    }
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

/** Logger that drops everything. Used when the caller supplies none. */
export const silentLogger: Logger = createLogger('silent');
