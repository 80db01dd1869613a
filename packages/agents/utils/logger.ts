// Structured stderr logger
// Lines look like: [Pipeline:WARN] message {"key":"value"}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Line sink, defaults to console.error so stdout stays clean for results */
  write?: (line: string) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => console.error(line));

  function log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < threshold) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    write(data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
