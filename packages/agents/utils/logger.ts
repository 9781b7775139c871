// Scoped structured logger for orchestrator and agent diagnostics
// Writes `[scope:LEVEL] message {json}` lines to stderr so stdout stays free for CLI output

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function thresholdFromEnv(): LogLevel {
  const env = process.env.CIM_LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

export function formatLogLine(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  return data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
}

export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: LogSink } = {},
): Logger {
  const threshold = LEVEL_RANK[options.level ?? thresholdFromEnv()];
  const sink: LogSink = options.sink ?? ((line) => console.error(line));

  const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(formatLogLine(scope, level, message, data));
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/** Logger that drops everything; handy for tests and library embedding. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
