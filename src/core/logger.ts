/**
 * Logger System
 * Leveled diagnostics for the CLI. Lines go to stderr so that command
 * output on stdout stays pipeable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  /** `cause` may be anything that was thrown */
  error(message: string, cause?: unknown, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(entryLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export type LogSink = (entry: LogEntry) => void;

/**
 * One stderr line: `keepc: <level>: <message> <context json>`
 */
export function formatLogEntry(entry: LogEntry): string {
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `keepc: ${entry.level}: ${entry.message}${contextStr}`;
}

export const stderrSink: LogSink = (entry) => {
  process.stderr.write(`${formatLogEntry(entry)}\n`);
};

function causeContext(cause: unknown): Record<string, unknown> {
  if (cause instanceof Error) {
    return { errorMessage: cause.message, errorStack: cause.stack };
  }
  return { errorMessage: String(cause) };
}

export class LoggerImpl implements Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'warn', sink: LogSink = stderrSink) {
    this.level = level;
    this.sink = sink;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (shouldLog(level, this.level)) {
      this.sink({ level, message, context });
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, cause?: unknown, context?: Record<string, unknown>): void {
    const merged = cause === undefined ? context : { ...context, ...causeContext(cause) };
    this.log('error', message, merged);
  }
}

export function createLogger(level: LogLevel = 'warn', sink?: LogSink): Logger {
  return new LoggerImpl(level, sink);
}

/**
 * Logger that drops everything, for callers that have no logger to pass
 */
export function createSilentLogger(): Logger {
  return new LoggerImpl('error', () => {});
}
