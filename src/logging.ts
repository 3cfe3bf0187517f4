/**
 * chunkframe — structured logging
 *
 * A small logger interface that callers can inject into engines, tables and
 * writers. Context values are JSON-compatible so entries can be emitted as
 * one JSON object per line.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ minLevel: 'debug', format: 'json' });
 * const engine = createEngine({ logLevel: 'debug' }, new FileStore(), logger);
 * ```
 */

// ─── Types ────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

export interface LogContext {
  /** Table path or query source */
  path?: string;
  /** Engine operation being performed */
  operation?: string;
  /** Rows produced or consumed */
  rows?: number;
  /** Columns involved */
  columns?: string[];
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level:     LogLevel;
  message:   string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?:  LogContext;
  error?:    Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'warn') */
  minLevel?: LogLevel;
  /** Receives every entry at or above minLevel */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for human-readable */
  format?: 'json' | 'pretty';
}

/** Logger that keeps every entry in memory, for assertions in tests. */
export interface TestLogger extends Logger {
  readonly entries: readonly LogEntry[];
  entriesAt(level: LogLevel): LogEntry[];
  clear(): void;
}

// ─── Level filtering ──────────────────────────────────────────────────────────

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info:  1,
  warn:  2,
  error: 3,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

// ─── Factories ────────────────────────────────────────────────────────────────

/** Build a logger that routes entries at or above `minLevel` to `output`. */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'warn';
  const output   = config.output ?? (() => undefined);

  const emit = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isLevelEnabled(level, minLevel)) return;
    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) entry.context = context;
    if (error !== undefined)   entry.error   = error;
    output(entry);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info:  (message, context) => emit('info',  message, context),
    warn:  (message, context) => emit('warn',  message, context),
    error: (message, error, context) => emit('error', message, context, error),
  };
}

export function formatEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level:     entry.level,
      message:   entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
      ...entry.context,
      ...(entry.error !== undefined
        ? { error: { name: entry.error.name, message: entry.error.message } }
        : {}),
    });
  }

  const time  = new Date(entry.timestamp).toISOString();
  const ctx   = entry.context !== undefined ? ` ${JSON.stringify(entry.context)}` : '';
  const error = entry.error !== undefined ? ` (${entry.error.name}: ${entry.error.message})` : '';
  return `${time} ${entry.level.toUpperCase().padEnd(5)} ${entry.message}${ctx}${error}`;
}

/** Logger writing to the console: warn and error to stderr, the rest to stdout. */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'pretty';
  return createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      const line = formatEntry(entry, format);
      if (entry.level === 'error' || entry.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info:  () => undefined,
  warn:  () => undefined,
  error: () => undefined,
};

export function createTestLogger(minLevel: LogLevel = 'debug'): TestLogger {
  const entries: LogEntry[] = [];
  const inner = createLogger({ minLevel, output: (entry) => { entries.push(entry); } });
  return {
    ...inner,
    entries,
    entriesAt: (level) => entries.filter((e) => e.level === level),
    clear: () => { entries.length = 0; },
  };
}
