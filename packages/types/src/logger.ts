/**
 * Structured logging for nodes, the simulation driver and the CLI.
 *
 * Entries are JSON objects with a level, message, timestamp, optional
 * component and any bound or per-call fields. The default sink writes one
 * JSON line per entry to stderr so that stdout stays free for narration.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater than
 * or equal to the logger's threshold; {@link LogLevel.SILENT} suppresses all.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Human-readable level name (e.g. "DEBUG", "INFO"). */
  level: string;
  message: string;
  /** ISO 8601 timestamp of when the entry was created. */
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

/** Receives every entry that passes the level filter. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.error(JSON.stringify(entry));
};

/**
 * Parse a level name (`debug`, `info`, `warn`, `error`, `silent`,
 * case-insensitive). Returns `undefined` for anything else.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME[name.trim().toLowerCase()];
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  /** Custom output sink. Defaults to JSON lines on stderr. */
  output?: LogOutput;
  /** Fields attached to every entry this logger emits. */
  fields?: Record<string, unknown>;
}

/**
 * Structured logger with level filtering, bound fields and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'simulation' });
 * const nodeLog = log.child('node.3', { nodeId: 3 });
 * nodeLog.warn('peer disconnected, message dropped', { to: 2 });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly fields: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
    this.fields = options?.fields ?? {};
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger that shares this logger's level and sink.
   *
   * The component becomes `parent.child` when this logger already has one,
   * and `fields` are merged over the parent's bound fields.
   */
  child(component: string, fields?: Record<string, unknown>): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
      fields: { ...this.fields, ...fields },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ...this.fields,
      ...fields,
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
    };

    this.output(entry);
  }
}

// ─── Factory & shared instances ─────────────────────────────────────────────────

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** Logger at {@link LogLevel.INFO} writing JSON lines to stderr. */
export const defaultLogger: Logger = createLogger();

/** Logger that discards everything; the default for library code. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
