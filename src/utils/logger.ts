/**
 * Structured logging utility.
 *
 * Every entry is a single JSON line written to stderr, so config loading
 * never interferes with a host program's stdout.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: record resolution details, only emitted when debug is on
 * - `info`: config files created, loaded or generated
 * - `warn`: conditions that don't prevent operation but may need attention
 * - `error`: failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All log levels, from least to most severe.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /**
   * Severity level of the log entry.
   */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ConfigParser"
   */
  readonly component: string;

  /**
   * Brief description of the logged event.
   * @example "config_loaded"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { path: "/etc/app/config.toml", records: 3 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops regardless of `minLevel`.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Entries below this level are dropped.
   * @defaultValue 'debug'
   */
  readonly minLevel?: LogLevel;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConfigParser', debugMode: true });
 * logger.info('config_loaded', { path: 'app.toml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly minLevel: LogLevel;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.minLevel = options.minLevel ?? 'debug';
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /**
   * Whether entries of the given level would be written.
   *
   * @param level - The level to check.
   * @returns True if the level passes the logger's filters.
   */
  isEnabled(level: LogLevel): boolean {
    if (level === 'debug' && !this.debugMode) {
      return false;
    }
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes a log entry, falling back to an entry without data when the
 * data cannot be represented as JSON (circular references, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}
