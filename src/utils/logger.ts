/**
 * Structured logging for the parser, writer and CLI.
 *
 * Entries are written to stderr as one JSON object per line so that stdout
 * stays reserved for command output such as formatted documents.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: parser tracing (sections opened, comment truncation); off by default
 * - `info`: normal operation, e.g. a file was rewritten
 * - `warn`: recoverable problems such as an unreadable yini.toml
 * - `error`: failures reported to the user
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "LineParser"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "section_opened"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { name: "server", depth: 1, line: 4 }
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
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'LineParser', debugMode: true });
 * logger.debug('section_opened', { name: 'server', depth: 1 });
 * logger.warn('config_load_failed', { path: 'yini.toml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Whether debug entries are emitted.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Returns a logger for another component with the same debug setting.
   *
   * @param component - Name of the derived component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
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

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
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
 * Serializes an entry, replacing data that JSON cannot represent (cycles,
 * BigInt) with a marker so that one line is always written.
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

/**
 * Default logger for library code. Debug output is disabled; pass a logger
 * created with `debugMode: true` to trace parsing.
 */
export const logger = new Logger({ component: 'yini', debugMode: false });
