/**
 * Structured logging for the null-acceptance checker.
 *
 * Every entry is one JSON line on stderr, so log output never mixes with the
 * test runner's own reporting on stdout.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
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

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "nullproof"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "null_accepted"
   */
  readonly event: string;

  /** Additional structured data associated with the log entry. */
  readonly data?: Record<string, unknown>;

  /** Why `data` could not be serialized, when it could not. */
  readonly serializationError?: string;

  /** Placeholder written in place of unserializable `data`. */
  readonly originalData?: '[unserializable]';
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Sink for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'nullproof', debugMode: true });
 * logger.debug('parameter_exempt', { member: 'Widget.rename(string, number)', index: 1 });
 * logger.warn('null_accepted', { member: 'Widget.rename(string, number)', index: 0 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /** Whether debug entries are emitted. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. Only emitted when debugMode is enabled.
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
   * Returns a logger for a sub-component sharing this logger's sink and mode.
   *
   * @param component - Suffix appended to this logger's component name.
   */
  child(component: string): Logger {
    return new Logger({
      component: `${this.component}:${component}`,
      debugMode: this.debugMode,
      write: this.write,
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined && { data }),
    };

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, degrading to a placeholder when `data` contains
 * circular references or BigInt values.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _dropped, ...rest } = entry;
    const fallback: LogEntry = {
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    };
    return JSON.stringify(fallback);
  }
}

/**
 * Default logger instance for the checker.
 */
export const logger = new Logger({ component: 'nullproof', debugMode: false });
