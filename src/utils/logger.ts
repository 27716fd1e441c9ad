/**
 * Structured logging utility.
 *
 * Emits one JSON object per line on stderr so that generator diagnostics can
 * be filtered by the build tooling that invokes ifgen.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: touched files and other detail, only with verbose output
 * - `info`: general informational messages about normal operation
 * - `warn`: conditions that skip an artifact but do not fail the run
 * - `error`: failures
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
   * @example "ParseCache"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "file_written"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { path: "out/INfc.h" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Receives each serialized log line, newline included.
 */
export type LogWriter = (line: string) => void;

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
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Destination for serialized entries.
   * @defaultValue writes to process.stderr
   */
  readonly writer?: LogWriter;
}

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Driver', debugMode: true });
 * logger.debug('file_written', { path: 'out/INfc.h' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly writer: LogWriter;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.writer = options.writer ?? stderrWriter;
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, writer: this.writer });
  }

  isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
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

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.writer(line + '\n');
  }
}
