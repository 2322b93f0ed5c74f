/**
 * Structured logging for fleet-notify components.
 *
 * Every entry is a single JSON line on stderr so that the output of the
 * transport, synchronizer and workflow can be aggregated and filtered by
 * component.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostics, emitted only in debug mode
 * - `info`: Normal operation (session opened, notification created)
 * - `warn`: Recoverable anomalies (compensation performed, stale token)
 * - `error`: Failures that propagate to the caller
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry.
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
   * @example "NotificationSynchronizer"
   */
  readonly component: string;

  /**
   * Short snake_case description of the event.
   * @example "remote_create_succeeded"
   */
  readonly event: string;

  /**
   * Additional structured context.
   * @example { customerId: 7, remoteId: 31 }
   */
  readonly data?: Record<string, unknown>;

  /** Present when `data` could not be serialized. */
  readonly serializationError?: string;

  /** Set to `"[unserializable]"` together with `serializationError`. */
  readonly originalData?: string;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'HttpTransport', debugMode: true });
 * logger.info('request_sent', { svc: 'core/logout' });
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
   * Creates a logger for another component sharing this logger's debug mode.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
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

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };

    if (data === undefined) {
      process.stderr.write(JSON.stringify(base) + '\n');
      return;
    }

    let line: string;
    try {
      const entry: LogEntry = { ...base, data };
      line = JSON.stringify(entry);
    } catch (error) {
      const fallback: LogEntry = {
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      };
      line = JSON.stringify(fallback);
    }

    process.stderr.write(line + '\n');
  }
}

/**
 * Logger that discards every entry. Used as the default for library
 * components constructed without an explicit logger.
 */
export class SilentLogger extends Logger {
  constructor(component = 'silent') {
    super({ component });
  }

  override child(component: string): Logger {
    return new SilentLogger(component);
  }

  override debug(): void {
    return;
  }

  override info(): void {
    return;
  }

  override warn(): void {
    return;
  }

  override error(): void {
    return;
  }
}
