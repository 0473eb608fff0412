/**
 * Structured logging for config loading.
 *
 * Emits one JSON object per line on stderr. Debug entries trace how a config
 * was assembled (which sources were read, merged and followed) and are only
 * written when debug mode is on.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2025-02-06T12:05:01.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that produced the entry.
   * @example "loader"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "cascade_merged"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
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
  readonly debugMode?: boolean | undefined;

  /** Destination for serialized lines (injectable for testing). */
  readonly write?: ((line: string) => void) | undefined;
}

/**
 * Environment variable that switches on debug output for the default logger.
 */
export const DEBUG_ENV_VAR = 'CASCADE_CONFIG_DEBUG';

const TRUTHY_FLAGS: readonly string[] = ['1', 'true', 'yes', 'on'];

/**
 * Reads a boolean flag from an environment record.
 *
 * Accepts `1`, `true`, `yes` and `on`, case-insensitively; anything else,
 * including an unset variable, is false.
 *
 * @param env - Environment record to read.
 * @param name - Variable name.
 */
export function readEnvFlag(env: Record<string, string | undefined>, name: string): boolean {
  const raw = env[name];
  if (raw === undefined) {
    return false;
  }
  return TRUTHY_FLAGS.includes(raw.trim().toLowerCase());
}

/**
 * Structured logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'loader', debugMode: true });
 * logger.debug('cascade_read', { source: '/etc/app/base.toml' });
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

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

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
      // Circular structures and BigInt values end up here.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.write(line + '\n');
  }
}

/**
 * Creates the logger used when the caller does not supply one.
 *
 * @param env - Environment to read the debug flag from.
 */
export function createDefaultLogger(
  env: Record<string, string | undefined> = process.env
): Logger {
  return new Logger({ component: 'cascade-config', debugMode: readEnvFlag(env, DEBUG_ENV_VAR) });
}
