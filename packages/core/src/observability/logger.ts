/**
 * Structured logging for Quire.
 *
 * A lightweight structured logger with levels, JSON output, bound context
 * and a global debug mode toggle. Loggers are silent unless a handler or
 * JSON output is configured, so library code can log freely.
 *
 * @module observability/logger
 */

import { describeError } from '../errors/error-mapper.js';

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Receives every entry at or above the configured level */
export type LogHandler = (entry: LogEntry) => void;

/** Logger configuration */
export interface QuireLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler */
  readonly handler?: LogHandler;
  /** Write entries to the console as JSON lines */
  readonly json?: boolean;
  /** Context merged into every entry */
  readonly context?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all Quire loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

function errorDetails(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: describeError(error) };
}

/**
 * Structured logger for Quire modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@quire/core';
 *
 * const log = createLogger({ module: 'gateway', level: 'debug', json: true });
 * const users = log.child('users').withContext({ collection: 'users' });
 *
 * users.debug('Channel opened', { key: 'u1' });
 *
 * const end = users.time('read');
 * // ... do work ...
 * end(); // logs "read completed" with durationMs
 * ```
 */
export class QuireLogger {
  private readonly config: Required<Omit<QuireLoggerConfig, 'handler' | 'json' | 'context'>> &
    Pick<QuireLoggerConfig, 'handler' | 'json' | 'context'>;

  constructor(config: QuireLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'quire',
      handler: config.handler,
      json: config.json,
      context: config.context,
    };
  }

  /** Module name this logger writes under */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): QuireLogger {
    return new QuireLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Create a logger that adds `context` to every entry */
  withContext(context: Record<string, unknown>): QuireLogger {
    return new QuireLogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /** Log at error level. Non-`Error` values are stringified. */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error !== undefined ? { error: errorDetails(error) } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const merged = this.config.context ? { ...this.config.context, ...context } : context;
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(merged && Object.keys(merged).length > 0 ? { context: merged } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

/** Factory function to create a QuireLogger */
export function createLogger(config?: QuireLoggerConfig): QuireLogger {
  return new QuireLogger(config);
}

/** Logger that drops every entry, used when a component is given none */
export const silentLogger: QuireLogger = new QuireLogger({ level: 'error', module: 'quire' });
