/**
 * QuireError - base class for the few errors Quire raises instead of
 * returning them as a failed Result
 */

import type { DatabaseErrorCode } from './error-codes.js';

/**
 * Code raised when an API is used outside its lifecycle (e.g. after dispose)
 */
export const PRECONDITION_CODE = 'QUIRE_PRECONDITION';

export type QuireErrorCode = DatabaseErrorCode | typeof PRECONDITION_CODE;

/**
 * Options for creating a QuireError
 */
export interface QuireErrorOptions {
  /** The error code */
  code: QuireErrorCode;
  message: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a QuireError
 */
export interface SerializedQuireError {
  name: string;
  code: string;
  message: string;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedQuireError | { name: string; message: string; stack?: string };
}

/**
 * Error class with a stable code, debugging context and proper chaining.
 *
 * @example
 * ```typescript
 * throw new DocumentStoreError('DB_TIMEOUT', 'read timed out', { key: 'user-1' });
 *
 * if (QuireError.isCode(error, 'DB_TIMEOUT')) {
 *   // retry later
 * }
 * ```
 */
export class QuireError extends Error {
  /** Unique error code */
  readonly code: QuireErrorCode;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: QuireErrorOptions) {
    super(options.message, { cause: options.cause });

    this.name = 'QuireError';
    this.code = options.code;
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Check if an error is a QuireError
   */
  static isQuireError(error: unknown): error is QuireError {
    return error instanceof QuireError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: QuireErrorCode): boolean {
    return QuireError.isQuireError(error) && error.code === code;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedQuireError {
    const result: SerializedQuireError = {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      result.cause = QuireError.isQuireError(this.cause)
        ? this.cause.toJSON()
        : { name: this.cause.name, message: this.cause.message, stack: this.cause.stack };
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Raised when a disposed component is used.
 *
 * This is a programmer error, not an operational failure: it is thrown
 * rather than returned and is not meant to be recovered from.
 */
export class PreconditionViolationError extends QuireError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: PRECONDITION_CODE, message, context });
    this.name = 'PreconditionViolationError';
  }
}

/**
 * Raised by store adapters. The default error mapper turns it into the
 * catalogued database error with the same code.
 */
export class DocumentStoreError extends QuireError {
  declare readonly code: DatabaseErrorCode;

  constructor(
    code: DatabaseErrorCode,
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'DocumentStoreError';
  }
}

/**
 * Throw a {@link PreconditionViolationError} unless `condition` holds
 */
export function assertPrecondition(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new PreconditionViolationError(message, context);
  }
}
