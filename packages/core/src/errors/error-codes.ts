/**
 * Database Error Catalog
 *
 * Fixed structured errors for failures of the document store. Codes are
 * structured as DB_[CONDITION] and are shared by the gateway, the
 * repository and the store adapters.
 */

import type { ErrorSeverity, StructuredError } from './structured-error.js';

const SOURCE_KEY = 'source';
const SOURCE_VALUE = 'Database';

function define(
  code: string,
  title: string,
  description: string,
  severity: ErrorSeverity
): StructuredError {
  return Object.freeze({
    title,
    code,
    description,
    severity,
    metadata: Object.freeze({ [SOURCE_KEY]: SOURCE_VALUE }),
  });
}

/**
 * Every catalogued database error, keyed by code.
 *
 * @example
 * ```typescript
 * if (!result.ok && result.error.code === DatabaseErrors.DB_NOT_FOUND.code) {
 *   // treat as absent
 * }
 * ```
 */
export const DatabaseErrors = Object.freeze({
  DB_CONN_FAILED: define(
    'DB_CONN_FAILED',
    'Database Connection Failed',
    'Unable to establish a connection with the database.',
    'danger'
  ),
  DB_UNAVAILABLE: define(
    'DB_UNAVAILABLE',
    'Database Unavailable',
    'The database service is temporarily unavailable.',
    'severe'
  ),
  DB_UNAUTHORIZED: define(
    'DB_UNAUTHORIZED',
    'Database Unauthorized',
    'Authentication failed when accessing the database.',
    'severe'
  ),
  DB_FORBIDDEN: define(
    'DB_FORBIDDEN',
    'Database Forbidden',
    'You do not have permission to perform this operation.',
    'severe'
  ),
  DB_NOT_FOUND: define(
    'DB_NOT_FOUND',
    'Record Not Found',
    'The requested record does not exist in the database.',
    'warning'
  ),
  DB_ALREADY_EXISTS: define(
    'DB_ALREADY_EXISTS',
    'Record Already Exists',
    'A record with the same identifier already exists.',
    'warning'
  ),
  DB_CONFLICT: define(
    'DB_CONFLICT',
    'Concurrency Conflict',
    'The record was modified concurrently by another process.',
    'warning'
  ),
  DB_CONSTRAINT_VIOLATION: define(
    'DB_CONSTRAINT_VIOLATION',
    'Constraint Violation',
    'The operation violates a database constraint.',
    'warning'
  ),
  DB_VALIDATION_FAILED: define(
    'DB_VALIDATION_FAILED',
    'Validation Failed',
    'The provided data is invalid or does not match the schema.',
    'warning'
  ),
  DB_SERIALIZATION_ERROR: define(
    'DB_SERIALIZATION_ERROR',
    'Serialization Error',
    'Failed to serialize or deserialize the data.',
    'severe'
  ),
  DB_TIMEOUT: define('DB_TIMEOUT', 'Database Timeout', 'The database operation timed out.', 'warning'),
  DB_QUOTA_EXCEEDED: define(
    'DB_QUOTA_EXCEEDED',
    'Quota Exceeded',
    'The operation failed due to exceeded storage or quota limits.',
    'severe'
  ),
  DB_TRANSACTION_FAILED: define(
    'DB_TRANSACTION_FAILED',
    'Transaction Failed',
    'The database transaction could not be completed and was rolled back.',
    'severe'
  ),
  DB_DEADLOCK: define(
    'DB_DEADLOCK',
    'Deadlock Detected',
    'The operation was aborted due to a detected deadlock.',
    'severe'
  ),
  DB_STREAM_CLOSED: define(
    'DB_STREAM_CLOSED',
    'Stream Closed',
    'The database stream was closed unexpectedly.',
    'warning'
  ),
});

/**
 * Code of a catalogued database error
 */
export type DatabaseErrorCode = keyof typeof DatabaseErrors;

/**
 * Check whether a string is a catalogued database error code
 */
export function isDatabaseErrorCode(code: string): code is DatabaseErrorCode {
  return Object.prototype.hasOwnProperty.call(DatabaseErrors, code);
}

/**
 * Error used when a code is not in the catalog
 */
export function unknownDatabaseError(reason?: string): StructuredError {
  return define(
    'DB_UNKNOWN',
    'Unknown Database Error',
    reason ?? 'An unknown database error has occurred.',
    'systemInfo'
  );
}

/**
 * Look up a catalogued error by code, or build a `DB_UNKNOWN` error naming it
 */
export function databaseErrorFromCode(code: string): StructuredError {
  if (isDatabaseErrorCode(code)) {
    return DatabaseErrors[code];
  }
  return unknownDatabaseError(`Unrecognized Database code: ${code}`);
}
