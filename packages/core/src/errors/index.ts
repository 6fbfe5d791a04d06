/**
 * Quire Error System
 *
 * Failures cross the public API as data, not exceptions:
 * - {@link StructuredError}: the uniform failure shape inside a failed Result
 * - {@link DatabaseErrors}: catalogued store failures (DB_NOT_FOUND, DB_STREAM_CLOSED, ...)
 * - {@link ErrorMapper}: converts thrown errors and error payloads into structured errors
 *
 * The only errors that are thrown are {@link QuireError} subclasses:
 * {@link PreconditionViolationError} for lifecycle misuse and
 * {@link DocumentStoreError} for store adapters to report coded failures.
 *
 * @example
 * ```typescript
 * import { DatabaseErrors } from '@quire/core';
 *
 * const result = await gateway.read('user-123');
 * if (!result.ok && result.error.code === DatabaseErrors.DB_NOT_FOUND.code) {
 *   console.log('Document not found');
 * }
 * ```
 *
 * @module errors
 */

export {
  DatabaseErrors,
  databaseErrorFromCode,
  isDatabaseErrorCode,
  unknownDatabaseError,
  type DatabaseErrorCode,
} from './error-codes.js';

export {
  DefaultErrorMapper,
  describeError,
  type DefaultErrorMapperOptions,
  type ErrorContext,
  type ErrorMapper,
} from './error-mapper.js';

export {
  DocumentStoreError,
  PRECONDITION_CODE,
  PreconditionViolationError,
  QuireError,
  assertPrecondition,
  type QuireErrorCode,
  type QuireErrorOptions,
  type SerializedQuireError,
} from './quire-error.js';

export {
  ERROR_SEVERITIES,
  formatStructuredError,
  parseSeverity,
  withMetadata,
  type ErrorSeverity,
  type StructuredError,
} from './structured-error.js';
