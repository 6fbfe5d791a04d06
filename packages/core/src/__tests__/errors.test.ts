import { describe, expect, it } from 'vitest';
import {
  DatabaseErrors,
  databaseErrorFromCode,
  isDatabaseErrorCode,
  unknownDatabaseError,
} from '../errors/error-codes.js';
import { DefaultErrorMapper } from '../errors/error-mapper.js';
import {
  DocumentStoreError,
  PreconditionViolationError,
  QuireError,
  assertPrecondition,
} from '../errors/quire-error.js';
import { formatStructuredError, parseSeverity, withMetadata } from '../errors/structured-error.js';

const context = { location: 'ReactiveDocumentGateway.read', key: 'u1', collection: 'users' };

describe('Database error catalog', () => {
  it('should tag every entry with its source', () => {
    for (const error of Object.values(DatabaseErrors)) {
      expect(error.metadata).toEqual({ source: 'Database' });
    }
  });

  it('should key entries by their own code', () => {
    for (const [code, error] of Object.entries(DatabaseErrors)) {
      expect(error.code).toBe(code);
    }
  });

  it('should describe the not-found and stream-closed errors', () => {
    expect(DatabaseErrors.DB_NOT_FOUND).toEqual({
      title: 'Record Not Found',
      code: 'DB_NOT_FOUND',
      description: 'The requested record does not exist in the database.',
      severity: 'warning',
      metadata: { source: 'Database' },
    });
    expect(DatabaseErrors.DB_STREAM_CLOSED.severity).toBe('warning');
  });

  it('should look up codes and fall back to DB_UNKNOWN', () => {
    expect(isDatabaseErrorCode('DB_TIMEOUT')).toBe(true);
    expect(isDatabaseErrorCode('toString')).toBe(false);
    expect(databaseErrorFromCode('DB_TIMEOUT')).toBe(DatabaseErrors.DB_TIMEOUT);
    expect(databaseErrorFromCode('DB_NOPE')).toMatchObject({
      code: 'DB_UNKNOWN',
      description: 'Unrecognized Database code: DB_NOPE',
      severity: 'systemInfo',
    });
    expect(unknownDatabaseError().description).toBe('An unknown database error has occurred.');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DatabaseErrors)).toBe(true);
    expect(Object.isFrozen(DatabaseErrors.DB_CONFLICT.metadata)).toBe(true);
  });
});

describe('structured error helpers', () => {
  it('should parse severities with a systemInfo fallback', () => {
    expect(parseSeverity('danger')).toBe('danger');
    expect(parseSeverity('fatal')).toBe('systemInfo');
    expect(parseSeverity(undefined)).toBe('systemInfo');
  });

  it('should merge metadata into a copy', () => {
    const copy = withMetadata(DatabaseErrors.DB_NOT_FOUND, { key: 'u1' });

    expect(copy.metadata).toEqual({ source: 'Database', key: 'u1' });
    expect(DatabaseErrors.DB_NOT_FOUND.metadata).toEqual({ source: 'Database' });
  });

  it('should format on one line', () => {
    expect(formatStructuredError(DatabaseErrors.DB_TIMEOUT)).toBe(
      'Database Timeout (DB_TIMEOUT): The database operation timed out. | Meta: {"source":"Database"} | Level: warning'
    );
  });
});

describe('QuireError', () => {
  it('should carry code, context and cause', () => {
    const cause = new Error('socket reset');
    const error = new DocumentStoreError('DB_TIMEOUT', 'read timed out', { key: 'u1' }, cause);

    expect(error).toBeInstanceOf(QuireError);
    expect(error.name).toBe('DocumentStoreError');
    expect(QuireError.isCode(error, 'DB_TIMEOUT')).toBe(true);
    expect(error.format()).toBe('[DB_TIMEOUT] read timed out\nContext: {"key":"u1"}');
    expect(error.toJSON()).toMatchObject({
      name: 'DocumentStoreError',
      code: 'DB_TIMEOUT',
      message: 'read timed out',
      context: { key: 'u1' },
      cause: { name: 'Error', message: 'socket reset' },
    });
  });

  it('should throw a PreconditionViolationError when an assertion fails', () => {
    expect(() => assertPrecondition(true, 'never')).not.toThrow();
    expect(() => assertPrecondition(false, 'Gateway is disposed')).toThrow(
      PreconditionViolationError
    );
    expect(() => assertPrecondition(false, 'Gateway is disposed')).toThrow('Gateway is disposed');
  });
});

describe('DefaultErrorMapper', () => {
  const mapper = new DefaultErrorMapper();

  describe('fromException', () => {
    it('should map store errors to the catalogued entry', () => {
      const error = mapper.fromException(
        new DocumentStoreError('DB_UNAVAILABLE', 'backend restarting', { region: 'eu' }),
        context
      );

      expect(error).toEqual({
        title: 'Database Unavailable',
        code: 'DB_UNAVAILABLE',
        description: 'backend restarting',
        severity: 'severe',
        metadata: {
          source: 'Database',
          region: 'eu',
          location: 'ReactiveDocumentGateway.read',
          key: 'u1',
          collection: 'users',
        },
      });
    });

    it('should map anything else to an unexpected error', () => {
      expect(mapper.fromException(new TypeError('bad input'), { location: 'op' })).toEqual({
        title: 'Unexpected error',
        code: 'ERR_UNEXPECTED',
        description: 'bad input',
        severity: 'severe',
        metadata: { location: 'op', type: 'TypeError' },
      });
      expect(mapper.fromException('boom', { location: 'op' })).toMatchObject({
        description: 'boom',
        metadata: { location: 'op', type: 'string' },
      });
    });

    it('should describe values that cannot be converted to a string', () => {
      const bare: unknown = Object.create(null);
      const hostile = {
        toString(): string {
          throw new Error('no text');
        },
      };

      expect(mapper.fromException(bare, { location: 'op' })).toEqual({
        title: 'Unexpected error',
        code: 'ERR_UNEXPECTED',
        description: '[object Object]',
        severity: 'severe',
        metadata: { location: 'op', type: 'object' },
      });
      expect(mapper.fromException(hostile, { location: 'op' }).description).toBe('[object Object]');
    });

    it('should honour a custom unexpected code', () => {
      const custom = new DefaultErrorMapper({ unexpectedCode: 'E_INTERNAL' });
      expect(custom.fromException(new Error('x'), { location: 'op' }).code).toBe('E_INTERNAL');
    });
  });

  describe('fromPayload', () => {
    it('should return null for regular documents', () => {
      expect(mapper.fromPayload({ name: 'Alice', code: 'A1' }, context)).toBeNull();
      expect(mapper.fromPayload({}, context)).toBeNull();
      expect(mapper.fromPayload({ ok: true }, context)).toBeNull();
    });

    it('should read a nested error object', () => {
      const error = mapper.fromPayload(
        {
          error: {
            code: 'QUOTA',
            title: 'Over quota',
            message: 'Plan limit reached',
            errorLevel: 'danger',
            meta: { plan: 'free' },
          },
        },
        context
      );

      expect(error).toEqual({
        title: 'Over quota',
        code: 'QUOTA',
        description: 'Plan limit reached',
        severity: 'danger',
        metadata: {
          plan: 'free',
          location: 'ReactiveDocumentGateway.read',
          key: 'u1',
          collection: 'users',
        },
      });
    });

    it('should read top-level code and message', () => {
      expect(mapper.fromPayload({ code: 'LOCKED', description: 'Document locked' }, context)).toMatchObject({
        title: 'Operation failed',
        code: 'LOCKED',
        description: 'Document locked',
        severity: 'systemInfo',
      });
    });

    it('should treat failure flags as errors', () => {
      expect(mapper.fromPayload({ ok: false }, { location: 'op' })).toEqual({
        title: 'Operation failed',
        code: 'ERR_PAYLOAD',
        description: 'Unknown error',
        severity: 'systemInfo',
        metadata: { location: 'op' },
      });
      expect(mapper.fromPayload({ success: false, message: 'nope' }, { location: 'op' })).toMatchObject({
        description: 'nope',
      });
    });
  });
});
