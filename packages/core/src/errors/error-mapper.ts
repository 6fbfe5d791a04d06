import type { DocumentPayload } from '../types/document.js';
import { DatabaseErrors, isDatabaseErrorCode } from './error-codes.js';
import { QuireError } from './quire-error.js';
import { parseSeverity, type StructuredError } from './structured-error.js';

/**
 * Where a failure was observed. Copied into the error's metadata.
 */
export interface ErrorContext {
  /** Operation that failed, e.g. `ReactiveDocumentGateway.read` */
  location: string;
  /** Document key, when the operation targets one */
  key?: string;
  /** Collection or gateway name */
  collection?: string;
}

/**
 * Converts raw failures into {@link StructuredError}s.
 *
 * Implementations must be pure and must never throw.
 */
export interface ErrorMapper {
  /** Map a thrown error or rejected promise */
  fromException(error: unknown, context: ErrorContext): StructuredError;

  /**
   * Inspect a successfully fetched payload for an embedded business error.
   * Returns `null` when the payload is a regular document.
   */
  fromPayload(payload: DocumentPayload, context: ErrorContext): StructuredError | null;
}

/**
 * Payload field names recognized by {@link DefaultErrorMapper}
 */
export interface DefaultErrorMapperOptions {
  errorKey?: string;
  codeKey?: string;
  titleKey?: string;
  descriptionKey?: string;
  messageKey?: string;
  metaKey?: string;
  errorLevelKey?: string;
  okKey?: string;
  successKey?: string;
  /** Code used for unrecognized thrown errors */
  unexpectedCode?: string;
  /** Code used for payload errors that carry none */
  payloadCode?: string;
}

const DEFAULT_OPTIONS: Required<DefaultErrorMapperOptions> = {
  errorKey: 'error',
  codeKey: 'code',
  titleKey: 'title',
  descriptionKey: 'description',
  messageKey: 'message',
  metaKey: 'meta',
  errorLevelKey: 'errorLevel',
  okKey: 'ok',
  successKey: 'success',
  unexpectedCode: 'ERR_UNEXPECTED',
  payloadCode: 'ERR_PAYLOAD',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  try {
    return String(value);
  } catch {
    // No usable toString or Symbol.toPrimitive
    return Object.prototype.toString.call(value);
  }
}

/**
 * Message of an `Error`, or a text rendering of any other thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : asText(error);
}

function contextMetadata(context: ErrorContext): Record<string, unknown> {
  return {
    location: context.location,
    ...(context.key !== undefined ? { key: context.key } : {}),
    ...(context.collection !== undefined ? { collection: context.collection } : {}),
  };
}

function typeName(error: unknown): string {
  if (error instanceof Error) return error.name;
  if (error === null) return 'null';
  return typeof error;
}

/**
 * Error mapper understanding the common JSON error envelopes:
 *
 * 1. a nested object: `{ "error": { "code": "...", "message": "..." } }`
 * 2. top-level fields: `{ "code": "...", "message": "..." }` (or `description`)
 * 3. failure flags: `{ "ok": false }` or `{ "success": false }`
 *
 * Thrown {@link QuireError}s carrying a `DB_*` code (such as a
 * `DocumentStoreError`) map to the catalogued database error of the same
 * code; anything else becomes an `ERR_UNEXPECTED` error.
 */
export class DefaultErrorMapper implements ErrorMapper {
  private readonly options: Required<DefaultErrorMapperOptions>;

  constructor(options: DefaultErrorMapperOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  fromException(error: unknown, context: ErrorContext): StructuredError {
    if (error instanceof QuireError && isDatabaseErrorCode(error.code)) {
      const known = DatabaseErrors[error.code];
      return Object.freeze({
        ...known,
        description: error.message || known.description,
        metadata: Object.freeze({
          ...known.metadata,
          ...error.context,
          ...contextMetadata(context),
        }),
      });
    }

    return Object.freeze({
      title: 'Unexpected error',
      code: this.options.unexpectedCode,
      description: describeError(error),
      severity: 'severe',
      metadata: Object.freeze({ ...contextMetadata(context), type: typeName(error) }),
    });
  }

  fromPayload(payload: DocumentPayload, context: ErrorContext): StructuredError | null {
    const envelope = this.findEnvelope(payload);
    if (!envelope) return null;

    const o = this.options;
    const title = asText(envelope[o.titleKey]) || 'Operation failed';
    const code = asText(envelope[o.codeKey]) || o.payloadCode;
    const description = asText(envelope[o.descriptionKey] ?? envelope[o.messageKey] ?? 'Unknown error');
    const meta = envelope[o.metaKey];

    return Object.freeze({
      title,
      code,
      description,
      severity: parseSeverity(envelope[o.errorLevelKey]),
      metadata: Object.freeze({ ...(isRecord(meta) ? meta : {}), ...contextMetadata(context) }),
    });
  }

  private findEnvelope(payload: DocumentPayload): Record<string, unknown> | null {
    const o = this.options;

    const nested = payload[o.errorKey];
    if (isRecord(nested)) return nested;

    if (o.codeKey in payload && (o.messageKey in payload || o.descriptionKey in payload)) {
      return payload;
    }

    if (payload[o.okKey] === false || payload[o.successKey] === false) {
      return payload;
    }

    return null;
  }
}
