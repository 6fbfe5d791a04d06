import type { Observable } from 'rxjs';

/**
 * A JSON document as exchanged with the backend store
 */
export type DocumentPayload = Record<string, unknown>;

/**
 * Save acknowledgement returned by {@link DocumentStore.write}.
 *
 * Stores that echo the persisted document return it here; stores whose API
 * gives no acknowledgement resolve with `undefined`.
 */
export type WriteAck = DocumentPayload | undefined;

/**
 * Backend document store for a single collection.
 *
 * Every call may reject (or, for {@link watch}, error the feed); the gateway
 * converts those failures into structured errors.
 */
export interface DocumentStore {
  /** Fetch the current payload for a key */
  read(key: string): Promise<DocumentPayload>;

  /** Create or replace the document stored under a key */
  write(key: string, payload: DocumentPayload): Promise<WriteAck>;

  /** Remove a document. Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;

  /** Live feed of payloads for a key */
  watch(key: string): Observable<DocumentPayload>;
}

/**
 * Two-way mapping between a typed entity and its JSON payload
 */
export interface EntityCodec<T> {
  /** Decode a payload. May throw when the payload does not describe a `T`. */
  fromJson(payload: DocumentPayload): T;
  /** Encode an entity for storage */
  toJson(entity: T): DocumentPayload;
}
