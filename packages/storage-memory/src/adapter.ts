import {
  DocumentStoreError,
  type DocumentPayload,
  type DocumentStore,
  type WriteAck,
} from '@quire/core';
import {
  EMPTY,
  Subject,
  asapScheduler,
  concat,
  defer,
  distinctUntilChanged,
  filter,
  map,
  observeOn,
  of,
  type Observable,
} from 'rxjs';

/**
 * Behaviour switches for a {@link MemoryDocumentStore}
 */
export interface MemoryDocumentStoreOptions {
  /** Delay applied to every read, write and delete, in milliseconds */
  latencyMs?: number;
  /** Reject every write with `DB_TRANSACTION_FAILED` */
  failOnWrite?: boolean;
  /** Reject every delete with `DB_TRANSACTION_FAILED` */
  failOnDelete?: boolean;
  /** Start every watch with the current document (`{}` when missing) */
  emitInitial?: boolean;
  /** Copy payloads on the way in and out so callers cannot mutate stored data */
  deepCopies?: boolean;
  /** Skip watch emissions deep-equal to the previous one */
  dedupeByContent?: boolean;
}

export const DEFAULT_MEMORY_STORE_OPTIONS: Required<MemoryDocumentStoreOptions> = {
  latencyMs: 0,
  failOnWrite: false,
  failOnDelete: false,
  emitInitial: true,
  deepCopies: true,
  dedupeByContent: false,
};

interface DocumentChange {
  key: string;
  payload: DocumentPayload;
}

/**
 * Deep structural equality for JSON-like values
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => isEqual(item, b[index]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && isEqual(a[key], b[key])
    );
  }

  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-memory keyed document store for one collection.
 *
 * Missing documents read as `{}`, writes acknowledge with the stored copy
 * and deleting a missing document succeeds. Watch feeds deliver on the
 * microtask queue, after the subscriber is attached, and complete when the
 * store is destroyed.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly name: string;

  private readonly options: Required<MemoryDocumentStoreOptions>;
  private readonly documents = new Map<string, DocumentPayload>();
  private readonly changes$ = new Subject<DocumentChange>();
  private destroyed = false;

  constructor(name: string, options: MemoryDocumentStoreOptions = {}) {
    this.name = name;
    this.options = { ...DEFAULT_MEMORY_STORE_OPTIONS, ...options };
  }

  async read(key: string): Promise<DocumentPayload> {
    await this.prepare('read', key);
    return this.copy(this.documents.get(key) ?? {});
  }

  async write(key: string, payload: DocumentPayload): Promise<WriteAck> {
    await this.prepare('write', key);
    if (this.options.failOnWrite) {
      throw new DocumentStoreError('DB_TRANSACTION_FAILED', 'Simulated write failure', {
        store: this.name,
        key,
      });
    }

    const stored = this.copy(payload);
    this.documents.set(key, stored);
    this.changes$.next({ key, payload: stored });
    return this.copy(stored);
  }

  async delete(key: string): Promise<void> {
    await this.prepare('delete', key);
    if (this.options.failOnDelete) {
      throw new DocumentStoreError('DB_TRANSACTION_FAILED', 'Simulated delete failure', {
        store: this.name,
        key,
      });
    }

    if (this.documents.delete(key)) {
      this.changes$.next({ key, payload: {} });
    }
  }

  watch(key: string): Observable<DocumentPayload> {
    return defer(() => {
      this.assertUsable('watch', key);

      const initial = this.options.emitInitial ? of(this.documents.get(key) ?? {}) : EMPTY;
      const updates = this.changes$.pipe(
        filter((change) => change.key === key),
        map((change) => change.payload)
      );
      const feed = concat(initial, updates).pipe(map((payload) => this.copy(payload)));

      return (this.options.dedupeByContent ? feed.pipe(distinctUntilChanged<DocumentPayload>(isEqual)) : feed).pipe(
        observeOn(asapScheduler)
      );
    });
  }

  /** Number of stored documents */
  get size(): number {
    return this.documents.size;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Drop every document and complete every watch feed
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.changes$.complete();
    this.documents.clear();
  }

  private async prepare(operation: string, key: string): Promise<void> {
    this.assertUsable(operation, key);
    if (this.options.latencyMs > 0) {
      await delay(this.options.latencyMs);
      this.assertUsable(operation, key);
    }
  }

  private assertUsable(operation: string, key: string): void {
    if (this.destroyed) {
      throw new DocumentStoreError('DB_UNAVAILABLE', `Store "${this.name}" has been destroyed`, {
        store: this.name,
        operation,
      });
    }
    if (key.length === 0) {
      throw new DocumentStoreError('DB_VALIDATION_FAILED', 'Document key must not be empty', {
        store: this.name,
        operation,
      });
    }
  }

  private copy(payload: DocumentPayload): DocumentPayload {
    return this.options.deepCopies ? structuredClone(payload) : payload;
  }
}

/**
 * Memory storage: one {@link MemoryDocumentStore} per collection name
 */
export class MemoryDocumentStorage {
  readonly name = 'memory';

  private readonly stores = new Map<string, MemoryDocumentStore>();
  private readonly defaults: MemoryDocumentStoreOptions;

  constructor(defaults: MemoryDocumentStoreOptions = {}) {
    this.defaults = defaults;
  }

  /**
   * Get the store for a collection, creating it on first access. Options
   * only apply when the store is created.
   */
  getStore(name: string, options?: MemoryDocumentStoreOptions): MemoryDocumentStore {
    let store = this.stores.get(name);

    if (!store) {
      store = new MemoryDocumentStore(name, { ...this.defaults, ...options });
      this.stores.set(name, store);
    }

    return store;
  }

  hasStore(name: string): boolean {
    return this.stores.has(name);
  }

  listStores(): string[] {
    return Array.from(this.stores.keys());
  }

  deleteStore(name: string): void {
    const store = this.stores.get(name);
    if (store) {
      store.destroy();
      this.stores.delete(name);
    }
  }

  close(): void {
    for (const store of this.stores.values()) {
      store.destroy();
    }
    this.stores.clear();
  }
}

/**
 * Create a memory storage
 *
 * @example
 * ```typescript
 * const storage = createMemoryStorage({ latencyMs: 5 });
 * const gateway = new ReactiveDocumentGateway({ store: storage.getStore('users') });
 * ```
 */
export function createMemoryStorage(defaults?: MemoryDocumentStoreOptions): MemoryDocumentStorage {
  return new MemoryDocumentStorage(defaults);
}
