import { defer, map, type Observable } from 'rxjs';
import { ChannelRegistry, type ChannelSource } from '../channels/index.js';
import { DatabaseErrors } from '../errors/error-codes.js';
import { DefaultErrorMapper, type ErrorContext, type ErrorMapper } from '../errors/error-mapper.js';
import { assertPrecondition } from '../errors/quire-error.js';
import { withMetadata, type StructuredError } from '../errors/structured-error.js';
import { silentLogger, type QuireLogger } from '../observability/logger.js';
import type { DocumentPayload, DocumentStore, WriteAck } from '../types/document.js';
import { err, ok, type Result } from '../types/result.js';

/** Field the document key is published under unless configured otherwise */
export const DEFAULT_ID_KEY = 'id';

/**
 * Payload of the synthetic first emission of every watch
 */
export const BOOTSTRAP_PAYLOAD: DocumentPayload = Object.freeze({});

const BOOTSTRAP_RESULT: Result<DocumentPayload> = Object.freeze(ok(BOOTSTRAP_PAYLOAD));

/**
 * Whether a watch emission is the bootstrap sentinel rather than backend data
 */
export function isBootstrap(result: Result<DocumentPayload>): boolean {
  return result.ok && result.value === BOOTSTRAP_PAYLOAD;
}

/**
 * Keyed document access with uniform results and shared live watches
 */
export interface DocumentGateway {
  read(key: string): Promise<Result<DocumentPayload>>;
  write(key: string, payload: DocumentPayload): Promise<Result<DocumentPayload>>;
  delete(key: string): Promise<Result<void>>;
  /** Retains a shared watch on `key`; pair every call with {@link detachWatch} */
  watch(key: string): Observable<Result<DocumentPayload>>;
  detachWatch(key: string): void;
  releaseDoc(key: string): void;
  dispose(): void;
}

/**
 * Gateway configuration
 */
export interface ReactiveDocumentGatewayConfig {
  /** Backend store */
  store: DocumentStore;
  /** Collection name, reported in error metadata and logs (default: 'documents') */
  name?: string;
  /** Error mapper (default: {@link DefaultErrorMapper}) */
  mapper?: ErrorMapper;
  /** Field the key is injected under when a payload lacks it (default: 'id') */
  idKey?: string;
  /**
   * Return the store's own acknowledgement from `write` instead of echoing
   * the input. Falls back to a `read` when the store acknowledges nothing.
   * @default false
   */
  readAfterWrite?: boolean;
  /**
   * Treat `{}` payloads as missing documents (`DB_NOT_FOUND`)
   * @default false
   */
  treatEmptyAsMissing?: boolean;
  logger?: QuireLogger;
}

type ResolvedConfig = Required<Omit<ReactiveDocumentGatewayConfig, 'store' | 'logger'>>;

/**
 * JSON-document gateway over a {@link DocumentStore}.
 *
 * - Every operation resolves to a {@link Result}; store failures, business
 *   errors embedded in payloads and closed feeds never escape as exceptions.
 * - Successful payloads carry the document key under `idKey` unless the
 *   store already supplied that field, in which case the store value wins.
 * - Watches are multiplexed: however many callers watch a key, the store's
 *   feed for it is subscribed once.
 *
 * ### Watch lifecycle
 * Every `watch(key)` call retains the shared channel for `key`. Callers
 * **must** call `detachWatch(key)` once per `watch(key)` when they are done;
 * unsubscribing from the returned observable alone keeps the backend feed
 * open. Use `releaseDoc(key)` to force a channel closed and `dispose()` for
 * global teardown.
 *
 * @example
 * ```typescript
 * const gateway = new ReactiveDocumentGateway({
 *   store: storage.getStore('canvas'),
 *   name: 'canvas',
 *   treatEmptyAsMissing: true,
 * });
 *
 * const saved = await gateway.write('c1', { name: 'Board' });
 * // saved.value → { name: 'Board', id: 'c1' }
 *
 * const sub = gateway.watch('c1').subscribe((result) => {
 *   if (result.ok) render(result.value);
 * });
 *
 * sub.unsubscribe();
 * gateway.detachWatch('c1');
 * ```
 */
export class ReactiveDocumentGateway implements DocumentGateway {
  private readonly store: DocumentStore;
  private readonly config: ResolvedConfig;
  private readonly logger: QuireLogger;
  private readonly registry: ChannelRegistry<string, Result<DocumentPayload>>;
  private disposed = false;

  constructor(config: ReactiveDocumentGatewayConfig) {
    this.store = config.store;
    this.config = {
      name: config.name ?? 'documents',
      mapper: config.mapper ?? new DefaultErrorMapper(),
      idKey: config.idKey ?? DEFAULT_ID_KEY,
      readAfterWrite: config.readAfterWrite ?? false,
      treatEmptyAsMissing: config.treatEmptyAsMissing ?? false,
    };
    this.logger = (config.logger ?? silentLogger)
      .child('gateway')
      .withContext({ collection: this.config.name });
    this.registry = new ChannelRegistry((key) => this.openChannel(key), {
      name: 'ReactiveDocumentGateway',
      logger: this.logger,
    });
  }

  /**
   * Read a document.
   *
   * Resolves with the payload (key injected), a business error found in the
   * payload, `DB_NOT_FOUND` for `{}` when `treatEmptyAsMissing` is set, or
   * the mapped store failure.
   */
  async read(key: string): Promise<Result<DocumentPayload>> {
    this.assertActive('read', key);
    const context = this.context('read', key);
    try {
      const payload = await this.store.read(key);
      return this.mapPayload(key, payload, context);
    } catch (error) {
      return this.failure(this.config.mapper.fromException(error, context));
    }
  }

  /**
   * Create or replace a document.
   *
   * Resolves with the written payload (key injected) or, with
   * `readAfterWrite`, with the store's acknowledgement.
   */
  async write(key: string, payload: DocumentPayload): Promise<Result<DocumentPayload>> {
    this.assertActive('write', key);
    const context = this.context('write', key);

    let ack: WriteAck;
    try {
      ack = await this.store.write(key, payload);
    } catch (error) {
      return this.failure(this.config.mapper.fromException(error, context));
    }

    if (!this.config.readAfterWrite) {
      return ok(this.withId(key, payload));
    }
    return ack ? this.mapPayload(key, ack, context) : this.read(key);
  }

  /**
   * Delete a document. Deleting a missing document succeeds.
   */
  async delete(key: string): Promise<Result<void>> {
    this.assertActive('delete', key);
    try {
      await this.store.delete(key);
      return ok();
    } catch (error) {
      return this.failure(this.config.mapper.fromException(error, this.context('delete', key)));
    }
  }

  /**
   * Watch a document.
   *
   * Emits `ok({})` ({@link BOOTSTRAP_PAYLOAD}) first, then every store
   * payload mapped like {@link read}. Feed errors become mapped failures and
   * feed completion becomes `DB_STREAM_CLOSED`.
   */
  watch(key: string): Observable<Result<DocumentPayload>> {
    this.assertActive('watch', key);
    return this.registry.acquire(key);
  }

  /** Release one watch on `key`, closing the store feed after the last one */
  detachWatch(key: string): void {
    this.registry.release(key);
  }

  /** Close the channel for `key` regardless of how many watchers hold it */
  releaseDoc(key: string): void {
    this.registry.forceRelease(key);
  }

  /**
   * Close every channel. Any further read, write, delete or watch throws a
   * `PreconditionViolationError`.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.registry.disposeAll();
    this.logger.debug('Gateway disposed');
  }

  /** Number of keys with an open watch channel */
  get activeWatchCount(): number {
    return this.registry.size;
  }

  /** Outstanding `watch` calls for `key` not yet detached */
  watcherCount(key: string): number {
    return this.registry.refCount(key);
  }

  // ── Private ──────────────────────────────────────────────────────────

  private openChannel(key: string): ChannelSource<Result<DocumentPayload>> {
    const context = this.context('watch', key);
    return {
      bootstrap: BOOTSTRAP_RESULT,
      feed: defer(() => this.store.watch(key)).pipe(
        map((payload) => this.mapPayload(key, payload, context))
      ),
      fromError: (error) =>
        this.failure(
          this.config.mapper.fromException(error, {
            ...context,
            location: `${context.location}:onError`,
          })
        ),
      closed: () => this.failure(withMetadata(DatabaseErrors.DB_STREAM_CLOSED, { ...context })),
    };
  }

  private mapPayload(
    key: string,
    payload: DocumentPayload,
    context: ErrorContext
  ): Result<DocumentPayload> {
    const businessError = this.config.mapper.fromPayload(payload, context);
    if (businessError) {
      return this.failure(businessError);
    }

    if (this.config.treatEmptyAsMissing && Object.keys(payload).length === 0) {
      return err(withMetadata(DatabaseErrors.DB_NOT_FOUND, { ...context }));
    }

    return ok(this.withId(key, payload));
  }

  private withId(key: string, payload: DocumentPayload): DocumentPayload {
    if (Object.prototype.hasOwnProperty.call(payload, this.config.idKey)) {
      return payload;
    }
    return { ...payload, [this.config.idKey]: key };
  }

  private failure(error: StructuredError): Result<never> {
    this.logger.warn('Operation failed', {
      code: error.code,
      location: error.metadata['location'],
      key: error.metadata['key'],
    });
    return err(error);
  }

  private context(operation: string, key: string): ErrorContext {
    return {
      location: `ReactiveDocumentGateway.${operation}`,
      key,
      collection: this.config.name,
    };
  }

  private assertActive(operation: string, key: string): void {
    assertPrecondition(!this.disposed, 'ReactiveDocumentGateway is disposed', { operation, key });
  }
}
