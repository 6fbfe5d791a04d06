import { filter, map, type Observable } from 'rxjs';
import { KeyedFifoExecutor } from '../concurrency/keyed-fifo-executor.js';
import { DatabaseErrors } from '../errors/error-codes.js';
import { describeError } from '../errors/error-mapper.js';
import { assertPrecondition } from '../errors/quire-error.js';
import type { StructuredError } from '../errors/structured-error.js';
import { isBootstrap, type DocumentGateway } from '../gateway/reactive-document-gateway.js';
import { silentLogger, type QuireLogger } from '../observability/logger.js';
import type { DocumentPayload, EntityCodec } from '../types/document.js';
import { err, ok, type Result } from '../types/result.js';

const settle = (): void => undefined;

/**
 * Typed document access
 *
 * @typeParam T - Entity type
 */
export interface DocumentRepository<T> {
  read(key: string): Promise<Result<T>>;
  write(key: string, entity: T): Promise<Result<T>>;
  delete(key: string): Promise<Result<void>>;
  /** Retains a shared watch on `key`; pair every call with {@link detachWatch} */
  watch(key: string): Observable<Result<T>>;
  detachWatch(key: string): void;
  releaseDoc(key: string): void;
  dispose(): void;
}

/**
 * Repository configuration
 */
export interface SerializingRepositoryConfig<T> {
  gateway: DocumentGateway;
  codec: EntityCodec<T>;
  /**
   * Run writes and deletes for the same document one at a time, in call order
   * @default true
   */
  serializeWrites?: boolean;
  /** Executor used for serialization (default: a private one) */
  executor?: KeyedFifoExecutor<string>;
  logger?: QuireLogger;
}

/**
 * Repository decoding gateway payloads into typed entities and serializing
 * writes per document.
 *
 * With `serializeWrites` (the default) every `write` and `delete` for a key
 * goes through a {@link KeyedFifoExecutor} keyed by that document id, so two
 * saves of the same document never interleave and land in call order, while
 * saves of different documents proceed independently.
 *
 * Payloads the codec rejects become `DB_SERIALIZATION_ERROR` failures.
 * `watch` skips the gateway's bootstrap emission, so the codec only sees
 * real documents.
 *
 * @example
 * ```typescript
 * const todos = new SerializingRepository({
 *   gateway,
 *   codec: zodCodec(todoSchema),
 * });
 *
 * await Promise.all([
 *   todos.write('t1', { id: 't1', title: 'draft', done: false }),
 *   todos.write('t1', { id: 't1', title: 'final', done: true }),
 * ]);
 * // 'final' is stored last
 * ```
 */
export class SerializingRepository<T> implements DocumentRepository<T> {
  private readonly gateway: DocumentGateway;
  private readonly codec: EntityCodec<T>;
  private readonly executor: KeyedFifoExecutor<string>;
  private readonly serializeWrites: boolean;
  private readonly logger: QuireLogger;
  /** Submitted writes and deletes that have not settled yet */
  private readonly inFlight = new Set<Promise<void>>();
  private disposed = false;

  constructor(config: SerializingRepositoryConfig<T>) {
    this.gateway = config.gateway;
    this.codec = config.codec;
    this.serializeWrites = config.serializeWrites ?? true;
    this.logger = (config.logger ?? silentLogger).child('repository');
    this.executor = config.executor ?? new KeyedFifoExecutor<string>({ logger: this.logger });
  }

  async read(key: string): Promise<Result<T>> {
    this.assertActive('read');
    const result = await this.gateway.read(key);
    return result.ok ? this.decode(key, result.value, 'read') : result;
  }

  write(key: string, entity: T): Promise<Result<T>> {
    this.assertActive('write');
    return this.enqueue(key, async () => {
      let payload: DocumentPayload;
      try {
        payload = this.codec.toJson(entity);
      } catch (error) {
        return err(this.serializationError(key, 'write', error));
      }

      const result = await this.gateway.write(key, payload);
      return result.ok ? this.decode(key, result.value, 'write') : result;
    });
  }

  delete(key: string): Promise<Result<void>> {
    this.assertActive('delete');
    return this.enqueue(key, () => this.gateway.delete(key));
  }

  /**
   * Watch a document as typed entities. Pair with {@link detachWatch}.
   */
  watch(key: string): Observable<Result<T>> {
    this.assertActive('watch');
    return this.gateway.watch(key).pipe(
      filter((result) => !isBootstrap(result)),
      map((result) => (result.ok ? this.decode(key, result.value, 'watch') : result))
    );
  }

  detachWatch(key: string): void {
    this.gateway.detachWatch(key);
  }

  releaseDoc(key: string): void {
    this.gateway.releaseDoc(key);
  }

  /**
   * Reject further use and dispose the executor. Writes and deletes already
   * submitted still run; the gateway is disposed once they have settled.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.executor.dispose();

    if (this.inFlight.size === 0) {
      this.gateway.dispose();
      return;
    }

    this.logger.debug('Disposing after pending writes', { pending: this.inFlight.size });
    void Promise.all(this.inFlight).then(() => this.gateway.dispose());
  }

  // ── Private ──────────────────────────────────────────────────────────

  private enqueue<R>(key: string, task: () => Promise<Result<R>>): Promise<Result<R>> {
    const outcome = this.serializeWrites ? this.executor.withLock(key, task) : task();

    const settled = outcome.then(settle, settle);
    this.inFlight.add(settled);
    void settled.then(() => this.inFlight.delete(settled));

    return outcome;
  }

  private decode(key: string, payload: DocumentPayload, operation: string): Result<T> {
    try {
      return ok(this.codec.fromJson(payload));
    } catch (error) {
      return err(this.serializationError(key, operation, error));
    }
  }

  private serializationError(key: string, operation: string, error: unknown): StructuredError {
    const known = DatabaseErrors.DB_SERIALIZATION_ERROR;
    const description = describeError(error);
    this.logger.warn('Codec rejected document', { key, operation, description });
    return Object.freeze({
      ...known,
      description: description || known.description,
      metadata: Object.freeze({
        ...known.metadata,
        location: `SerializingRepository.${operation}`,
        key,
      }),
    });
  }

  private assertActive(operation: string): void {
    assertPrecondition(!this.disposed, 'SerializingRepository is disposed', { operation });
  }
}
