import { describeError } from '../errors/error-mapper.js';
import { silentLogger, type QuireLogger } from '../observability/logger.js';

/**
 * Options for {@link KeyedFifoExecutor}
 */
export interface KeyedFifoExecutorOptions {
  /** Logger for action failures (debug level) */
  logger?: QuireLogger;
}

const SETTLED: Promise<void> = Promise.resolve();

const ignore = (): void => undefined;

/**
 * Runs asynchronous actions in FIFO order per key.
 *
 * Every key has its own serial chain: actions submitted with the same key run
 * one after another, in submission order, and never overlap. Actions for
 * different keys are unordered relative to each other and interleave freely.
 *
 * Each caller gets its own action's outcome. A rejected or throwing action
 * settles its slot in the chain like a successful one, so the next action for
 * the key still runs.
 *
 * Calling `withLock` for the same key from inside a running action waits on
 * the outer action and never resolves. Nesting with a different key is fine.
 *
 * Chains are pruned once the last queued action of a key settles, so idle
 * keys hold no memory.
 *
 * @typeParam K - Key type, compared with `Map` semantics
 *
 * @example
 * ```typescript
 * const executor = new KeyedFifoExecutor<string>();
 *
 * // Both saves for 'user-1' run one after the other, in this order
 * const first = executor.withLock('user-1', () => store.write('user-1', a));
 * const second = executor.withLock('user-1', () => store.write('user-1', b));
 * ```
 */
export class KeyedFifoExecutor<K> {
  private readonly tails = new Map<K, Promise<void>>();
  private readonly logger: QuireLogger;
  private disposed = false;

  constructor(options: KeyedFifoExecutorOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child('fifo');
  }

  /**
   * Schedule `action` after every action already queued for `key`.
   *
   * @returns The action's own result; rejects with the action's own error
   */
  withLock<R>(key: K, action: () => Promise<R> | R): Promise<R> {
    if (this.disposed) {
      return new Promise<R>((resolve) => resolve(action()));
    }

    const previous = this.tails.get(key) ?? SETTLED;
    const outcome = previous.then(action);

    const tail = outcome.then(ignore, (error: unknown) => {
      this.logger.debug('Queued action failed', {
        key: String(key),
        error: describeError(error),
      });
    });
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return outcome;
  }

  /**
   * Number of keys with queued or running actions
   */
  get size(): number {
    return this.tails.size;
  }

  /** Whether a key has queued or running actions */
  isBusy(key: K): boolean {
    return this.tails.has(key);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Stop chaining. In-flight and already queued actions still run to
   * completion; actions submitted afterwards start immediately and may
   * overlap them. Repeated calls are no-ops.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.tails.clear();
  }
}
