import type { Observable } from 'rxjs';
import { assertPrecondition } from '../errors/quire-error.js';
import { silentLogger, type QuireLogger } from '../observability/logger.js';
import { SharedKeyedChannel, type ChannelSource } from './shared-keyed-channel.js';

/**
 * Options for {@link ChannelRegistry}
 */
export interface ChannelRegistryOptions {
  /** Name used in log entries and precondition messages */
  name?: string;
  logger?: QuireLogger;
}

/**
 * Key → {@link SharedKeyedChannel} map guaranteeing at most one channel, and
 * therefore one backend subscription, per key.
 *
 * Lifecycle is caller-managed and explicit:
 * - every {@link acquire} increments the key's reference count, even when
 *   the same caller acquires twice;
 * - every completed `acquire` must be matched by one {@link release};
 * - unsubscribing from the returned view does **not** release it.
 *
 * @typeParam K - Key type
 * @typeParam V - Value type watchers observe
 *
 * @example
 * ```typescript
 * const registry = new ChannelRegistry<string, number>((key) => ({
 *   bootstrap: 0,
 *   feed: prices$(key),
 *   fromError: () => -1,
 *   closed: () => -1,
 * }));
 *
 * const sub = registry.acquire('AAPL').subscribe(render);
 * // ...
 * sub.unsubscribe();
 * registry.release('AAPL'); // closes the feed when no watcher is left
 * ```
 */
export class ChannelRegistry<K, V> {
  private readonly channels = new Map<K, SharedKeyedChannel<K, V>>();
  private readonly open: (key: K) => ChannelSource<V>;
  private readonly name: string;
  private readonly logger: QuireLogger;
  private terminal = false;

  constructor(open: (key: K) => ChannelSource<V>, options: ChannelRegistryOptions = {}) {
    this.open = open;
    this.name = options.name ?? 'ChannelRegistry';
    this.logger = (options.logger ?? silentLogger).child('channels');
  }

  /**
   * Retain the channel for `key`, opening it on first use, and return a new
   * fan-out view of it.
   *
   * @throws PreconditionViolationError after {@link disposeAll}
   */
  acquire(key: K): Observable<V> {
    assertPrecondition(!this.terminal, `${this.name} is disposed`, { key: String(key) });

    let channel = this.channels.get(key);
    if (!channel) {
      channel = new SharedKeyedChannel(key, this.open(key));
      this.channels.set(key, channel);
      this.logger.debug('Channel opened', { key: String(key) });
    }

    channel.retain();
    return channel.view();
  }

  /**
   * Drop one reference to `key`. When none remain the channel is disposed and
   * removed. No-op for unknown keys.
   */
  release(key: K): void {
    const channel = this.channels.get(key);
    if (!channel) return;

    if (channel.release()) {
      this.close(key, channel);
    }
  }

  /**
   * Dispose the channel for `key` immediately, whatever its reference count.
   * No-op for unknown keys.
   */
  forceRelease(key: K): void {
    const channel = this.channels.get(key);
    if (!channel) return;
    this.close(key, channel);
  }

  /**
   * Dispose every channel and reject further {@link acquire} calls.
   */
  disposeAll(): void {
    this.terminal = true;
    for (const [key, channel] of [...this.channels]) {
      this.close(key, channel);
    }
  }

  has(key: K): boolean {
    return this.channels.has(key);
  }

  /** Current reference count for `key` (0 when absent) */
  refCount(key: K): number {
    return this.channels.get(key)?.refCount ?? 0;
  }

  /** Last value published on the channel for `key` */
  peek(key: K): V | undefined {
    return this.channels.get(key)?.value;
  }

  keys(): K[] {
    return Array.from(this.channels.keys());
  }

  /** Number of open channels */
  get size(): number {
    return this.channels.size;
  }

  get isDisposed(): boolean {
    return this.terminal;
  }

  private close(key: K, channel: SharedKeyedChannel<K, V>): void {
    // Remove first so a view completing synchronously cannot observe a stale entry
    this.channels.delete(key);
    channel.dispose();
    this.logger.debug('Channel closed', { key: String(key) });
  }
}
