import { BehaviorSubject, defer, type Observable, type Subscription, skip, startWith } from 'rxjs';

/**
 * Everything a {@link SharedKeyedChannel} needs to open its single backend
 * subscription.
 *
 * @typeParam V - The value type every watcher observes
 */
export interface ChannelSource<V> {
  /** Value every view emits first, before any backend data */
  readonly bootstrap: V;
  /** Backend live feed. Subscribed exactly once, when the channel opens. */
  readonly feed: Observable<V>;
  /** Convert a feed error into the value published to watchers */
  fromError(error: unknown): V;
  /** Value published when the feed completes */
  closed(): V;
}

/**
 * Per-key shared state behind a live watch: one backend subscription, one
 * last-value cell and a reference count.
 *
 * The backend feed is subscribed as soon as the channel is constructed.
 * Feed values, feed errors and feed completion are all turned into values
 * and published to the cell, so watchers observe a terminal failure value
 * rather than an errored or silently completed stream.
 *
 * Values published before the first view is subscribed (including those a
 * feed emits synchronously while it is being subscribed) are held back and
 * delivered to that first subscriber right after the bootstrap value.
 *
 * The reference count is managed by the owner ({@link ChannelRegistry});
 * unsubscribing from a {@link view} never changes it.
 *
 * @typeParam K - Key type
 * @typeParam V - Value type
 */
export class SharedKeyedChannel<K, V> {
  readonly key: K;

  private readonly bootstrap: V;
  private readonly cell: BehaviorSubject<V>;
  private subscription: Subscription | null = null;
  /** Published before any view subscribed; `null` once handed over */
  private early: V[] | null = [];
  private refs = 0;
  private disposed = false;

  constructor(key: K, source: ChannelSource<V>) {
    this.key = key;
    this.bootstrap = source.bootstrap;
    this.cell = new BehaviorSubject<V>(source.bootstrap);

    const subscription = source.feed.subscribe({
      next: (value) => this.publish(value),
      error: (error: unknown) => this.publish(source.fromError(error)),
      complete: () => this.publish(source.closed()),
    });

    // The feed may have finished synchronously, or a subscriber may have
    // disposed the channel from inside a publish.
    if (this.disposed) {
      subscription.unsubscribe();
    } else {
      this.subscription = subscription;
    }
  }

  /**
   * A fan-out view for one watcher: the bootstrap value first, then every
   * value published after the view is subscribed. The first subscription
   * also receives what the feed produced before it. Completes on dispose.
   */
  view(): Observable<V> {
    return defer(() => {
      const early = this.early ?? [];
      this.early = null;
      return this.cell.pipe(skip(1), startWith(this.bootstrap, ...early));
    });
  }

  /** Last published value, or `undefined` once disposed */
  get value(): V | undefined {
    return this.disposed ? undefined : this.cell.getValue();
  }

  get refCount(): number {
    return this.refs;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Whether the backend subscription is still open */
  get isSubscribed(): boolean {
    return this.subscription !== null && !this.subscription.closed;
  }

  /** Increment the watcher count */
  retain(): void {
    this.refs += 1;
  }

  /**
   * Decrement the watcher count.
   *
   * @returns `true` when the count reached zero and the channel should be disposed
   */
  release(): boolean {
    this.refs = Math.max(0, this.refs - 1);
    return this.refs === 0;
  }

  /**
   * Cancel the backend subscription and complete every view. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.early = null;
    this.cell.complete();
  }

  private publish(value: V): void {
    if (this.disposed) return;
    this.early?.push(value);
    this.cell.next(value);
  }
}
