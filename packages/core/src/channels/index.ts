/**
 * Shared live-feed channels.
 *
 * - {@link SharedKeyedChannel}: one backend subscription, last-value cell and
 *   reference count for a single key
 * - {@link ChannelRegistry}: at most one channel per key, with explicit
 *   acquire/release lifecycle
 *
 * ```
 *   watch(k) ──► acquire(k) ──┐
 *   watch(k) ──► acquire(k) ──┼──► SharedKeyedChannel(k) ◄── backend feed (1 subscription)
 *   watch(k) ──► acquire(k) ──┘         │
 *                                       └──► N independent views
 * ```
 *
 * @module channels
 */
export * from './channel-registry.js';
export * from './shared-keyed-channel.js';
