/**
 * @packageDocumentation
 *
 * In-memory document store for Quire.
 *
 * Keeps every collection in process memory and exposes it through the
 * `DocumentStore` contract of `@quire/core`, live watch feeds included.
 * Useful for tests, demos and prototyping a gateway before a real backend
 * exists.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ReactiveDocumentGateway } from '@quire/core';
 * import { createMemoryStorage } from '@quire/storage-memory';
 *
 * const storage = createMemoryStorage();
 * const gateway = new ReactiveDocumentGateway({
 *   store: storage.getStore('users'),
 *   name: 'users',
 * });
 *
 * await gateway.write('u1', { name: 'Alice' });
 * ```
 *
 * ## Simulating failures
 *
 * `latencyMs`, `failOnWrite` and `failOnDelete` let tests exercise slow or
 * failing backends without a server.
 *
 * ## Limitations
 *
 * - Data is lost when the process ends or the storage closes
 * - Watch feeds only emit for writes and deletes made through this store
 *
 * @module @quire/storage-memory
 */
export * from './adapter.js';
