import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createMemoryStorage,
  type MemoryDocumentStore,
} from '../../../storage-memory/src/adapter.js';
import { DatabaseErrors } from '../errors/error-codes.js';
import { ReactiveDocumentGateway } from '../gateway/reactive-document-gateway.js';
import { SerializingRepository } from '../repository/serializing-repository.js';
import type { EntityCodec } from '../types/document.js';
import { err, ok } from '../types/result.js';
import { DocumentUseCases, isNotFound } from './document-use-cases.js';

interface Todo {
  id: string;
  title: string;
  done: boolean;
}

const todoCodec: EntityCodec<Todo> = {
  fromJson: (payload) => {
    const { id, title, done } = payload;
    if (typeof id !== 'string' || typeof title !== 'string' || typeof done !== 'boolean') {
      throw new Error('invalid todo');
    }
    return { id, title, done };
  },
  toJson: (todo) => ({ id: todo.id, title: todo.title, done: todo.done }),
};

const draft: Todo = { id: 't1', title: 'Draft', done: false };
const fallback = (): Todo => ({ id: 'new', title: 'Untitled', done: false });

describe('DocumentUseCases', () => {
  const storage = createMemoryStorage();
  let backend: MemoryDocumentStore;
  let gateway: ReactiveDocumentGateway;
  let todos: DocumentUseCases<Todo>;

  beforeEach(() => {
    backend = storage.getStore('todos');
    gateway = new ReactiveDocumentGateway({ store: backend, name: 'todos', treatEmptyAsMissing: true });
    todos = new DocumentUseCases({
      repository: new SerializingRepository({ gateway, codec: todoCodec }),
      codec: todoCodec,
    });
  });

  afterEach(() => {
    gateway.dispose();
    storage.deleteStore('todos');
  });

  describe('exists', () => {
    it('should report missing and present documents', async () => {
      await backend.write('t1', { ...draft });

      expect(await todos.exists('t1')).toEqual(ok(true));
      expect(await todos.exists('t2')).toEqual(ok(false));
    });

    it('should pass other failures through', async () => {
      await backend.write('bad', { title: 1 });

      expect(await todos.exists('bad')).toMatchObject({
        ok: false,
        error: { code: 'DB_SERIALIZATION_ERROR' },
      });
    });
  });

  describe('readOrDefault', () => {
    it('should substitute the default without writing it', async () => {
      expect(await todos.readOrDefault('t1', fallback)).toEqual(ok(fallback()));
      expect(backend.size).toBe(0);
    });

    it('should return the stored document when present', async () => {
      await backend.write('t1', { ...draft });

      expect(await todos.readOrDefault('t1', fallback)).toEqual(ok(draft));
    });
  });

  describe('mutate', () => {
    it('should write the transformed entity', async () => {
      await backend.write('t1', { ...draft });

      const result = await todos.mutate('t1', (todo) => ({ ...todo, done: true }));

      expect(result).toEqual(ok({ ...draft, done: true }));
      expect(await backend.read('t1')).toEqual({ ...draft, done: true });
    });

    it('should fail for missing documents', async () => {
      const result = await todos.mutate('t1', (todo) => todo);

      expect(result.ok === false && isNotFound(result.error)).toBe(true);
      expect(backend.size).toBe(0);
    });
  });

  describe('patch', () => {
    it('should merge fields into the stored JSON', async () => {
      await backend.write('t1', { ...draft });

      expect(await todos.patch('t1', { title: 'Final' })).toEqual(ok({ ...draft, title: 'Final' }));
      expect(await backend.read('t1')).toEqual({ ...draft, title: 'Final' });
    });

    it('should reject a patch the codec cannot decode', async () => {
      await backend.write('t1', { ...draft });

      expect(await todos.patch('t1', { done: 'yes' })).toEqual({
        ok: false,
        error: {
          title: 'Serialization Error',
          code: 'DB_SERIALIZATION_ERROR',
          description: 'invalid todo',
          severity: 'severe',
          metadata: { source: 'Database', location: 'DocumentUseCases.patch', key: 't1' },
        },
      });
      expect(await backend.read('t1')).toEqual(draft);
    });
  });

  describe('ensure', () => {
    it('should create missing documents', async () => {
      const created = { ...draft, title: 'Created' };

      expect(await todos.ensure('t1', () => created)).toEqual(ok(created));
      expect(await backend.read('t1')).toEqual(created);
    });

    it('should leave existing documents alone without an update', async () => {
      await backend.write('t1', { ...draft });

      expect(await todos.ensure('t1', fallback)).toEqual(ok(draft));
    });

    it('should update existing documents when asked', async () => {
      await backend.write('t1', { ...draft });

      const result = await todos.ensure('t1', fallback, (todo) => ({ ...todo, done: true }));

      expect(result).toEqual(ok({ ...draft, done: true }));
      expect(await backend.read('t1')).toEqual({ ...draft, done: true });
    });
  });

  describe('batch operations', () => {
    it('should read many documents into a map keyed by id', async () => {
      await backend.write('t1', { ...draft });

      const results = await todos.readMany(['t1', 't2']);

      expect([...results.keys()]).toEqual(['t1', 't2']);
      expect(results.get('t1')).toEqual(ok(draft));
      expect(results.get('t2')).toMatchObject({ ok: false, error: { code: 'DB_NOT_FOUND' } });
    });

    it('should write many documents in order', async () => {
      const second = { id: 't2', title: 'Second', done: true };

      const results = await todos.writeMany(
        new Map([
          ['t1', draft],
          ['t2', second],
        ])
      );

      expect([...results.entries()]).toEqual([
        ['t1', ok(draft)],
        ['t2', ok(second)],
      ]);
      expect(backend.size).toBe(2);
    });

    it('should delete many documents', async () => {
      await backend.write('t1', { ...draft });

      const results = await todos.deleteMany(['t1', 'missing']);

      expect([...results.values()]).toEqual([ok(), ok()]);
      expect(backend.size).toBe(0);
    });
  });

  describe('watchUntil', () => {
    it('should resolve with the first matching entity and detach', async () => {
      await backend.write('t1', { ...draft });

      const pending = todos.watchUntil('t1', (todo) => todo.done);
      expect(gateway.watcherCount('t1')).toBe(1);

      await todos.write('t1', { ...draft, title: 'Still open' });
      await todos.write('t1', { ...draft, title: 'Closed', done: true });

      expect(await pending).toEqual(ok({ ...draft, title: 'Closed', done: true }));
      expect(gateway.activeWatchCount).toBe(0);
    });

    it('should resolve with the first failure', async () => {
      const result = await todos.watchUntil('missing', () => true);

      expect(result).toMatchObject({ ok: false, error: { code: 'DB_NOT_FOUND' } });
      expect(gateway.activeWatchCount).toBe(0);
    });

    it('should resolve with a closed-stream failure when the watch is released', async () => {
      await backend.write('t1', { ...draft });

      const pending = todos.watchUntil('t1', (todo) => todo.done);
      gateway.releaseDoc('t1');

      expect(await pending).toEqual(
        err({
          ...DatabaseErrors.DB_STREAM_CLOSED,
          metadata: { source: 'Database', location: 'DocumentUseCases.watchUntil', key: 't1' },
        })
      );
      expect(gateway.activeWatchCount).toBe(0);
    });
  });
});
