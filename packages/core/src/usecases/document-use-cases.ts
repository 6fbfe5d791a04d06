import { first, firstValueFrom, type Observable } from 'rxjs';
import { DatabaseErrors } from '../errors/error-codes.js';
import { describeError } from '../errors/error-mapper.js';
import { withMetadata, type StructuredError } from '../errors/structured-error.js';
import type { DocumentRepository } from '../repository/serializing-repository.js';
import type { DocumentPayload, EntityCodec } from '../types/document.js';
import { err, ok, type Result } from '../types/result.js';

/** Whether a failure means the document does not exist */
export function isNotFound(error: StructuredError): boolean {
  return error.code === DatabaseErrors.DB_NOT_FOUND.code;
}

/**
 * Configuration for {@link DocumentUseCases}
 */
export interface DocumentUseCasesConfig<T> {
  repository: DocumentRepository<T>;
  /** Needed by {@link DocumentUseCases.patch} to merge at the JSON level */
  codec: EntityCodec<T>;
}

/**
 * Higher-level document workflows built from repository primitives.
 *
 * Missing documents are detected by the `DB_NOT_FOUND` code, so the gateway
 * below the repository should run with `treatEmptyAsMissing`.
 *
 * Read-modify-write helpers ({@link mutate}, {@link patch}, {@link ensure})
 * read and write in two steps; concurrent callers of the same key may
 * overwrite each other.
 *
 * @typeParam T - Entity type
 */
export class DocumentUseCases<T> {
  private readonly repository: DocumentRepository<T>;
  private readonly codec: EntityCodec<T>;

  constructor(config: DocumentUseCasesConfig<T>) {
    this.repository = config.repository;
    this.codec = config.codec;
  }

  read(key: string): Promise<Result<T>> {
    return this.repository.read(key);
  }

  write(key: string, entity: T): Promise<Result<T>> {
    return this.repository.write(key, entity);
  }

  delete(key: string): Promise<Result<void>> {
    return this.repository.delete(key);
  }

  /** Watch a document. The caller owns the matching `detachWatch`. */
  watch(key: string): Observable<Result<T>> {
    return this.repository.watch(key);
  }

  detachWatch(key: string): void {
    this.repository.detachWatch(key);
  }

  /**
   * Whether a document exists. A missing document is `ok(false)`; any other
   * failure is passed through.
   */
  async exists(key: string): Promise<Result<boolean>> {
    const result = await this.repository.read(key);
    if (result.ok) return ok(true);
    return isNotFound(result.error) ? ok(false) : result;
  }

  /**
   * Read a document, substituting `orElse()` when it is missing. The default
   * is not written.
   */
  async readOrDefault(key: string, orElse: () => T): Promise<Result<T>> {
    const result = await this.repository.read(key);
    if (!result.ok && isNotFound(result.error)) {
      return ok(orElse());
    }
    return result;
  }

  /**
   * Read, apply `transform`, write the result back.
   */
  async mutate(key: string, transform: (current: T) => T): Promise<Result<T>> {
    const current = await this.repository.read(key);
    if (!current.ok) return current;
    return this.repository.write(key, transform(current.value));
  }

  /**
   * Merge `fields` into the stored JSON of a document and write it back.
   */
  async patch(key: string, fields: DocumentPayload): Promise<Result<T>> {
    const current = await this.repository.read(key);
    if (!current.ok) return current;

    let next: T;
    try {
      next = this.codec.fromJson({ ...this.codec.toJson(current.value), ...fields });
    } catch (error) {
      return err(this.patchError(key, error));
    }
    return this.repository.write(key, next);
  }

  /**
   * Make sure a document exists.
   *
   * - missing: writes `create()`;
   * - present with `updateIfExists`: writes the updated entity;
   * - present otherwise: returns it unchanged.
   */
  async ensure(
    key: string,
    create: () => T,
    updateIfExists?: (current: T) => T
  ): Promise<Result<T>> {
    const current = await this.repository.read(key);
    if (current.ok) {
      return updateIfExists ? this.repository.write(key, updateIfExists(current.value)) : current;
    }
    return isNotFound(current.error) ? this.repository.write(key, create()) : current;
  }

  /** Read several documents one after another */
  async readMany(keys: readonly string[]): Promise<Map<string, Result<T>>> {
    const results = new Map<string, Result<T>>();
    for (const key of keys) {
      results.set(key, await this.repository.read(key));
    }
    return results;
  }

  /** Write several documents one after another, in iteration order */
  async writeMany(
    entries: Iterable<readonly [string, T]> | ReadonlyMap<string, T>
  ): Promise<Map<string, Result<T>>> {
    const results = new Map<string, Result<T>>();
    for (const [key, entity] of entries) {
      results.set(key, await this.repository.write(key, entity));
    }
    return results;
  }

  /** Delete several documents one after another */
  async deleteMany(keys: readonly string[]): Promise<Map<string, Result<void>>> {
    const results = new Map<string, Result<void>>();
    for (const key of keys) {
      results.set(key, await this.repository.delete(key));
    }
    return results;
  }

  /**
   * Resolve with the first watched entity matching `predicate`, or with the
   * first failure. A watch closed before either arrives resolves with
   * `DB_STREAM_CLOSED`. The watch is detached afterwards.
   */
  async watchUntil(key: string, predicate: (entity: T) => boolean): Promise<Result<T>> {
    const stream = this.repository.watch(key);
    const closed = err(
      withMetadata(DatabaseErrors.DB_STREAM_CLOSED, {
        location: 'DocumentUseCases.watchUntil',
        key,
      })
    );
    try {
      return await firstValueFrom(
        stream.pipe(first((result) => !result.ok || predicate(result.value), closed))
      );
    } finally {
      this.repository.detachWatch(key);
    }
  }

  private patchError(key: string, error: unknown): StructuredError {
    const known = withMetadata(DatabaseErrors.DB_SERIALIZATION_ERROR, {
      location: 'DocumentUseCases.patch',
      key,
    });
    const description = describeError(error);
    return Object.freeze({ ...known, description: description || known.description });
  }
}
