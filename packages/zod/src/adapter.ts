/**
 * Zod entity codecs
 *
 * Builds the `EntityCodec` a `SerializingRepository` needs from a Zod schema.
 *
 * @module @quire/zod
 */

import type { DocumentPayload, EntityCodec } from '@quire/core';
import { z } from 'zod';

/**
 * Options for {@link zodCodec}
 */
export interface ZodCodecOptions<T> {
  /** Validate entities against the schema before they are written (default: true) */
  validateOnWrite?: boolean;
  /** Custom entity → payload conversion (default: own enumerable fields) */
  toJson?: (entity: T) => DocumentPayload;
}

/**
 * Thrown by a Zod codec when a payload or entity fails validation
 */
export class CodecValidationError extends Error {
  /** `path: message` for every failed check */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Validation failed: ${issues.join(', ')}`);
    this.name = 'CodecValidationError';
    this.issues = issues;
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new CodecValidationError(describeIssues(result.error));
  }
  return result.data;
}

function fields(entity: object): DocumentPayload {
  return Object.fromEntries(Object.entries(entity));
}

/**
 * Create an entity codec from a Zod schema.
 *
 * `fromJson` parses payloads with the schema, so defaults and transforms
 * apply. Both directions throw a {@link CodecValidationError} on invalid
 * data, which a repository reports as `DB_SERIALIZATION_ERROR`.
 *
 * @example
 * ```typescript
 * const todoSchema = documentSchema({
 *   title: z.string().min(1),
 *   done: z.boolean().default(false),
 * });
 *
 * const todos = new SerializingRepository({
 *   gateway,
 *   codec: zodCodec(todoSchema),
 * });
 * ```
 */
export function zodCodec<T extends object>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ZodCodecOptions<T> = {}
): EntityCodec<T> {
  const { validateOnWrite = true, toJson = fields } = options;

  return {
    fromJson: (payload) => parseWith(schema, payload),
    toJson: (entity) => toJson(validateOnWrite ? parseWith(schema, entity) : entity),
  };
}

/**
 * Create an object schema for documents keyed by a string `id`
 *
 * @example
 * ```typescript
 * const userZod = documentSchema({
 *   name: z.string(),
 *   email: z.string().email(),
 * });
 *
 * type User = z.infer<typeof userZod>; // { id: string; name: string; email: string }
 * ```
 */
export function documentSchema<T extends z.ZodRawShape>(shape: T) {
  return z.object({ id: z.string().min(1) }).extend(shape);
}
