/**
 * @quire/zod - Zod entity codecs
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { documentSchema, zodCodec } from '@quire/zod';
 * import { SerializingRepository } from '@quire/core';
 *
 * const userZod = documentSchema({
 *   name: z.string(),
 *   email: z.string().email(),
 *   age: z.number().min(0).optional(),
 * });
 *
 * type User = z.infer<typeof userZod>;
 *
 * const users = new SerializingRepository<User>({
 *   gateway,
 *   codec: zodCodec(userZod),
 * });
 *
 * // Payloads that fail the schema resolve as DB_SERIALIZATION_ERROR
 * const result = await users.read('u1');
 * ```
 *
 * @module @quire/zod
 */

export {
  CodecValidationError,
  documentSchema,
  zodCodec,
  type ZodCodecOptions,
} from './adapter.js';
