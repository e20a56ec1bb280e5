import type { Codec, JsonCodecOptions } from './types.js';

/**
 * Creates a codec that stores values as JSON strings and validates them on
 * the way back with a zod schema.
 *
 * Decoding throws for a non-string payload, invalid JSON, or a schema
 * violation; the cache store treats any of these as a corrupted entry.
 *
 * @param options - Type id and validation schema
 * @returns A Codec instance
 *
 * @example
 * ```typescript
 * const userCodec = createJsonCodec({
 *   typeId: 'user:v1',
 *   schema: z.object({ id: z.string(), name: z.string() }),
 * });
 * ```
 */
export const createJsonCodec = <T>(options: JsonCodecOptions<T>): Codec<T> => {
  const { typeId, schema } = options;

  const encode = (value: T): string => JSON.stringify(value);

  const decode = (payload: unknown): T => {
    if (typeof payload !== 'string') {
      throw new TypeError(`Expected a JSON string payload for "${typeId}", got ${typeof payload}`);
    }

    return schema.parse(JSON.parse(payload));
  };

  return { typeId, encode, decode };
};
