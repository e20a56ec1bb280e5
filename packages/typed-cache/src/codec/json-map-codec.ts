import type { Codec, JsonMap, JsonMapCodecOptions } from './types.js';

const isJsonMap = (value: unknown): value is JsonMap =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Creates a codec that stores values as plain JSON objects, using
 * caller-supplied `toJson` / `fromJson` functions.
 *
 * Suited to backends that persist structured documents rather than strings.
 *
 * @param options - Type id and conversion functions
 * @returns A Codec instance
 */
export const createJsonMapCodec = <T>(options: JsonMapCodecOptions<T>): Codec<T> => {
  const { typeId, toJson, fromJson } = options;

  const encode = (value: T): JsonMap => toJson(value);

  const decode = (payload: unknown): T => {
    if (!isJsonMap(payload)) {
      throw new TypeError(`Expected a JSON object payload for "${typeId}"`);
    }

    return fromJson({ ...payload });
  };

  return { typeId, encode, decode };
};
