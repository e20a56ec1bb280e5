import type { z } from 'zod';

/**
 * Translates one application value type to a storable payload and back.
 *
 * `typeId` must never be reused for an incompatible schema: changing the
 * encoding requires a new `typeId`, otherwise old entries decode silently
 * into the wrong shape instead of being reported as mismatched.
 *
 * `decode(encode(value))` must equal `value` for every valid value.
 */
export interface Codec<T> {
  /** Stable, version-stamped identifier (e.g. "user:v1") */
  readonly typeId: string;
  /**
   * Encodes a value for storage.
   * @param value - The value to encode
   * @returns The payload handed to the backend
   */
  readonly encode: (value: T) => unknown;
  /**
   * Decodes a stored payload.
   * @param payload - What `encode` produced, as returned by the backend
   * @returns The decoded value
   * @throws When the payload is malformed
   */
  readonly decode: (payload: unknown) => T;
}

/**
 * Options for the JSON string codec.
 */
export interface JsonCodecOptions<T> {
  readonly typeId: string;
  /** Schema validating the parsed JSON; its output is the decoded value */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Plain JSON object shape produced by a JSON map codec.
 */
export type JsonMap = Readonly<Record<string, unknown>>;

/**
 * Options for the JSON map codec.
 */
export interface JsonMapCodecOptions<T> {
  readonly typeId: string;
  readonly toJson: (value: T) => JsonMap;
  /** Rebuilds a value from its JSON map; may throw on missing fields */
  readonly fromJson: (json: JsonMap) => T;
}
