export type { Codec, JsonCodecOptions, JsonMap, JsonMapCodecOptions } from './types.js';
export { createJsonCodec } from './json-codec.js';
export { createJsonMapCodec } from './json-map-codec.js';
