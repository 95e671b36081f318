export { CodecRegistry, BUILTIN_CODECS, DEFAULT_CODEC_MAPPING, normalizeContentType } from './registry.js';
export type { CodecRegistryOptions, DecodeResult } from './registry.js';
export type { Codec } from './types.js';
export { plainCodec } from './plain.js';
export { lineCodec } from './line.js';
export { jsonCodec } from './json.js';
export { jsonLinesCodec } from './json-lines.js';
