export { CodecRegistry, BUILTIN_CODECS, DEFAULT_CODEC_MAPPING, normalizeContentType } from './codecs/index.js';
export { plainCodec, lineCodec, jsonCodec, jsonLinesCodec } from './codecs/index.js';
export type { Codec, CodecRegistryOptions, DecodeResult } from './codecs/index.js';
export { decompress } from './decompress.js';
export type { DecompressResult, DecompressOptions } from './decompress.js';
export { authenticate, parseBasicAuthorization } from './authenticate.js';
export type { BasicCredentials } from './authenticate.js';
export { WorkerPool } from './worker-pool.js';
export type { WorkerSlot } from './worker-pool.js';
export { admit } from './admission.js';
export type { Admission } from './admission.js';
export { ingest, EnqueueError } from './ingest.js';
export type { IngestRequest, IngestDeps, IngestOutcome } from './ingest.js';
export { settingsSchema, parsePairs } from './settings-schema.js';
export type { Settings, SettingsInput } from './settings-schema.js';
