export { resolveSettings, loadSettingsFromEnv, loadTlsMaterial, credentialsFrom } from './config/index.js';
export type { TlsMaterial } from './config/index.js';
export {
  BoundedQueue,
  RedisStreamQueue,
  DEFAULT_STREAM_KEY,
  DEFAULT_CONSUMER_GROUP,
  startStdoutSink,
} from './queue/index.js';
export type { RedisStreamQueueOptions } from './queue/index.js';
export { createShutdown } from './lifecycle/index.js';
export type { ShutdownStep, ShutdownOptions } from './lifecycle/index.js';
