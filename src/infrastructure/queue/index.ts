export { BoundedQueue } from './bounded-queue.js';
export { RedisStreamQueue, DEFAULT_STREAM_KEY, DEFAULT_CONSUMER_GROUP } from './redis-stream-queue.js';
export type { RedisStreamQueueOptions } from './redis-stream-queue.js';
export { startStdoutSink } from './stdout-sink.js';
