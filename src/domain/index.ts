export { createEvent } from './event.js';
export type { Event, EventFields } from './event.js';
export type { EventQueue } from './queue.js';
export { ConfigurationError, DecodeError, QueueClosedError } from './errors.js';
