import type { Event } from './event.js';

/**
 * Downstream bounded queue as seen by the ingest pipeline.
 *
 * `push` resolves once the event has been accepted and stays pending
 * while the queue is full. It never drops an event silently: it either
 * resolves or rejects.
 */
export interface EventQueue {
  push(event: Event): Promise<void>;
}
