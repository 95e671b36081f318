import type { WorkerPool, WorkerSlot } from './worker-pool.js';

export type Admission =
  | { accepted: true; slot: WorkerSlot }
  | { accepted: false };

/**
 * Binds an incoming request to a free worker slot, or rejects it.
 *
 * Rejection is immediate: the caller answers 429 without reading the body,
 * and no slot is consumed.
 */
export function admit(pool: WorkerPool): Admission {
  const slot = pool.tryAcquire();
  return slot ? { accepted: true, slot } : { accepted: false };
}
