/**
 * Core domain types for the ingest event model.
 *
 * These types define the canonical shape of an event as it is handed
 * to the downstream queue. They carry no framework dependencies.
 */

/** Top-level fields produced by a codec for a single event. */
export type EventFields = Record<string, unknown>;

/**
 * Canonical Event record.
 *
 * `host` is always the remote peer address of the request that carried
 * the event. `@timestamp` is the receive time unless the payload set one
 * as a string.
 */
export interface Event {
  readonly host: string;
  readonly '@timestamp': string; // ISO-8601
  readonly [field: string]: unknown;
}

/**
 * Builds a frozen event from decoded fields.
 * The `host` stamp wins over any `host` the payload carried; a payload
 * `@timestamp` that is not a string is replaced by the receive time.
 */
export function createEvent(fields: EventFields, host: string, receivedAt: Date = new Date()): Event {
  const { '@timestamp': timestamp, ...rest } = fields;

  return Object.freeze({
    '@timestamp': typeof timestamp === 'string' ? timestamp : receivedAt.toISOString(),
    ...rest,
    host,
  });
}
