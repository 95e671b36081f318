import type { EventFields } from '../../domain/index.js';

/**
 * A codec turns one request body into zero or more events.
 *
 * Implementations throw `DecodeError` when the payload does not fit
 * their format; the registry turns that into a result value.
 */
export interface Codec {
  readonly name: string;
  decode(payload: Buffer): EventFields[];
}
