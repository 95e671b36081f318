import { DecodeError } from '../../domain/index.js';
import type { EventFields } from '../../domain/index.js';
import type { Codec } from './types.js';

export function isJsonObject(value: unknown): value is EventFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err: unknown) {
    throw new DecodeError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Structured JSON body.
 *
 * - object → one event whose fields are the object's top-level keys
 * - array of objects → one event per element, in array order
 */
export const jsonCodec: Codec = {
  name: 'json',
  decode(payload) {
    const value = parseJson(payload.toString('utf8'));

    if (isJsonObject(value)) return [value];

    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => {
        if (!isJsonObject(item)) {
          throw new DecodeError(`element ${index} is not a JSON object`);
        }
        return item;
      });
    }

    throw new DecodeError('expected a JSON object or an array of objects');
  },
};
