import type { Codec } from './types.js';

/** Whole body as a single `message` field. */
export const plainCodec: Codec = {
  name: 'plain',
  decode(payload) {
    return [{ message: payload.toString('utf8') }];
  },
};
