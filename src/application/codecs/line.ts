import type { Codec } from './types.js';

const DELIMITER = '\n';

/**
 * One event per newline-separated segment.
 *
 * The last segment is emitted even without a trailing delimiter; an empty
 * trailing segment (body ending in `\n`) is not.
 */
export const lineCodec: Codec = {
  name: 'line',
  decode(payload) {
    const text = payload.toString('utf8');
    if (text === '') return [];

    const segments = text.split(DELIMITER);
    if (segments.at(-1) === '') segments.pop();

    return segments.map((message) => ({ message }));
  },
};
