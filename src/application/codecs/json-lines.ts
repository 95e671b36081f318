import { DecodeError } from '../../domain/index.js';
import type { Codec } from './types.js';
import { isJsonObject, parseJson } from './json.js';

/** Newline-delimited JSON: one object per non-blank line. */
export const jsonLinesCodec: Codec = {
  name: 'json_lines',
  decode(payload) {
    const lines = payload.toString('utf8').split('\n');

    return lines.flatMap((line, index) => {
      if (line.trim() === '') return [];

      const value = parseJson(line);
      if (!isJsonObject(value)) {
        throw new DecodeError(`line ${index + 1} is not a JSON object`);
      }
      return [value];
    });
  },
};
