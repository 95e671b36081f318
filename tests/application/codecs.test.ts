import { describe, it, expect } from 'vitest';
import { plainCodec, lineCodec, jsonCodec, jsonLinesCodec } from '../../src/application/index.js';
import { DecodeError } from '../../src/domain/index.js';

const buf = (s: string) => Buffer.from(s, 'utf8');

describe('plainCodec', () => {
  it('emits the whole body as one message', () => {
    expect(plainCodec.decode(buf('hello\nworld'))).toEqual([{ message: 'hello\nworld' }]);
  });

  it('emits an empty message for an empty body', () => {
    expect(plainCodec.decode(buf(''))).toEqual([{ message: '' }]);
  });
});

describe('lineCodec', () => {
  it('includes the last line without a final delimiter', () => {
    expect(lineCodec.decode(buf('foo\nbar'))).toEqual([{ message: 'foo' }, { message: 'bar' }]);
  });

  it('does not emit an event for a trailing delimiter', () => {
    expect(lineCodec.decode(buf('foo\n'))).toEqual([{ message: 'foo' }]);
  });

  it('keeps empty lines in the middle', () => {
    expect(lineCodec.decode(buf('a\n\nb'))).toEqual([{ message: 'a' }, { message: '' }, { message: 'b' }]);
  });

  it('emits nothing for an empty body', () => {
    expect(lineCodec.decode(buf(''))).toEqual([]);
  });
});

describe('jsonCodec', () => {
  it('maps a JSON object to one event with its top-level keys', () => {
    expect(jsonCodec.decode(buf('{"message_body":"Hello","n":1}'))).toEqual([{ message_body: 'Hello', n: 1 }]);
  });

  it('maps an array of objects to one event per element', () => {
    expect(jsonCodec.decode(buf('[{"a":1},{"a":2}]'))).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('rejects an array element that is not an object', () => {
    expect(() => jsonCodec.decode(buf('[{"a":1},2]'))).toThrow(new DecodeError('element 1 is not a JSON object'));
  });

  it('rejects a scalar document', () => {
    expect(() => jsonCodec.decode(buf('42'))).toThrow(
      new DecodeError('expected a JSON object or an array of objects'),
    );
  });

  it('rejects malformed JSON with a DecodeError', () => {
    expect(() => jsonCodec.decode(buf('{"message":'))).toThrow(DecodeError);
  });
});

describe('jsonLinesCodec', () => {
  it('emits one event per non-blank line', () => {
    expect(jsonLinesCodec.decode(buf('{"a":1}\n\n{"a":2}\n'))).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('reports the offending line number', () => {
    expect(() => jsonLinesCodec.decode(buf('{"a":1}\n[1]'))).toThrow(
      new DecodeError('line 2 is not a JSON object'),
    );
  });
});
