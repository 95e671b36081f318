import { describe, it, expect } from 'vitest';
import { createEvent } from '../../src/domain/index.js';

describe('createEvent', () => {
  const receivedAt = new Date('2026-03-01T10:00:00.000Z');

  it('copies decoded fields and stamps host and @timestamp', () => {
    const event = createEvent({ message: 'hello' }, '10.0.0.7', receivedAt);

    expect(event).toEqual({
      '@timestamp': '2026-03-01T10:00:00.000Z',
      message: 'hello',
      host: '10.0.0.7',
    });
  });

  it('overrides a host field carried by the payload', () => {
    const event = createEvent({ host: 'spoofed' }, '10.0.0.7', receivedAt);
    expect(event.host).toBe('10.0.0.7');
  });

  it('keeps a @timestamp carried by the payload', () => {
    const event = createEvent({ '@timestamp': '2020-01-01T00:00:00.000Z' }, '10.0.0.7', receivedAt);
    expect(event['@timestamp']).toBe('2020-01-01T00:00:00.000Z');
  });

  it('replaces a @timestamp that is not a string', () => {
    const event = createEvent({ '@timestamp': 1700000000, message: 'hello' }, '10.0.0.7', receivedAt);

    expect(event).toEqual({
      '@timestamp': '2026-03-01T10:00:00.000Z',
      message: 'hello',
      host: '10.0.0.7',
    });
  });

  it('is frozen', () => {
    const event = createEvent({ message: 'hello' }, '10.0.0.7', receivedAt);
    expect(Object.isFrozen(event)).toBe(true);
  });
});
