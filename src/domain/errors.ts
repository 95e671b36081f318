/** Invalid or incomplete configuration. Raised before the listener binds. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/** A codec could not turn the payload into events. */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';
}

/** The downstream queue was closed while a producer or consumer waited on it. */
export class QueueClosedError extends Error {
  override readonly name = 'QueueClosedError';

  constructor(message = 'Queue is closed') {
    super(message);
  }
}
