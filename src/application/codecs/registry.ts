import { ConfigurationError, DecodeError } from '../../domain/index.js';
import type { EventFields } from '../../domain/index.js';
import type { Codec } from './types.js';
import { plainCodec } from './plain.js';
import { lineCodec } from './line.js';
import { jsonCodec } from './json.js';
import { jsonLinesCodec } from './json-lines.js';

/** Codecs every registry starts with. */
export const BUILTIN_CODECS: readonly Codec[] = [plainCodec, lineCodec, jsonCodec, jsonLinesCodec];

/** Content types that map to a codec without any configuration. */
export const DEFAULT_CODEC_MAPPING: Readonly<Record<string, string>> = {
  'application/json': 'json',
};

export type DecodeResult =
  | { ok: true; events: EventFields[] }
  | { ok: false; codec: string; message: string };

export interface CodecRegistryOptions {
  /** Codec used when no mapping matches the content type. */
  defaultCodec: string;
  /** content-type → codec name; replaces the built-in mapping per type. */
  overrides?: Record<string, string> | undefined;
}

/**
 * Lower-cases a content-type header and strips its parameters,
 * e.g. `Text/Plain; charset=UTF-8` → `text/plain`.
 */
export function normalizeContentType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

/**
 * Maps request content types to codecs.
 *
 * Resolution order: configured overrides, then `DEFAULT_CODEC_MAPPING`,
 * then the registry's default codec. Every codec name the mapping refers to
 * is checked at construction so lookups never miss at request time.
 */
export class CodecRegistry {
  private readonly codecs = new Map<string, Codec>();
  private readonly mapping = new Map<string, string>();
  private readonly defaultCodecName: string;

  constructor(options: CodecRegistryOptions, codecs: readonly Codec[] = BUILTIN_CODECS) {
    for (const codec of codecs) this.register(codec);

    this.defaultCodecName = options.defaultCodec;
    this.require(this.defaultCodecName, 'codec');

    for (const [contentType, name] of Object.entries(DEFAULT_CODEC_MAPPING)) {
      this.mapping.set(contentType, name);
    }
    for (const [contentType, name] of Object.entries(options.overrides ?? {})) {
      this.require(name, `additional_codecs[${contentType}]`);
      this.mapping.set(normalizeContentType(contentType), name);
    }
  }

  register(codec: Codec): void {
    this.codecs.set(codec.name, codec);
  }

  get(name: string): Codec | undefined {
    return this.codecs.get(name);
  }

  list(): Codec[] {
    return Array.from(this.codecs.values());
  }

  getDefault(): Codec {
    return this.require(this.defaultCodecName, 'codec');
  }

  resolve(contentType?: string): Codec {
    const mapped = this.mapping.get(normalizeContentType(contentType));
    return (mapped !== undefined ? this.codecs.get(mapped) : undefined) ?? this.getDefault();
  }

  decode(codec: Codec, payload: Buffer): DecodeResult {
    try {
      return { ok: true, events: codec.decode(payload) };
    } catch (err: unknown) {
      if (err instanceof DecodeError) {
        return { ok: false, codec: codec.name, message: err.message };
      }
      throw err;
    }
  }

  private require(name: string, setting: string): Codec {
    const codec = this.codecs.get(name);
    if (!codec) {
      const known = Array.from(this.codecs.keys()).join(', ');
      throw new ConfigurationError(`Unknown codec "${name}" in ${setting} (known: ${known})`);
    }
    return codec;
  }
}
