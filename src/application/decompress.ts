import { gunzip, inflate } from 'node:zlib';
import type { InputType, ZlibOptions } from 'node:zlib';
import { promisify } from 'node:util';

type Inflater = (buffer: InputType, options: ZlibOptions) => Promise<Buffer>;

const INFLATERS: Readonly<Record<string, Inflater>> = {
  gzip: promisify(gunzip),
  'x-gzip': promisify(gunzip),
  deflate: promisify(inflate),
};

export type DecompressResult =
  | { ok: true; payload: Buffer }
  | { ok: false; encoding: string; reason: string };

export interface DecompressOptions {
  /** Upper bound on the decompressed size, in bytes. */
  maxOutputLength?: number | undefined;
}

/**
 * Decodes a request body according to its `content-encoding`.
 *
 * Only `gzip` and `deflate` are decoded; any other value, or no header at
 * all, passes the body through untouched. Corrupt streams and output over
 * `maxOutputLength` come back as `{ ok: false }`.
 */
export async function decompress(
  encoding: string | undefined,
  payload: Buffer,
  options: DecompressOptions = {},
): Promise<DecompressResult> {
  const name = (encoding ?? '').trim().toLowerCase();
  const inflater = INFLATERS[name];
  if (!inflater) return { ok: true, payload };

  const zlibOptions: ZlibOptions = {};
  if (options.maxOutputLength !== undefined) zlibOptions.maxOutputLength = options.maxOutputLength;

  try {
    return { ok: true, payload: await inflater(payload, zlibOptions) };
  } catch (err: unknown) {
    return {
      ok: false,
      encoding: name,
      reason: err instanceof Error ? err.message : String(err),
    };
  }
}
