import { availableParallelism } from 'node:os';
import { z } from 'zod';

/**
 * Parses `key=value` pairs separated by commas, as used for map-valued
 * environment variables (`ADDITIONAL_CODECS`, `RESPONSE_HEADERS`).
 */
export function parsePairs(value: string, ctx: z.RefinementCtx): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of value.split(',')) {
    if (entry.trim() === '') continue;
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected key=value, got "${entry.trim()}"` });
      return z.NEVER;
    }
    result[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
  }
  return result;
}

const stringMap = z.union([
  z.record(z.string(), z.string()),
  z.string().transform(parsePairs),
]);

const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((v) => v === 'true'),
]);

const optionalText = z.string().min(1).optional();

/**
 * Zod schema for the ingest endpoint configuration.
 *
 * Accepts typed values as well as the raw strings of environment variables,
 * so the same schema validates programmatic and env-based configuration.
 */
export const settingsSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  threads: z.coerce.number().int().min(1).default(() => availableParallelism()),
  ssl: flag.default(false),
  keystore: optionalText,
  keystore_password: optionalText,
  user: optionalText,
  password: optionalText,
  codec: z.string().min(1).default('plain'),
  additional_codecs: stringMap.default({}),
  response_headers: stringMap.default({ 'content-type': 'text/plain' }),
  response_code: z.coerce
    .number()
    .int()
    .refine((code) => [200, 201, 202, 204].includes(code), {
      message: 'response_code must be one of 200, 201, 202, 204',
    })
    .default(200),
  max_content_length: z.coerce.number().int().min(1).default(100 * 1024 * 1024),
  queue_capacity: z.coerce.number().int().min(1).default(1000),
  stream_key: z.string().min(1).default('events_stream'),
  consumer_group: z.string().min(1).default('events_consumers'),
  stop_timeout_ms: z.coerce.number().int().min(0).default(10_000),
});

/** Raw configuration as accepted by `resolveSettings`. */
export type SettingsInput = z.input<typeof settingsSchema>;

/** Validated, immutable configuration. */
export type Settings = Readonly<z.output<typeof settingsSchema>>;
