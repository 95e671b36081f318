import { readFileSync } from 'node:fs';
import { createSecureContext } from 'node:tls';
import { ConfigurationError } from '../../domain/index.js';
import { settingsSchema } from '../../application/settings-schema.js';
import type { Settings, SettingsInput } from '../../application/settings-schema.js';
import type { BasicCredentials } from '../../application/authenticate.js';

/** PKCS#12 material handed to `https.createServer`. */
export interface TlsMaterial {
  pfx: Buffer;
  passphrase: string;
}

/** Environment variable → setting key. */
const ENV_KEYS: Readonly<Record<keyof SettingsInput, string>> = {
  host: 'HOST',
  port: 'PORT',
  threads: 'THREADS',
  ssl: 'SSL',
  keystore: 'KEYSTORE',
  keystore_password: 'KEYSTORE_PASSWORD',
  user: 'HTTP_USER',
  password: 'HTTP_PASSWORD',
  codec: 'CODEC',
  additional_codecs: 'ADDITIONAL_CODECS',
  response_headers: 'RESPONSE_HEADERS',
  response_code: 'RESPONSE_CODE',
  max_content_length: 'MAX_CONTENT_LENGTH',
  queue_capacity: 'QUEUE_CAPACITY',
  stream_key: 'STREAM_KEY',
  consumer_group: 'CONSUMER_GROUP',
  stop_timeout_ms: 'STOP_TIMEOUT_MS',
};

/**
 * Validates raw configuration and checks the cross-field invariants.
 *
 * Throws `ConfigurationError` so the process fails before any socket is
 * bound:
 * - `ssl` without both `keystore` and `keystore_password`
 * - `user` without `password`, or the reverse
 */
export function resolveSettings(input: SettingsInput | NodeJS.Dict<string>): Settings {
  const parsed = settingsSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const settings = parsed.data;

  if (settings.ssl && (settings.keystore === undefined || settings.keystore_password === undefined)) {
    throw new ConfigurationError('ssl requires both keystore and keystore_password to be set');
  }

  if ((settings.user === undefined) !== (settings.password === undefined)) {
    throw new ConfigurationError('user and password must be configured together');
  }

  return Object.freeze(settings);
}

/**
 * Reads configuration from environment variables.
 * Unset and empty variables fall back to the schema defaults.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): Settings {
  const input: NodeJS.Dict<string> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') input[key] = value;
  }
  return resolveSettings(input);
}

/** Returns the configured Basic credentials, if authentication is on. */
export function credentialsFrom(settings: Settings): BasicCredentials | undefined {
  if (settings.user === undefined || settings.password === undefined) return undefined;
  return { user: settings.user, password: settings.password };
}

/**
 * Loads the keystore for an `ssl` configuration and checks that it opens
 * with the configured password. Returns undefined when TLS is off.
 */
export function loadTlsMaterial(settings: Settings): TlsMaterial | undefined {
  if (!settings.ssl) return undefined;

  if (settings.keystore === undefined || settings.keystore_password === undefined) {
    throw new ConfigurationError('ssl requires both keystore and keystore_password to be set');
  }

  let pfx: Buffer;
  try {
    pfx = readFileSync(settings.keystore);
  } catch (err: unknown) {
    throw new ConfigurationError(`Cannot read keystore ${settings.keystore}: ${reasonOf(err)}`);
  }

  const material: TlsMaterial = { pfx, passphrase: settings.keystore_password };
  try {
    createSecureContext(material);
  } catch (err: unknown) {
    throw new ConfigurationError(`Cannot open keystore ${settings.keystore}: ${reasonOf(err)}`);
  }
  return material;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
