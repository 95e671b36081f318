import { createHash, timingSafeEqual } from 'node:crypto';

export interface BasicCredentials {
  readonly user: string;
  readonly password: string;
}

const BASIC_SCHEME = /^Basic\s+(\S+)$/i;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

function sameSecret(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

/**
 * Parses `Basic <base64(user:password)>`.
 * Returns null for any other scheme or a token that is not strict base64.
 */
export function parseBasicAuthorization(header: string | undefined): BasicCredentials | null {
  const token = header?.trim().match(BASIC_SCHEME)?.[1];
  if (token === undefined || !BASE64.test(token)) return null;

  const decoded = Buffer.from(token, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) return null;

  return {
    user: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

/**
 * Checks a request's `authorization` header against the configured pair.
 *
 * With no credentials configured every request passes. A missing header,
 * a malformed one and a wrong pair all return false alike.
 */
export function authenticate(header: string | undefined, expected: BasicCredentials | undefined): boolean {
  if (!expected) return true;

  const presented = parseBasicAuthorization(header);
  if (!presented) return false;

  // Evaluate both comparisons so timing does not reveal which one failed.
  const userMatches = sameSecret(presented.user, expected.user);
  const passwordMatches = sameSecret(presented.password, expected.password);
  return userMatches && passwordMatches;
}
