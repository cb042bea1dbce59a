/**
 * Basic Authentication codec (RFC 7617, formerly RFC 2617 section 2)
 *
 * Credentials are "userid:password", UTF-8 encoded, then standard base64.
 */

import { AuthFormatError, ErrorCodes, type ErrorCode } from './errors.js';
import type {
  AuthCredential,
  BasicAuthResult,
  HeaderSource,
  RawBasicAuthResult,
} from './types.js';

export const BASIC_SCHEME = 'Basic';

// Standard alphabet, padding required
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function fail(code: ErrorCode, message: string): { ok: false; error: AuthFormatError } {
  return { ok: false, error: new AuthFormatError(code, message) };
}

/**
 * Build the value of a Basic Authorization header.
 *
 * No validation is applied; a username containing ':' will not decode back
 * to the same pair.
 */
export function encodeBasicAuth(username: string, password: string): string {
  const token = Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
  return `${BASIC_SCHEME} ${token}`;
}

/**
 * Header record holding only the Authorization entry.
 */
export function basicAuthHeader(username: string, password: string): { Authorization: string } {
  return { Authorization: encodeBasicAuth(username, password) };
}

const COLON = 0x3a;

/**
 * Decode a Basic Authorization header value to raw bytes.
 *
 * The value must split into exactly two whitespace-separated fields, the
 * first being exactly "Basic". The payload is split at the first ':' byte
 * only; neither part is required to be valid UTF-8.
 */
export function decodeBasicAuthBytes(value: string | null | undefined): RawBasicAuthResult {
  if (!value) {
    return fail(ErrorCodes.AUTH_HEADER_MISSING, 'missing HTTP auth header');
  }

  const fields = value.trim().split(/\s+/).filter((f) => f.length > 0);
  if (fields.length !== 2 || fields[0] !== BASIC_SCHEME) {
    return fail(ErrorCodes.AUTH_HEADER_MALFORMED, 'invalid or missing HTTP auth header');
  }

  const token = fields[1];
  if (!BASE64_PATTERN.test(token)) {
    return fail(ErrorCodes.AUTH_ENCODING_INVALID, 'invalid HTTP auth encoding');
  }

  const payload = Buffer.from(token, 'base64');
  const separator = payload.indexOf(COLON);
  if (separator < 0) {
    return fail(ErrorCodes.AUTH_CONTENTS_INVALID, 'invalid HTTP auth contents');
  }

  return {
    ok: true,
    value: {
      username: payload.subarray(0, separator),
      password: payload.subarray(separator + 1),
    },
  };
}

/**
 * Decode a Basic Authorization header value to strings.
 *
 * Both parts are read as UTF-8. Invalid sequences become U+FFFD; use
 * {@link decodeBasicAuthBytes} when the exact bytes matter.
 */
export function decodeBasicAuth(value: string | null | undefined): BasicAuthResult {
  const result = decodeBasicAuthBytes(value);
  if (!result.ok) {
    return result;
  }

  const credential: AuthCredential = {
    username: Buffer.from(result.value.username).toString('utf8'),
    password: Buffer.from(result.value.password).toString('utf8'),
  };
  return { ok: true, value: credential };
}

function isHeadersLike(headers: HeaderSource): headers is { get(name: string): string | null } {
  return typeof headers.get === 'function';
}

/**
 * Read the Authorization entry from a header container.
 *
 * Plain records are searched case-insensitively; for repeated values the
 * first one is used.
 */
export function getAuthorization(headers: HeaderSource): string | undefined {
  if (isHeadersLike(headers)) {
    return headers.get('authorization') ?? undefined;
  }
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'authorization') continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Find and decode the Basic Authorization header.
 */
export function parseBasicAuthHeader(headers: HeaderSource): BasicAuthResult {
  return decodeBasicAuth(getAuthorization(headers));
}

/**
 * Like {@link decodeBasicAuth}, but throws AuthFormatError.
 */
export function requireBasicAuth(value: string | null | undefined): AuthCredential {
  const result = decodeBasicAuth(value);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
