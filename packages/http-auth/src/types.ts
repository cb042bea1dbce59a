/**
 * @hostkit/http-auth - Basic Authentication types
 */

import type { AuthFormatError } from './errors.js';

/**
 * Username and password carried by a Basic Authorization header.
 */
export interface AuthCredential {
  username: string;
  /** May contain ':' */
  password: string;
}

/**
 * Credential bytes exactly as they appear in the decoded payload.
 */
export interface RawAuthCredential {
  username: Uint8Array;
  password: Uint8Array;
}

export type BasicAuthResult =
  | { ok: true; value: AuthCredential }
  | { ok: false; error: AuthFormatError };

export type RawBasicAuthResult =
  | { ok: true; value: RawAuthCredential }
  | { ok: false; error: AuthFormatError };

/**
 * Header containers accepted by {@link parseBasicAuthHeader}.
 */
export type HeaderSource =
  | { get(name: string): string | null }
  | Record<string, string | string[] | undefined>;
