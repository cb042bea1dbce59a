/**
 * TLS policy for outbound clients
 *
 * A TLSConfig is resolved once per client and frozen. It is converted to
 * Node `tls.ConnectionOptions` only when the client's connector is built.
 *
 * @module @hostkit/net/tls
 */

import type { ConnectionOptions, SecureVersion } from 'node:tls';
import type { TrustPool } from './cert-pool.js';

/**
 * Whether a client validates the server certificate chain and hostname.
 */
export const VerificationMode = {
  Verify: 'verify',
  NoVerify: 'no-verify',
} as const;

export type VerificationMode = (typeof VerificationMode)[keyof typeof VerificationMode];

/**
 * Resolved TLS policy.
 *
 * INVARIANT: a client built with VerificationMode.NoVerify always has
 * insecureSkipVerify = true, with or without rootCAs. A non-empty rootCAs
 * never turns validation off on its own.
 */
export interface TLSConfig {
  readonly minVersion?: SecureVersion;
  readonly ciphers?: readonly string[];
  readonly insecureSkipVerify: boolean;
  /** Replaces the default root store when set */
  readonly rootCAs?: TrustPool;
}

/**
 * Lowest protocol version the secure baseline accepts
 */
export const SECURE_MIN_VERSION: SecureVersion = 'TLSv1.2';

/**
 * Cipher suites allowed by the secure baseline (OpenSSL names).
 * TLS 1.3 suites are not restricted by this list.
 */
export const SECURE_CIPHERS: readonly string[] = Object.freeze([
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
]);

/**
 * Secure starting point for every custom-CA client.
 *
 * No trust pool, verification on, fixed protocol floor and cipher list.
 */
export function secureBaseline(): TLSConfig {
  return Object.freeze({
    minVersion: SECURE_MIN_VERSION,
    ciphers: SECURE_CIPHERS,
    insecureSkipVerify: false,
  });
}

/**
 * Derive a new frozen config from an existing one.
 */
export function withTLS(base: TLSConfig, overrides: Partial<TLSConfig>): TLSConfig {
  return Object.freeze({ ...base, ...overrides });
}

/**
 * Map a TLSConfig onto the options Node's TLS layer understands.
 */
export function toConnectionOptions(config: TLSConfig): ConnectionOptions {
  const options: ConnectionOptions = {
    rejectUnauthorized: !config.insecureSkipVerify,
  };
  if (config.minVersion) {
    options.minVersion = config.minVersion;
  }
  if (config.ciphers && config.ciphers.length > 0) {
    options.ciphers = config.ciphers.join(':');
  }
  if (config.rootCAs) {
    // An empty pool still replaces the system roots: nothing custom is trusted
    options.ca = config.rootCAs.toPEM();
  }
  return options;
}
