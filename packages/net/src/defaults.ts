/**
 * Process-wide wiring
 *
 * The only place where a shared DialPolicy is created. Library code takes a
 * DialPolicy explicitly; callers that want the process default use these.
 */

import type { PemInput } from './cert-pool.js';
import { HttpClientFactory, type HttpClient } from './client.js';
import { config } from './config.js';
import { DialPolicy } from './dial.js';
import type { VerificationMode } from './tls.js';

/**
 * Shared outbound switch. Set `outgoingAccessAllowed = false` to restrict
 * every default client to loopback addresses.
 */
export const defaultDialPolicy = new DialPolicy({
  outgoingAccessAllowed: config.dial.outgoingAccessAllowed,
});

export const defaultClientFactory = new HttpClientFactory(defaultDialPolicy, {
  connectTimeoutMs: config.http.connectTimeoutMs,
});

/**
 * Build a client from the default factory.
 */
export function getHttpClient(mode: VerificationMode, certs: readonly PemInput[] = []): HttpClient {
  return defaultClientFactory.getClient(mode, certs);
}
