/**
 * @hostkit/net
 *
 * Outbound HTTP clients with a selectable TLS verification policy, custom
 * CA trust pools, and a dial gate that can restrict connections to loopback.
 *
 * @example
 * ```typescript
 * import { getHttpClient, VerificationMode, defaultDialPolicy } from '@hostkit/net';
 *
 * defaultDialPolicy.outgoingAccessAllowed = false;
 * const client = getHttpClient(VerificationMode.Verify, [caPem]);
 * const res = await client.fetch('https://localhost:8443/status');
 * ```
 *
 * @packageDocumentation
 */

// TLS
export {
  VerificationMode,
  SECURE_CIPHERS,
  SECURE_MIN_VERSION,
  secureBaseline,
  toConnectionOptions,
  withTLS,
} from './tls.js';
export type { TLSConfig } from './tls.js';

// Trust pools
export { TrustPool, buildTrustPool, parsePemBlocks } from './cert-pool.js';
export type { PemBlock, PemInput } from './cert-pool.js';

// Dial gate
export {
  DialPolicy,
  dialAddress,
  gateConnector,
  isLocal,
  joinHostPort,
  splitHostPort,
} from './dial.js';
export type { DialDecision, DialPolicyOptions, HostPortResult } from './dial.js';

// Clients
export { HttpClient, HttpClientFactory, resolveTLSConfig } from './client.js';
export type { ConnectorFactory, HttpClientOptions } from './client.js';
export { defaultClientFactory, defaultDialPolicy, getHttpClient } from './defaults.js';

// Configuration
export { config, loadConfig } from './config.js';
export type { NetConfig } from './config.js';

// Errors
export { NET_ERROR_CODES } from './codes.js';
export type { NetErrorCode } from './codes.js';
export { ConnectionRefusedError, NetError } from './errors.js';
