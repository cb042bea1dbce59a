/**
 * HTTP client factory
 *
 * Builds undici-backed clients for one of three TLS policies: plain
 * validating, non-validating, or custom CA. Every client dials through the
 * dial gate. Construction performs no I/O and never fails.
 *
 * @module @hostkit/net/client
 */

import { Agent, buildConnector, fetch, type RequestInit, type Response } from 'undici';
import { buildTrustPool, type PemInput } from './cert-pool.js';
import { type DialPolicy, gateConnector } from './dial.js';
import { fetchFile, isFileURL } from './file.js';
import { logger } from './logger.js';
import {
  VerificationMode,
  secureBaseline,
  toConnectionOptions,
  withTLS,
  type TLSConfig,
} from './tls.js';

/**
 * Creates the connector that opens sockets for a client
 */
export type ConnectorFactory = (options: buildConnector.BuildOptions) => buildConnector.connector;

export interface HttpClientOptions {
  /** TCP/TLS connect timeout in milliseconds */
  connectTimeoutMs?: number;
  /** Defaults to undici's buildConnector */
  connectorFactory?: ConnectorFactory;
}

/**
 * Outbound HTTP client bound to one TLS policy and one dial policy.
 */
export class HttpClient {
  readonly tlsConfig: TLSConfig;
  readonly dispatcher: Agent;

  constructor(tlsConfig: TLSConfig, dialPolicy: DialPolicy, options: HttpClientOptions = {}) {
    this.tlsConfig = tlsConfig;
    const connectorFactory = options.connectorFactory ?? buildConnector;
    const connector = connectorFactory({
      ...toConnectionOptions(tlsConfig),
      timeout: options.connectTimeoutMs,
    });
    this.dispatcher = new Agent({ connect: gateConnector(connector, dialPolicy) });
  }

  /**
   * Send a request. `file:` URLs are read from disk.
   */
  async fetch(input: string | URL, init: RequestInit = {}): Promise<Response> {
    const url = new URL(input);
    if (isFileURL(url)) {
      return fetchFile(url);
    }
    return fetch(url, { ...init, dispatcher: this.dispatcher });
  }

  /**
   * Close idle sockets and wait for in-flight requests
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

/**
 * Resolve the TLS policy for a verification mode and optional CA list.
 *
 * With certificates, the secure baseline is used and the pool replaces the
 * system roots; NoVerify then also skips validation but keeps the pool.
 */
export function resolveTLSConfig(mode: VerificationMode, certs: readonly PemInput[] = []): TLSConfig {
  if (certs.length > 0) {
    const overrides: Partial<TLSConfig> = { rootCAs: buildTrustPool(certs) };
    if (mode === VerificationMode.NoVerify) {
      return withTLS(secureBaseline(), { ...overrides, insecureSkipVerify: true });
    }
    return withTLS(secureBaseline(), overrides);
  }
  if (mode === VerificationMode.Verify) {
    return Object.freeze({ insecureSkipVerify: false });
  }
  return Object.freeze({ insecureSkipVerify: true });
}

/**
 * Builds clients that share one dial policy.
 */
export class HttpClientFactory {
  constructor(
    private readonly dialPolicy: DialPolicy,
    private readonly options: HttpClientOptions = {}
  ) {}

  /**
   * Build a client for the given verification mode.
   *
   * @param certs - PEM CA certificates; when present they replace the system roots
   */
  getClient(mode: VerificationMode, certs: readonly PemInput[] = []): HttpClient {
    const tlsConfig = resolveTLSConfig(mode, certs);
    logger.debug(
      {
        mode,
        custom_ca_count: tlsConfig.rootCAs?.size ?? 0,
        insecure_skip_verify: tlsConfig.insecureSkipVerify,
      },
      'HTTP client created'
    );
    return new HttpClient(tlsConfig, this.dialPolicy, this.options);
  }

  getValidatingClient(): HttpClient {
    return this.getClient(VerificationMode.Verify);
  }

  getNonValidatingClient(): HttpClient {
    return this.getClient(VerificationMode.NoVerify);
  }
}
