/**
 * Dial gate
 *
 * When outgoing access is disallowed, every dial to a non-loopback address is
 * refused at the connector, before a TCP or TLS handshake starts. The policy
 * is read on each dial, so toggling it affects clients that already exist.
 *
 * @module @hostkit/net/dial
 */

import ipaddr from 'ipaddr.js';
import type { buildConnector } from 'undici';
import { NET_ERROR_CODES, type NetErrorCode } from './codes.js';
import { ConnectionRefusedError } from './errors.js';

// -----------------------------------------------------------------------------
// Address helpers
// -----------------------------------------------------------------------------

export type HostPortResult =
  | { ok: true; host: string; port: string }
  | { ok: false; code: NetErrorCode; error: string };

function invalidAddress(address: string, reason: string): HostPortResult {
  return {
    ok: false,
    code: NET_ERROR_CODES.E_INVALID_ADDRESS,
    error: `address ${address}: ${reason}`,
  };
}

/**
 * Split `host:port` or `[host]:port` into host and port.
 *
 * The port may be empty; a missing separator is an error.
 */
export function splitHostPort(address: string): HostPortResult {
  const colon = address.lastIndexOf(':');
  if (colon < 0) {
    return invalidAddress(address, 'missing port in address');
  }

  let host: string;
  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    if (end < 0) {
      return invalidAddress(address, 'missing "]" in address');
    }
    if (end + 1 === address.length) {
      return invalidAddress(address, 'missing port in address');
    }
    if (end + 1 !== colon) {
      return invalidAddress(
        address,
        address[end + 1] === ':' ? 'too many colons in address' : 'missing port in address'
      );
    }
    host = address.slice(1, end);
    if (host.includes('[')) {
      return invalidAddress(address, 'unexpected "[" in address');
    }
  } else {
    host = address.slice(0, colon);
    if (host.includes(':')) {
      return invalidAddress(address, 'too many colons in address');
    }
    if (host.includes('[')) {
      return invalidAddress(address, 'unexpected "[" in address');
    }
  }

  const port = address.slice(colon + 1);
  if (host.includes(']') || port.includes('[') || port.includes(']')) {
    return invalidAddress(address, 'unexpected bracket in address');
  }
  return { ok: true, host, port };
}

/**
 * Inverse of {@link splitHostPort}. IPv6 hosts are bracketed.
 */
export function joinHostPort(host: string, port: string | number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Parse a strict IP literal. IPv4-mapped IPv6 addresses come back as IPv4.
 */
function parseIP(host: string): ipaddr.IPv4 | ipaddr.IPv6 | null {
  if (ipaddr.IPv4.isValidFourPartDecimal(host)) {
    return ipaddr.IPv4.parse(host);
  }
  if (!host.includes('%') && ipaddr.IPv6.isValid(host)) {
    const v6 = ipaddr.IPv6.parse(host);
    return v6.isIPv4MappedAddress() ? v6.toIPv4Address() : v6;
  }
  return null;
}

/**
 * Check whether a `host:port` address points at this machine.
 *
 * True for the literal host `localhost` and for loopback IPs (127.0.0.0/8,
 * ::1). Anything that does not split cleanly is not local.
 */
export function isLocal(address: string): boolean {
  const parsed = splitHostPort(address);
  if (!parsed.ok) return false;
  if (parsed.host === 'localhost') return true;
  const ip = parseIP(parsed.host);
  return ip !== null && ip.range() === 'loopback';
}

// -----------------------------------------------------------------------------
// Policy
// -----------------------------------------------------------------------------

export type DialDecision = { ok: true } | { ok: false; code: NetErrorCode; error: string };

export interface DialPolicyOptions {
  /** Allow dials to non-local addresses (default true) */
  outgoingAccessAllowed?: boolean;
}

/**
 * Process-level switch for outbound connections.
 *
 * One instance is shared by every client built from the same factory.
 * `outgoingAccessAllowed` may be flipped at any time; each dial sees the
 * value current at its own check.
 */
export class DialPolicy {
  outgoingAccessAllowed: boolean;

  constructor(options: DialPolicyOptions = {}) {
    this.outgoingAccessAllowed = options.outgoingAccessAllowed ?? true;
  }

  allowDial(address: string): DialDecision {
    if (this.outgoingAccessAllowed || isLocal(address)) {
      return { ok: true };
    }
    return {
      ok: false,
      code: NET_ERROR_CODES.E_CONNECTION_REFUSED,
      error: `outgoing access to ${address} is not allowed`,
    };
  }
}

// -----------------------------------------------------------------------------
// Connector wrapping
// -----------------------------------------------------------------------------

function defaultPort(protocol: string): string {
  return protocol === 'https:' ? '443' : '80';
}

/**
 * Address an undici connect request is about to dial.
 */
export function dialAddress(options: buildConnector.Options): string {
  const host = options.hostname.replace(/^\[(.*)\]$/, '$1');
  return joinHostPort(host, options.port || defaultPort(options.protocol));
}

/**
 * Wrap an undici connector so that the dial policy runs first.
 *
 * A refused dial reports ConnectionRefusedError through the callback and the
 * inner connector is never called.
 */
export function gateConnector(
  connector: buildConnector.connector,
  policy: DialPolicy
): buildConnector.connector {
  return (options, callback) => {
    const address = dialAddress(options);
    const decision = policy.allowDial(address);
    if (!decision.ok) {
      callback(new ConnectionRefusedError(address, decision.error), null);
      return;
    }
    connector(options, callback);
  };
}
