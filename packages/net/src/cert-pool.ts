/**
 * Certificate trust pools built from PEM input
 *
 * Parsing is lenient: blocks that are not certificates, or that fail X.509
 * parsing, are skipped. When every input is malformed the pool is empty,
 * and a client using it trusts no custom authority at all.
 *
 * @module @hostkit/net/cert-pool
 */

import { X509Certificate } from 'node:crypto';
import { logger } from './logger.js';

// A block body never spans another BEGIN line, so an unterminated block is
// skipped and scanning resumes at the next one
const PEM_BLOCK_PATTERN = /-----BEGIN ([A-Z0-9 ]+)-----((?:(?!-----BEGIN )[\s\S])*?)-----END \1-----/g;

/**
 * A single PEM block
 */
export interface PemBlock {
  type: string;
  /** Full block text, armor lines included */
  text: string;
}

export type PemInput = string | Uint8Array;

/**
 * Split PEM text into its sequential blocks. Text between blocks is ignored.
 */
export function parsePemBlocks(input: PemInput): PemBlock[] {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf8');
  const blocks: PemBlock[] = [];
  for (const match of text.matchAll(PEM_BLOCK_PATTERN)) {
    blocks.push({ type: match[1], text: match[0] });
  }
  return blocks;
}

function parseCertificate(block: PemBlock): X509Certificate | null {
  if (block.type !== 'CERTIFICATE') return null;
  try {
    return new X509Certificate(block.text);
  } catch {
    // Malformed DER or base64: not added to the pool
    return null;
  }
}

/**
 * Set of trusted certificate authorities.
 *
 * Duplicates are kept; appending the same certificate twice is harmless.
 */
export class TrustPool {
  private readonly certs: X509Certificate[] = [];

  /**
   * Append every certificate found in the PEM input.
   *
   * @returns Number of certificates added
   */
  appendCertsFromPEM(input: PemInput): number {
    let added = 0;
    for (const block of parsePemBlocks(input)) {
      const cert = parseCertificate(block);
      if (cert) {
        this.certs.push(cert);
        added++;
      }
    }
    return added;
  }

  get size(): number {
    return this.certs.length;
  }

  /**
   * Check whether the first certificate in `pem` is in the pool
   */
  contains(pem: PemInput): boolean {
    const [block] = parsePemBlocks(pem);
    const cert = block ? parseCertificate(block) : null;
    if (!cert) return false;
    return this.certs.some((c) => c.fingerprint256 === cert.fingerprint256);
  }

  subjects(): string[] {
    return this.certs.map((c) => c.subject);
  }

  /**
   * PEM text of every certificate, in insertion order
   */
  toPEM(): string[] {
    return this.certs.map((c) => c.toString());
  }
}

/**
 * Build a trust pool from zero or more PEM inputs.
 *
 * Never throws. Returns a new pool on every call.
 */
export function buildTrustPool(pemCerts: readonly PemInput[]): TrustPool {
  const pool = new TrustPool();
  let blocks = 0;
  for (const pem of pemCerts) {
    blocks += Math.max(parsePemBlocks(pem).length, 1);
    pool.appendCertsFromPEM(pem);
  }
  if (pool.size < blocks) {
    logger.warn(
      { inputs: pemCerts.length, accepted: pool.size, skipped: blocks - pool.size },
      pool.size === 0
        ? 'No valid certificates in trust pool input; custom CA pool is empty'
        : 'Skipped malformed certificate input'
    );
  }
  return pool;
}
