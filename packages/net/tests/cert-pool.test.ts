import { describe, it, expect } from 'vitest';
import { TrustPool, buildTrustPool, parsePemBlocks } from '../src/cert-pool.js';
import { CERT_A, CERT_B } from './fixtures.js';

const CORRUPT_CERT = '-----BEGIN CERTIFICATE-----\nbm90IGEgY2VydGlmaWNhdGU=\n-----END CERTIFICATE-----\n';
const PUBLIC_KEY_BLOCK = '-----BEGIN PUBLIC KEY-----\nAAAA\n-----END PUBLIC KEY-----\n';

describe('parsePemBlocks', () => {
  it('finds sequential blocks and ignores text between them', () => {
    const blocks = parsePemBlocks(`# bundle\n${CERT_A}\n  \n${PUBLIC_KEY_BLOCK}trailing`);

    expect(blocks.map((b) => b.type)).toEqual(['CERTIFICATE', 'PUBLIC KEY']);
    expect(blocks[0].text.startsWith('-----BEGIN CERTIFICATE-----')).toBe(true);
    expect(blocks[0].text.endsWith('-----END CERTIFICATE-----')).toBe(true);
  });

  it('resumes scanning after an unterminated block', () => {
    const blocks = parsePemBlocks(`-----BEGIN CERTIFICATE-----\nMIIBtruncated\n${CERT_A}`);

    expect(blocks).toHaveLength(1);
    expect(blocks[0].text).toBe(CERT_A.trim());
  });

  it('returns nothing for non-PEM input', () => {
    expect(parsePemBlocks('not pem at all')).toEqual([]);
  });

  it('accepts bytes', () => {
    expect(parsePemBlocks(Buffer.from(CERT_A))).toHaveLength(1);
  });
});

describe('buildTrustPool', () => {
  it('returns an empty pool for no input', () => {
    expect(buildTrustPool([]).size).toBe(0);
  });

  it('adds a valid certificate', () => {
    const pool = buildTrustPool([CERT_A]);

    expect(pool.size).toBe(1);
    expect(pool.contains(CERT_A)).toBe(true);
    expect(pool.contains(CERT_B)).toBe(false);
    expect(pool.subjects()[0]).toContain('CN=Test CA A');
  });

  it('reads several blocks from one input', () => {
    const pool = buildTrustPool([`${CERT_A}\n${CERT_B}`]);

    expect(pool.size).toBe(2);
    expect(pool.contains(CERT_B)).toBe(true);
  });

  it('skips malformed entries', () => {
    const pool = buildTrustPool(['garbage', CORRUPT_CERT, PUBLIC_KEY_BLOCK, CERT_B]);

    expect(pool.size).toBe(1);
    expect(pool.contains(CERT_B)).toBe(true);
  });

  it('keeps a valid certificate that follows an unterminated block', () => {
    const pool = buildTrustPool([`-----BEGIN CERTIFICATE-----\nMIIBtruncated\n${CERT_A}`]);

    expect(pool.size).toBe(1);
    expect(pool.contains(CERT_A)).toBe(true);
  });

  it('keeps every valid block in a bundle with a broken entry between them', () => {
    const bundle = [CERT_A, '-----BEGIN CERTIFICATE-----\nMIIBtruncated\n', CERT_B].join('\n');
    const pool = buildTrustPool([bundle]);

    expect(pool.size).toBe(2);
    expect(pool.contains(CERT_A)).toBe(true);
    expect(pool.contains(CERT_B)).toBe(true);
  });

  it('returns an empty pool when every entry is malformed', () => {
    expect(() => buildTrustPool(['garbage', CORRUPT_CERT])).not.toThrow();
    expect(buildTrustPool(['garbage', CORRUPT_CERT]).size).toBe(0);
  });

  it('grows as valid certificates are appended', () => {
    const inputs = [CERT_A, CERT_B, CERT_A];
    const sizes = inputs.map((_, i) => buildTrustPool(inputs.slice(0, i + 1)).size);

    expect(sizes).toEqual([1, 2, 3]);
  });

  it('returns an independent pool on every call', () => {
    const a = buildTrustPool([CERT_A]);
    const b = buildTrustPool([CERT_A]);
    a.appendCertsFromPEM(CERT_B);

    expect(a.size).toBe(2);
    expect(b.size).toBe(1);
  });

  it('exports PEM that parses back into the same certificates', () => {
    const pool = buildTrustPool([CERT_A, CERT_B]);
    const copy = new TrustPool();
    for (const pem of pool.toPEM()) {
      copy.appendCertsFromPEM(pem);
    }

    expect(copy.size).toBe(2);
    expect(copy.contains(CERT_A)).toBe(true);
    expect(copy.contains(CERT_B)).toBe(true);
  });
});

describe('TrustPool.contains', () => {
  it('is false for input that is not a certificate', () => {
    const pool = buildTrustPool([CERT_A]);

    expect(pool.contains('garbage')).toBe(false);
    expect(pool.contains(CORRUPT_CERT)).toBe(false);
  });
});
