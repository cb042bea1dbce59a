import { readFileSync } from 'node:fs';

function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

/** Self-signed test CA "Test CA A" */
export const CERT_A = fixture('ca-a.pem');

/** Self-signed test CA "Test CA B" */
export const CERT_B = fixture('ca-b.pem');
