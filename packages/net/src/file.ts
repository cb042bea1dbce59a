/**
 * `file:` URL support for HttpClient
 *
 * Paths are resolved from the filesystem root. A missing file is answered
 * with a 404 response rather than an error, as an HTTP file server would.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Response } from 'undici';
import { NET_ERROR_CODES } from './codes.js';
import { NetError } from './errors.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isFileURL(url: URL): boolean {
  return url.protocol === 'file:';
}

/**
 * Answer a `file:` URL from disk.
 */
export async function fetchFile(url: URL): Promise<Response> {
  const path = fileURLToPath(url);
  let body: Buffer;
  try {
    body = await readFile(path);
  } catch (err) {
    if (NOT_FOUND_CODES.has(errorCode(err) ?? '')) {
      return new Response('404 page not found\n', {
        status: 404,
        headers: { 'content-type': 'text/plain; charset=utf-8' },
      });
    }
    throw new NetError(NET_ERROR_CODES.E_FILE_READ_FAILED, `cannot read ${path}`, { cause: err });
  }
  return new Response(body, { status: 200 });
}
