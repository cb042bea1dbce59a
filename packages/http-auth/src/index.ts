/**
 * @hostkit/http-auth
 *
 * Basic Authentication header encoding and decoding.
 */

// Types
export type {
  AuthCredential,
  BasicAuthResult,
  HeaderSource,
  RawAuthCredential,
  RawBasicAuthResult,
} from './types.js';

// Codec
export {
  BASIC_SCHEME,
  basicAuthHeader,
  decodeBasicAuth,
  decodeBasicAuthBytes,
  encodeBasicAuth,
  getAuthorization,
  parseBasicAuthHeader,
  requireBasicAuth,
} from './basic.js';

// Errors
export { AuthFormatError, ErrorCodes } from './errors.js';
export type { ErrorCode } from './errors.js';
