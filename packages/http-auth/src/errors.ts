/**
 * Basic Authentication error codes.
 */

export const ErrorCodes = {
  /** Authorization header absent or empty */
  AUTH_HEADER_MISSING: 'E_AUTH_HEADER_MISSING',
  /** Not exactly "<scheme> <token>", or scheme is not "Basic" */
  AUTH_HEADER_MALFORMED: 'E_AUTH_HEADER_MALFORMED',
  /** Token is not standard base64 */
  AUTH_ENCODING_INVALID: 'E_AUTH_ENCODING_INVALID',
  /** Decoded credentials have no ':' separator */
  AUTH_CONTENTS_INVALID: 'E_AUTH_CONTENTS_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Malformed or missing Basic Authorization header.
 *
 * Callers should treat the request as unauthenticated.
 */
export class AuthFormatError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus = 401;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'AuthFormatError';
    this.code = code;
  }
}
