/**
 * Error codes for @hostkit/net
 *
 * Single source of truth for all error codes used in this package.
 *
 * STABILITY: These identifiers are part of the public API surface.
 * Consumers may log, alert, or persist these codes. Changes to code
 * values are breaking changes and require a major version bump.
 *
 * @module @hostkit/net
 */

export const NET_ERROR_CODES = {
  // Dial gate
  E_CONNECTION_REFUSED: 'E_NET_CONNECTION_REFUSED',
  E_INVALID_ADDRESS: 'E_NET_INVALID_ADDRESS',
  // file: URLs
  E_FILE_READ_FAILED: 'E_NET_FILE_READ_FAILED',
} as const;

export type NetErrorCode = (typeof NET_ERROR_CODES)[keyof typeof NET_ERROR_CODES];
