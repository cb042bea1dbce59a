/**
 * Host series error codes.
 */

export const ErrorCodes = {
  /** Host series lookup failed; wraps the underlying cause */
  SERIES_UNDETERMINED: 'E_SERIES_UNDETERMINED',
  /** Kernel version string has no numeric major part */
  KERNEL_VERSION_INVALID: 'E_KERNEL_VERSION_INVALID',
  /** Darwin kernel major version has no known macOS series */
  SERIES_UNKNOWN: 'E_SERIES_UNKNOWN',
  /** No series lookup for this platform */
  OS_UNSUPPORTED: 'E_OS_UNSUPPORTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class SeriesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SeriesError';
    this.code = code;
  }
}
