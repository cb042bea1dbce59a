import { NET_ERROR_CODES, type NetErrorCode } from './codes.js';

/**
 * Network error with a stable code.
 */
export class NetError extends Error {
  readonly code: NetErrorCode;

  constructor(code: NetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetError';
    this.code = code;
  }
}

/**
 * Raised at the dial step when the dial gate refuses a non-local address.
 * No socket has been opened when this is reported.
 */
export class ConnectionRefusedError extends NetError {
  readonly address: string;

  constructor(address: string, message = `outgoing access to ${address} is not allowed`) {
    super(NET_ERROR_CODES.E_CONNECTION_REFUSED, message);
    this.name = 'ConnectionRefusedError';
    this.address = address;
  }
}
