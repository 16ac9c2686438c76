/**
 * Error taxonomy for the discovery, pairing and session engine.
 *
 * Every error carries a stable `code` for programmatic handling and a
 * `recoverable` flag telling callers whether retrying can help.
 */

export type LinkErrorCode =
  | 'NETWORK_UNAVAILABLE'
  | 'PAIRING_REJECTED'
  | 'PAIRING_TIMED_OUT'
  | 'PAIRING_ALREADY_IN_PROGRESS'
  | 'NOT_PAIRED'
  | 'NOT_CONNECTED'
  | 'UNKNOWN_PEER'
  | 'DECODE_ERROR'
  | 'PAYLOAD_TOO_LARGE'
  | 'TRANSPORT_LOST'
  | 'CONNECT_TIMEOUT';

/**
 * Base class for all engine errors.
 */
export class LinkError extends Error {
  readonly code: LinkErrorCode;
  readonly recoverable: boolean;
  override readonly cause?: Error;

  constructor(message: string, code: LinkErrorCode, recoverable: boolean, cause?: Error) {
    super(message);
    this.name = 'LinkError';
    this.code = code;
    this.recoverable = recoverable;
    this.cause = cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
    };
  }

  /**
   * Wrap an unknown thrown value, keeping LinkErrors as they are.
   */
  static wrap(error: unknown, fallback: (cause: Error) => LinkError): LinkError {
    if (error instanceof LinkError) {
      return error;
    }
    return fallback(error instanceof Error ? error : new Error(String(error)));
  }
}

export class NetworkUnavailableError extends LinkError {
  constructor(message = 'No usable local network interface', cause?: Error) {
    super(message, 'NETWORK_UNAVAILABLE', true, cause);
    this.name = 'NetworkUnavailableError';
  }
}

export class PairingRejectedError extends LinkError {
  /** Reason supplied by the remote peer, if any */
  readonly reason?: string;

  constructor(peerId: string, reason?: string) {
    super(reason ? `Pairing rejected by ${peerId}: ${reason}` : `Pairing rejected by ${peerId}`, 'PAIRING_REJECTED', false);
    this.name = 'PairingRejectedError';
    this.reason = reason;
  }
}

export class PairingTimedOutError extends LinkError {
  constructor(peerId: string, cause?: Error) {
    super(`Pairing with ${peerId} timed out`, 'PAIRING_TIMED_OUT', true, cause);
    this.name = 'PairingTimedOutError';
  }
}

export class PairingAlreadyInProgressError extends LinkError {
  constructor(peerId: string) {
    super(`Pairing with ${peerId} is already in progress`, 'PAIRING_ALREADY_IN_PROGRESS', false);
    this.name = 'PairingAlreadyInProgressError';
  }
}

export class NotPairedError extends LinkError {
  constructor(peerId: string) {
    super(`Peer ${peerId} is not paired`, 'NOT_PAIRED', false);
    this.name = 'NotPairedError';
  }
}

export class NotConnectedError extends LinkError {
  constructor(peerId: string) {
    super(`No live session for peer ${peerId}`, 'NOT_CONNECTED', false);
    this.name = 'NotConnectedError';
  }
}

export class UnknownPeerError extends LinkError {
  constructor(peerId: string) {
    super(`Peer ${peerId} has not been discovered`, 'UNKNOWN_PEER', false);
    this.name = 'UnknownPeerError';
  }
}

export class DecodeError extends LinkError {
  constructor(message: string, cause?: Error) {
    super(message, 'DECODE_ERROR', true, cause);
    this.name = 'DecodeError';
  }
}

export class PayloadTooLargeError extends LinkError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Frame of ${size} bytes exceeds the ${limit} byte limit`, 'PAYLOAD_TOO_LARGE', true);
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

export class TransportLostError extends LinkError {
  constructor(message = 'Transport closed', cause?: Error) {
    super(message, 'TRANSPORT_LOST', true, cause);
    this.name = 'TransportLostError';
  }
}

export class ConnectTimeoutError extends LinkError {
  constructor(address: string, port: number, timeoutMs: number) {
    super(`Connecting to ${address}:${port} timed out after ${timeoutMs}ms`, 'CONNECT_TIMEOUT', true);
    this.name = 'ConnectTimeoutError';
  }
}

/**
 * Errors `pair()` can resolve with.
 */
export type PairingError =
  | PairingRejectedError
  | PairingTimedOutError
  | PairingAlreadyInProgressError
  | UnknownPeerError;

/**
 * Errors `send()` can resolve with.
 */
export type SendError = NotConnectedError | PayloadTooLargeError | TransportLostError;
