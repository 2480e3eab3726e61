/**
 * Error taxonomy for the audio relay
 */

export type RelayErrorCode =
  | 'CAPTURE_UNAVAILABLE'
  | 'TRANSPORT_ERROR'
  | 'TRANSPORT_UNAVAILABLE'
  | 'SESSION_UNKNOWN'
  | 'PAYLOAD_TOO_LARGE'
  | 'INVALID_FRAME'
  | 'INVALID_REQUEST';

/**
 * Base error with a stable code
 */
export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(message: string, code: RelayErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The capture device could not be opened or read
 */
export class CaptureUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CAPTURE_UNAVAILABLE', options);
    this.name = 'CaptureUnavailableError';
  }
}

/**
 * A single transport operation failed
 */
export class TransportError extends RelayError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(message: string, options: { retryable: boolean; status?: number; cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', { cause: options.cause });
    this.name = 'TransportError';
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

/**
 * Transport failed persistently; the session cannot continue
 */
export class TransportUnavailableError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_UNAVAILABLE', options);
    this.name = 'TransportUnavailableError';
  }
}

export class SessionUnknownError extends RelayError {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`No active session for device: ${deviceId}`, 'SESSION_UNKNOWN');
    this.name = 'SessionUnknownError';
    this.deviceId = deviceId;
  }
}

export class PayloadTooLargeError extends RelayError {
  constructor(size?: number, limit?: number) {
    super(
      size !== undefined && limit !== undefined
        ? `Frame of ${size} bytes exceeds limit of ${limit} bytes`
        : 'Frame payload exceeds the relay limit',
      'PAYLOAD_TOO_LARGE'
    );
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidFrameError extends RelayError {
  constructor(message: string) {
    super(message, 'INVALID_FRAME');
    this.name = 'InvalidFrameError';
  }
}

export class InvalidRequestError extends RelayError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
    this.name = 'InvalidRequestError';
  }
}

const RELAY_ERROR_CODES: ReadonlySet<string> = new Set<RelayErrorCode>([
  'CAPTURE_UNAVAILABLE',
  'TRANSPORT_ERROR',
  'TRANSPORT_UNAVAILABLE',
  'SESSION_UNKNOWN',
  'PAYLOAD_TOO_LARGE',
  'INVALID_FRAME',
  'INVALID_REQUEST',
]);

export function isRelayErrorCode(value: unknown): value is RelayErrorCode {
  return typeof value === 'string' && RELAY_ERROR_CODES.has(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
