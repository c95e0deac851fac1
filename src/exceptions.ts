/**
 * Exception classes for the oximeter library.
 */

export class OximeterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OximeterError';
  }
}

export class BLEConnectionError extends OximeterError {
  constructor(message: string) {
    super(message);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends OximeterError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

/**
 * Stage at which a connection attempt failed.
 */
export type ConnectErrorKind = 'not-found' | 'connect-failed' | 'subscribe-failed';

/**
 * Base class for failures while establishing a session.
 *
 * The supervisor matches on `kind` to decide what to log; all kinds are
 * retried.
 */
export abstract class ConnectError extends BLEConnectionError {
  abstract readonly kind: ConnectErrorKind;
}

export class DeviceNotFoundError extends ConnectError {
  readonly kind = 'not-found';

  constructor(message: string) {
    super(message);
    this.name = 'DeviceNotFoundError';
  }
}

export class ConnectFailedError extends ConnectError {
  readonly kind = 'connect-failed';

  constructor(message: string) {
    super(message);
    this.name = 'ConnectFailedError';
  }
}

export class SubscribeFailedError extends ConnectError {
  readonly kind = 'subscribe-failed';

  constructor(message: string) {
    super(message);
    this.name = 'SubscribeFailedError';
  }
}

export class ProtocolError extends OximeterError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A single frame failed structural validation. Only used inside the decoder.
 */
export class MalformedFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedFrameError';
  }
}

/**
 * Describe an unknown thrown value for log and error messages.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
