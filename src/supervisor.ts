/**
 * Reconnection supervisor: keeps a session to the oximeter alive forever.
 */

import { ConnectError, errorMessage, type ConnectErrorKind } from './exceptions';
import {
  DEFAULT_DEVICE_IDENTITY,
  assertValidIdentity,
  describeIdentity,
  type DeviceIdentity,
} from './models/identity';
import type { ConnectionState } from './models/state';
import type { ReadingSink } from './sink';
import type {
  ChunkOutcome,
  SessionHandle,
  SessionOpener,
  SessionOptions,
} from './transport/session';
import { sleep as defaultSleep, withAbort, type Sleep } from './utils/abort';

// Every retry delay is clamped to this range
export const MIN_RETRY_DELAY_MS = 250;
export const MAX_RETRY_DELAY_MS = 60000;

/**
 * Maps the number of consecutive failures (1-based) to a delay in ms.
 */
export type DelayStrategy = (failureCount: number) => number;

/**
 * Same delay after every failure.
 */
export function fixedDelay(ms: number): DelayStrategy {
  return () => ms;
}

/**
 * Delay growing by `factor` per consecutive failure, capped at `maxMs`.
 */
export function exponentialBackoff(
  options: { initialMs?: number; maxMs?: number; factor?: number } = {}
): DelayStrategy {
  const initialMs = options.initialMs ?? 1000;
  const maxMs = options.maxMs ?? 15000;
  const factor = options.factor ?? 2;
  return (failureCount) =>
    Math.min(maxMs, initialMs * Math.pow(factor, Math.max(0, failureCount - 1)));
}

/**
 * Clamp a delay into [MIN_RETRY_DELAY_MS, MAX_RETRY_DELAY_MS].
 */
export function clampDelay(ms: number): number {
  if (!Number.isFinite(ms)) {
    return ms > 0 ? MAX_RETRY_DELAY_MS : MIN_RETRY_DELAY_MS;
  }
  return Math.min(MAX_RETRY_DELAY_MS, Math.max(MIN_RETRY_DELAY_MS, ms));
}

/**
 * Why a session attempt ended.
 */
export type FailureReason = ConnectErrorKind | 'disconnected' | 'decode-fatal' | 'stalled' | 'error';

/**
 * Diagnostic events for logging collaborators.
 */
export type SupervisorEvent =
  | { type: 'state'; state: ConnectionState; previous: ConnectionState }
  | { type: 'attempt'; attempt: number }
  | { type: 'connected'; attempt: number; peripheral: string }
  | { type: 'failed'; attempt: number; reason: FailureReason; message: string; delayMs: number }
  | { type: 'resync'; discardedBytes: number; malformedFrames: number }
  | { type: 'stopped' };

export interface SupervisorOptions {
  /** Opens one session per attempt, e.g. `sessionOpener(new NobleAdapter())` */
  openSession: SessionOpener;

  /** Receives every decoded reading */
  sink: ReadingSink;

  /** Target device (default: name contains "OxySmart") */
  identity?: DeviceIdentity;

  /** Retry delay (default: exponential backoff, 1s up to 15s) */
  delay?: DelayStrategy;

  /** Waits between attempts; tests pass one that resolves immediately */
  sleep?: Sleep;

  /**
   * Reconnect when a streaming session delivers nothing for this long
   * (default: ReconnectionSupervisor.DEFAULT_INACTIVITY_TIMEOUT)
   */
  inactivityTimeoutMs?: number;

  /** Passed to every session */
  sessionOptions?: Omit<SessionOptions, 'signal' | 'onStage'>;

  /** Diagnostic event listener */
  onEvent?: (event: SupervisorEvent) => void;
}

interface AttemptFailure {
  reason: FailureReason;
  message: string;
}

/**
 * Drives discovery, connection and streaming in an unbounded retry loop.
 *
 * At most one session exists at a time. Every failure leads back to
 * discovery after a bounded delay; only cancellation ends `run()`.
 *
 * @example
 * ```typescript
 * const supervisor = new ReconnectionSupervisor({
 *   openSession: sessionOpener(new NobleAdapter()),
 *   sink: new CsvReadingSink(process.stdout),
 * });
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 * await supervisor.run(controller.signal);
 * ```
 */
export class ReconnectionSupervisor {
  static readonly DEFAULT_INACTIVITY_TIMEOUT = 15000;

  private readonly identity: DeviceIdentity;
  private readonly delay: DelayStrategy;
  private readonly sleep: Sleep;
  private readonly inactivityTimeoutMs: number;

  private _state: ConnectionState = 'idle';
  private _attempts = 0;
  private _consecutiveFailures = 0;
  private _sessionsOpened = 0;
  private stopController: AbortController | null = null;

  constructor(private readonly options: SupervisorOptions) {
    this.identity = options.identity ?? DEFAULT_DEVICE_IDENTITY;
    assertValidIdentity(this.identity);
    this.delay = options.delay ?? exponentialBackoff();
    this.sleep = options.sleep ?? defaultSleep;
    this.inactivityTimeoutMs =
      options.inactivityTimeoutMs ?? ReconnectionSupervisor.DEFAULT_INACTIVITY_TIMEOUT;
  }

  /**
   * Current connection state.
   */
  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Attempts started since run() was called.
   */
  get attempts(): number {
    return this._attempts;
  }

  /**
   * Failures since the last session that reached streaming.
   */
  get consecutiveFailures(): number {
    return this._consecutiveFailures;
  }

  /**
   * Sessions successfully opened since run() was called.
   */
  get sessionsOpened(): number {
    return this._sessionsOpened;
  }

  get isRunning(): boolean {
    return this.stopController !== null;
  }

  /**
   * Run until `signal` aborts or stop() is called.
   *
   * Connection failures never reject; they are retried. Resolves once the
   * active session, if any, has been closed. Errors thrown by the sink
   * reject after teardown.
   *
   * @param signal - External cancellation
   * @throws {Error} If already running
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.stopController) {
      throw new Error('Supervisor is already running');
    }

    const controller = new AbortController();
    this.stopController = controller;
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    this._attempts = 0;
    this._consecutiveFailures = 0;
    this._sessionsOpened = 0;
    console.log(`Looking for peripheral with ${describeIdentity(this.identity)}`);

    try {
      while (!controller.signal.aborted) {
        const failure = await this.runAttempt(controller.signal);
        if (!failure || controller.signal.aborted) {
          break;
        }
        await this.backOff(failure, controller.signal);
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      this.stopController = null;
      this.setState('stopped');
      console.log('Supervisor stopped');
      this.emit({ type: 'stopped' });
    }
  }

  /**
   * Cancel a running supervisor. run() resolves after teardown.
   */
  stop(): void {
    this.stopController?.abort(new Error('Supervisor stopped'));
  }

  /**
   * One discover-connect-stream cycle.
   *
   * @returns Why the attempt ended, or null when cancelled
   */
  private async runAttempt(signal: AbortSignal): Promise<AttemptFailure | null> {
    const attempt = ++this._attempts;
    this.setState('discovering');
    console.log(`Connection attempt ${attempt}`);
    this.emit({ type: 'attempt', attempt });

    let session: SessionHandle;
    try {
      session = await this.options.openSession(this.identity, {
        ...this.options.sessionOptions,
        signal,
        onStage: (stage) => this.setState(stage),
      });
    } catch (error) {
      if (signal.aborted) {
        return null;
      }
      if (error instanceof ConnectError) {
        return { reason: error.kind, message: error.message };
      }
      return { reason: 'error', message: errorMessage(error) };
    }

    this._sessionsOpened++;
    try {
      this._consecutiveFailures = 0;
      this.setState('streaming');
      this.emit({ type: 'connected', attempt, peripheral: session.peripheralName });
      return await this.stream(session, signal);
    } finally {
      await session.close();
    }
  }

  /**
   * Forward readings until the session ends.
   */
  private async stream(session: SessionHandle, signal: AbortSignal): Promise<AttemptFailure | null> {
    while (true) {
      let outcome: ChunkOutcome;
      try {
        outcome = await session.nextChunk({ timeoutMs: this.inactivityTimeoutMs, signal });
      } catch (error) {
        if (signal.aborted) {
          return null;
        }
        throw error;
      }

      switch (outcome.kind) {
        case 'data':
          if (outcome.discardedBytes > 0 || outcome.malformedFrames > 0) {
            console.debug(
              `Resynchronized: discarded ${outcome.discardedBytes} bytes, ` +
                `${outcome.malformedFrames} malformed frames`
            );
            this.emit({
              type: 'resync',
              discardedBytes: outcome.discardedBytes,
              malformedFrames: outcome.malformedFrames,
            });
          }
          try {
            for (const reading of outcome.readings) {
              await withAbort(Promise.resolve(this.options.sink.accept(reading)), signal);
            }
          } catch (error) {
            if (signal.aborted) {
              return null;
            }
            throw error;
          }
          break;
        case 'disconnected':
          return { reason: 'disconnected', message: `Disconnected from ${session.peripheralName}` };
        case 'decode-fatal':
          return { reason: 'decode-fatal', message: outcome.reason };
        case 'stalled':
          return {
            reason: 'stalled',
            message: `No notifications for ${this.inactivityTimeoutMs}ms`,
          };
      }
    }
  }

  private async backOff(failure: AttemptFailure, signal: AbortSignal): Promise<void> {
    this._consecutiveFailures++;
    const delayMs = clampDelay(this.delay(this._consecutiveFailures));
    this.setState('failed');

    console.warn(
      `Attempt ${this._attempts} failed (${failure.reason}): ${failure.message}; ` +
        `retrying in ${delayMs}ms`
    );
    this.emit({
      type: 'failed',
      attempt: this._attempts,
      reason: failure.reason,
      message: failure.message,
      delayMs,
    });

    try {
      await this.sleep(delayMs, signal);
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }

  private setState(state: ConnectionState): void {
    const previous = this._state;
    if (previous === state) {
      return;
    }
    this._state = state;
    console.debug(`State: ${previous} -> ${state}`);
    this.emit({ type: 'state', state, previous });
  }

  private emit(event: SupervisorEvent): void {
    this.options.onEvent?.(event);
  }
}
