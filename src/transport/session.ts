/**
 * One live BLE link to the oximeter.
 *
 * A session is built by `Session.open`, streams until the link drops, and is
 * then discarded. It never reconnects by itself; that is the supervisor's job.
 */

import {
  ConnectFailedError,
  DeviceNotFoundError,
  SubscribeFailedError,
  errorMessage,
} from '../exceptions';
import { describeIdentity, type DeviceIdentity } from '../models/identity';
import type { Reading } from '../models/reading';
import type { OpenStage } from '../models/state';
import type { ChecksumAlgorithm } from '../protocol/checksum';
import { NUS_TX_CHARACTERISTIC_UUID } from '../protocol/constants';
import { EMPTY_BUFFER, decodeFrames } from '../protocol/decoder';
import { withAbort } from '../utils/abort';
import type { BleAdapter, BlePeripheral, Unsubscribe } from './adapter';
import { NotificationQueue } from './notification-queue';

/**
 * Options for opening a session.
 */
export interface SessionOptions {
  /** Scan timeout in milliseconds (default: Session.DEFAULT_SCAN_TIMEOUT) */
  scanTimeoutMs?: number;

  /**
   * Service holding the notify characteristic. null searches every service
   * (default: null, the characteristic is unique on this device)
   */
  serviceUuid?: string | null;

  /** Notify characteristic (default: Nordic UART TX) */
  characteristicUuid?: string;

  /** Frame checksum verification (default: 'none') */
  checksum?: ChecksumAlgorithm;

  /**
   * Garbage bytes tolerated without a single valid frame before the session
   * reports decode-fatal (default: Session.DEFAULT_MAX_GARBAGE_BYTES)
   */
  maxGarbageBytes?: number;

  /** Cancels discovery, connect and subscribe */
  signal?: AbortSignal;

  /** Called as the attempt moves through its stages */
  onStage?: (stage: OpenStage) => void;
}

/**
 * Result of waiting for the next notification.
 */
export type ChunkOutcome =
  | { kind: 'data'; bytes: Uint8Array; readings: Reading[]; discardedBytes: number; malformedFrames: number }
  | { kind: 'disconnected' }
  | { kind: 'decode-fatal'; reason: string }
  | { kind: 'stalled' };

export interface NextChunkOptions {
  /** Report `stalled` if nothing arrives within this window */
  timeoutMs?: number;

  /** Rejects with signal.reason when aborted */
  signal?: AbortSignal;
}

/**
 * Opens sessions. `Session.open` satisfies this; tests substitute their own.
 */
export type SessionOpener = (
  identity: DeviceIdentity,
  options: SessionOptions
) => Promise<SessionHandle>;

/**
 * The part of a session the supervisor relies on.
 */
export interface SessionHandle {
  readonly peripheralName: string;
  readonly terminated: boolean;
  nextChunk(options?: NextChunkOptions): Promise<ChunkOutcome>;
  close(): Promise<void>;
}

/**
 * Live connection to the oximeter.
 *
 * @example
 * ```typescript
 * const session = await Session.open(DEFAULT_DEVICE_IDENTITY, new NobleAdapter());
 * for await (const reading of session.readings()) {
 *   console.log(reading);
 * }
 * ```
 */
export class Session implements SessionHandle {
  static readonly DEFAULT_SCAN_TIMEOUT = 10000;
  static readonly DEFAULT_MAX_GARBAGE_BYTES = 4096;

  private readonly queue = new NotificationQueue();
  private decodeBuffer: Uint8Array = EMPTY_BUFFER;
  private garbageSinceLastFrame = 0;
  private fatalReason: string | null = null;
  private _terminated = false;
  private released = false;
  private removeDisconnectListener: Unsubscribe | null = null;
  private unsubscribe: (() => Promise<void>) | null = null;

  private constructor(
    private readonly peripheral: BlePeripheral,
    private readonly checksum: ChecksumAlgorithm,
    private readonly maxGarbageBytes: number
  ) {}

  /**
   * Discover, connect and subscribe.
   *
   * @param identity - Which peripheral to use
   * @param adapter - BLE adapter
   * @param options - Session options
   * @returns A streaming session
   * @throws {DeviceNotFoundError} If no matching peripheral was found
   * @throws {ConnectFailedError} If the link could not be established
   * @throws {SubscribeFailedError} If the characteristic is missing or
   *   notifications could not be enabled
   */
  static async open(
    identity: DeviceIdentity,
    adapter: BleAdapter,
    options: SessionOptions = {}
  ): Promise<Session> {
    const { signal, onStage } = options;

    onStage?.('discovering');
    let peripheral: BlePeripheral | null;
    try {
      peripheral = await withAbort(
        adapter.findPeripheral(identity, {
          timeoutMs: options.scanTimeoutMs ?? Session.DEFAULT_SCAN_TIMEOUT,
          signal,
        }),
        signal
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new DeviceNotFoundError(`Failed to scan: ${errorMessage(error)}`);
    }
    if (!peripheral) {
      throw new DeviceNotFoundError(`No peripheral found with ${describeIdentity(identity)}`);
    }

    const session = new Session(
      peripheral,
      options.checksum ?? 'none',
      options.maxGarbageBytes ?? Session.DEFAULT_MAX_GARBAGE_BYTES
    );

    try {
      onStage?.('connecting');
      console.log(`Connecting to ${session.peripheralName}`);
      session.removeDisconnectListener = peripheral.onDisconnect(session.handleDisconnect);
      try {
        await withAbort(peripheral.connect(), signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        throw new ConnectFailedError(`Failed to connect: ${errorMessage(error)}`);
      }

      onStage?.('subscribing');
      await session.subscribe(options, signal);
    } catch (error) {
      await session.close();
      throw error;
    }

    console.log(`Connected to ${session.peripheralName}`);
    return session;
  }

  /**
   * Advertised name, or the address when the peripheral has none.
   */
  get peripheralName(): string {
    return this.peripheral.name || this.peripheral.address;
  }

  /**
   * True once the link dropped, decoding failed fatally or close() was called.
   */
  get terminated(): boolean {
    return this._terminated;
  }

  /**
   * Wait for the next notification and decode it.
   *
   * Buffered notifications are still delivered after a disconnect; the
   * `disconnected` outcome follows once they are drained.
   */
  async nextChunk(options: NextChunkOptions = {}): Promise<ChunkOutcome> {
    if (this.fatalReason !== null) {
      return { kind: 'decode-fatal', reason: this.fatalReason };
    }

    const result = await this.queue.dequeue(options.timeoutMs, options.signal);

    switch (result.kind) {
      case 'timeout':
        return { kind: 'stalled' };
      case 'closed':
        this.decodeBuffer = EMPTY_BUFFER;
        return { kind: 'disconnected' };
      case 'data':
        return this.decodeChunk(result.data);
    }
  }

  /**
   * Iterate readings until the session terminates.
   *
   * @param signal - Stops iteration by rejecting with signal.reason
   */
  async *readings(signal?: AbortSignal): AsyncGenerator<Reading> {
    while (true) {
      const outcome = await this.nextChunk({ signal });
      if (outcome.kind !== 'data') {
        return;
      }
      yield* outcome.readings;
    }
  }

  /**
   * Unsubscribe and release the connection handle. Safe to call repeatedly;
   * the handle is released only once.
   */
  async close(): Promise<void> {
    this.terminate('Session closed');
    this.queue.clear();
    this.decodeBuffer = EMPTY_BUFFER;
    if (this.released) {
      return;
    }
    this.released = true;

    this.removeDisconnectListener?.();
    this.removeDisconnectListener = null;

    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    if (unsubscribe) {
      try {
        await unsubscribe();
      } catch (error) {
        console.debug(`Unsubscribe failed during close: ${errorMessage(error)}`);
      }
    }

    try {
      await this.peripheral.disconnect();
    } catch (error) {
      console.warn(`Disconnect from ${this.peripheralName} failed: ${errorMessage(error)}`);
    }
  }

  private async subscribe(options: SessionOptions, signal?: AbortSignal): Promise<void> {
    const characteristicUuid = options.characteristicUuid ?? NUS_TX_CHARACTERISTIC_UUID;
    const serviceUuid = options.serviceUuid === undefined ? null : options.serviceUuid;

    try {
      const characteristic = await withAbort(
        this.peripheral.findNotifyCharacteristic(serviceUuid, characteristicUuid),
        signal
      );
      if (!characteristic) {
        throw new SubscribeFailedError(
          `Notify characteristic ${characteristicUuid} not found` +
            (serviceUuid ? ` in service ${serviceUuid}` : '')
        );
      }
      console.debug(`Discovered characteristic ${characteristic.uuid}`);

      this.unsubscribe = await withAbort(
        characteristic.subscribe(this.handleNotification),
        signal
      );
    } catch (error) {
      if (signal?.aborted || error instanceof SubscribeFailedError) throw error;
      throw new SubscribeFailedError(`Failed to subscribe: ${errorMessage(error)}`);
    }
  }

  private decodeChunk(bytes: Uint8Array): ChunkOutcome {
    const result = decodeFrames(this.decodeBuffer, bytes, { checksum: this.checksum });
    this.decodeBuffer = result.buffer;

    this.garbageSinceLastFrame =
      result.frames > 0 ? 0 : this.garbageSinceLastFrame + result.discardedBytes;

    if (this.garbageSinceLastFrame > this.maxGarbageBytes) {
      this.fatalReason =
        `${this.garbageSinceLastFrame} bytes discarded without a valid frame`;
      this.terminate(this.fatalReason);
      return { kind: 'decode-fatal', reason: this.fatalReason };
    }

    return {
      kind: 'data',
      bytes,
      readings: result.readings,
      discardedBytes: result.discardedBytes,
      malformedFrames: result.malformedFrames,
    };
  }

  private terminate(reason: string): void {
    if (this._terminated) {
      return;
    }
    this._terminated = true;
    this.queue.close(reason);
  }

  private handleNotification = (data: Uint8Array): void => {
    this.queue.enqueue(data);
  };

  private handleDisconnect = (): void => {
    console.log(`Disconnected from ${this.peripheralName}`);
    this.terminate('Peripheral disconnected');
  };
}

/**
 * Bind `Session.open` to an adapter.
 */
export function sessionOpener(adapter: BleAdapter): SessionOpener {
  return (identity, options) => Session.open(identity, adapter, options);
}
