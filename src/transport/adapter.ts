/**
 * BLE capability interfaces used by the session layer.
 *
 * The core never touches process-wide BLE state; everything it needs from the
 * radio goes through a `BleAdapter` passed in by the caller. `NobleAdapter`
 * implements these on top of noble, and tests substitute in-memory fakes.
 */

import type { DeviceIdentity } from '../models/identity';

/**
 * Unregisters a listener or subscription.
 */
export type Unsubscribe = () => void;

export interface FindPeripheralOptions {
  /** Give up scanning after this many milliseconds */
  timeoutMs: number;

  /** Aborts the scan */
  signal?: AbortSignal;
}

/**
 * Discovery entry point.
 */
export interface BleAdapter {
  /**
   * Scan for a peripheral matching the identity.
   *
   * @returns The first matching peripheral, or null if the scan timed out
   */
  findPeripheral(
    identity: DeviceIdentity,
    options: FindPeripheralOptions
  ): Promise<BlePeripheral | null>;
}

/**
 * A discovered peripheral. Owns the connection handle once connected.
 */
export interface BlePeripheral {
  readonly id: string;
  readonly name: string | undefined;
  readonly address: string;

  /** Establish the link. Resolves immediately if already connected. */
  connect(): Promise<void>;

  /** Release the link. */
  disconnect(): Promise<void>;

  /**
   * Locate a characteristic that supports notifications.
   *
   * @param serviceUuid - Service to search, or null for all services
   * @param characteristicUuid - Characteristic UUID
   * @returns The characteristic, or null if absent or not notifiable
   */
  findNotifyCharacteristic(
    serviceUuid: string | null,
    characteristicUuid: string
  ): Promise<BleCharacteristic | null>;

  /** Register a listener for link loss. */
  onDisconnect(listener: () => void): Unsubscribe;
}

export interface BleCharacteristic {
  readonly uuid: string;

  /**
   * Enable notifications and route payloads to `onData`.
   *
   * @returns Function that stops the subscription
   */
  subscribe(onData: (data: Uint8Array) => void): Promise<() => Promise<void>>;
}

/**
 * Compare UUIDs in either dashed or compact form.
 */
export function sameUuid(a: string, b: string): boolean {
  return compactUuid(a) === compactUuid(b);
}

export function compactUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}
