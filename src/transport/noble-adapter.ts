/**
 * noble-backed BLE adapter.
 *
 * Provides the capability interfaces from ./adapter on top of the host's
 * Bluetooth radio:
 * - Scanning for the oximeter by name or address
 * - Connection and characteristic discovery
 * - Notification subscription and disconnect events
 */

import noble from '@stoprocent/noble';
import type { Characteristic, Peripheral } from '@stoprocent/noble';
import { BLEConnectionError, BLETimeoutError, errorMessage } from '../exceptions';
import { matchesIdentity, type DeviceIdentity } from '../models/identity';
import { withAbort } from '../utils/abort';
import {
  compactUuid,
  sameUuid,
  type BleAdapter,
  type BleCharacteristic,
  type BlePeripheral,
  type FindPeripheralOptions,
  type Unsubscribe,
} from './adapter';

/**
 * Adapter for the default noble radio.
 */
export class NobleAdapter implements BleAdapter {
  static readonly POWER_ON_TIMEOUT = 10000;

  /**
   * Scan until a peripheral matching `identity` is advertised.
   *
   * Scanning is always stopped before this returns.
   *
   * @returns Matching peripheral, or null when the scan timed out
   * @throws {BLEConnectionError} If the radio is unavailable or scanning fails
   */
  async findPeripheral(
    identity: DeviceIdentity,
    options: FindPeripheralOptions
  ): Promise<BlePeripheral | null> {
    const { timeoutMs, signal } = options;
    await this.waitForPoweredOn(signal);

    console.log('Starting scan...');
    try {
      const peripheral = await new Promise<Peripheral | null>((resolve, reject) => {
        const finish = () => {
          clearTimeout(timeoutId);
          noble.removeListener('discover', onDiscover);
          signal?.removeEventListener('abort', onAbort);
        };

        const onDiscover = (candidate: Peripheral) => {
          const name = candidate.advertisement?.localName;
          if (!matchesIdentity(identity, { name, address: addressOf(candidate) })) {
            return;
          }
          console.log(`Found matching peripheral "${name ?? addressOf(candidate)}"`);
          finish();
          resolve(candidate);
        };

        const onAbort = () => {
          finish();
          reject(signal?.reason);
        };

        const timeoutId = setTimeout(() => {
          finish();
          resolve(null);
        }, timeoutMs);

        signal?.addEventListener('abort', onAbort, { once: true });
        noble.on('discover', onDiscover);
        noble.startScanningAsync([], false).catch((error: unknown) => {
          finish();
          reject(new BLEConnectionError(`Failed to start scan: ${errorMessage(error)}`));
        });
      });

      return peripheral ? new NoblePeripheral(peripheral) : null;
    } finally {
      try {
        await noble.stopScanningAsync();
      } catch (error) {
        console.debug(`Failed to stop scan: ${errorMessage(error)}`);
      }
    }
  }

  private async waitForPoweredOn(signal?: AbortSignal): Promise<void> {
    if (noble.state === 'poweredOn') {
      return;
    }

    console.debug(`Waiting for Bluetooth adapter (state: ${noble.state})`);
    try {
      await withAbort(noble.waitForPoweredOnAsync(NobleAdapter.POWER_ON_TIMEOUT), signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new BLETimeoutError(
        `Bluetooth adapter not powered on within ${NobleAdapter.POWER_ON_TIMEOUT}ms ` +
          `(state: ${noble.state})`
      );
    }
  }
}

/**
 * Connection handle for one noble peripheral.
 */
class NoblePeripheral implements BlePeripheral {
  constructor(private readonly peripheral: Peripheral) {}

  get id(): string {
    return this.peripheral.id;
  }

  get name(): string | undefined {
    return this.peripheral.advertisement?.localName;
  }

  get address(): string {
    return addressOf(this.peripheral);
  }

  async connect(): Promise<void> {
    // A previous run may have left the link up
    if (this.peripheral.state === 'connected') {
      console.debug(`Already connected to ${this.name ?? this.address}`);
      return;
    }
    await this.peripheral.connectAsync();
  }

  async disconnect(): Promise<void> {
    if (this.peripheral.state === 'connecting') {
      this.peripheral.cancelConnect();
      return;
    }
    if (this.peripheral.state === 'disconnected') {
      return;
    }
    await this.peripheral.disconnectAsync();
  }

  async findNotifyCharacteristic(
    serviceUuid: string | null,
    characteristicUuid: string
  ): Promise<BleCharacteristic | null> {
    const { characteristics } = await this.peripheral.discoverSomeServicesAndCharacteristicsAsync(
      serviceUuid ? [compactUuid(serviceUuid)] : [],
      [compactUuid(characteristicUuid)]
    );

    const match = characteristics.find(
      (c) => sameUuid(c.uuid, characteristicUuid) && c.properties.includes('notify')
    );
    return match ? new NobleCharacteristic(match) : null;
  }

  onDisconnect(listener: () => void): Unsubscribe {
    const handler = () => listener();
    this.peripheral.on('disconnect', handler);
    return () => {
      this.peripheral.removeListener('disconnect', handler);
    };
  }
}

class NobleCharacteristic implements BleCharacteristic {
  constructor(private readonly characteristic: Characteristic) {}

  get uuid(): string {
    return this.characteristic.uuid;
  }

  async subscribe(onData: (data: Uint8Array) => void): Promise<() => Promise<void>> {
    const handler = (data: Buffer) => {
      onData(new Uint8Array(data));
    };
    this.characteristic.on('data', handler);

    try {
      await this.characteristic.subscribeAsync();
    } catch (error) {
      this.characteristic.removeListener('data', handler);
      throw error;
    }

    return async () => {
      this.characteristic.removeListener('data', handler);
      await this.characteristic.unsubscribeAsync();
    };
  }
}

/**
 * noble leaves the address empty on platforms that hide it; fall back to
 * the platform identifier.
 */
function addressOf(peripheral: Peripheral): string {
  return peripheral.address || peripheral.id;
}
