/**
 * Target device identity.
 */

import { DEFAULT_NAME_FILTER } from '../protocol/constants';

/**
 * How to recognise the oximeter among advertising peripherals.
 *
 * At least one field must be set. A peripheral matches when its address
 * equals `address`, or its advertised name contains `nameContains`.
 */
export interface DeviceIdentity {
  readonly nameContains?: string;
  readonly address?: string;
}

export const DEFAULT_DEVICE_IDENTITY: DeviceIdentity = Object.freeze({
  nameContains: DEFAULT_NAME_FILTER,
});

/**
 * Advertised properties used for matching.
 */
export interface PeripheralInfo {
  /** Advertised local name, if any */
  name?: string;

  /** Hardware address, or a platform identifier where addresses are hidden */
  address: string;
}

function normalizeAddress(address: string): string {
  return address.replace(/[:-]/g, '').toLowerCase();
}

/**
 * Check whether a peripheral matches the identity.
 *
 * Peripherals without an advertised name are matched by name against their
 * address string.
 */
export function matchesIdentity(identity: DeviceIdentity, peripheral: PeripheralInfo): boolean {
  if (
    identity.address &&
    peripheral.address &&
    normalizeAddress(identity.address) === normalizeAddress(peripheral.address)
  ) {
    return true;
  }

  if (identity.nameContains) {
    const name = peripheral.name || peripheral.address;
    return name.includes(identity.nameContains);
  }

  return false;
}

/**
 * Validate an identity supplied at startup.
 *
 * @throws {Error} If neither a name filter nor an address is given
 */
export function assertValidIdentity(identity: DeviceIdentity): void {
  if (!identity.nameContains && !identity.address) {
    throw new Error('Device identity needs a name filter or an address');
  }
}

export function describeIdentity(identity: DeviceIdentity): string {
  const parts: string[] = [];
  if (identity.nameContains) {
    parts.push(`name contains "${identity.nameContains}"`);
  }
  if (identity.address) {
    parts.push(`address ${identity.address}`);
  }
  return parts.join(' or ');
}
