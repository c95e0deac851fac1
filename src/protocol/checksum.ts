/**
 * Frame checksum algorithms.
 */

export type ChecksumAlgorithm = 'none' | 'crc8-maxim';

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ['none', 'crc8-maxim'];

const CRC8_MAXIM_TABLE = buildCrc8Table(0x8c);

function buildCrc8Table(reflectedPoly: number): Uint8Array {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ reflectedPoly : crc >>> 1;
    }
    table[i] = crc;
  }
  return table;
}

/**
 * CRC-8/MAXIM (Dallas 1-Wire): poly 0x31 reflected, init 0, no xorout.
 *
 * @param data - Bytes to checksum
 * @returns 8-bit CRC
 */
export function crc8Maxim(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc = CRC8_MAXIM_TABLE[crc ^ byte];
  }
  return crc;
}

/**
 * Check a frame's trailing checksum byte.
 *
 * @param frame - Complete frame including the checksum byte
 * @param algorithm - Checksum algorithm; 'none' accepts every frame
 */
export function verifyChecksum(frame: Uint8Array, algorithm: ChecksumAlgorithm): boolean {
  if (algorithm === 'none') {
    return true;
  }
  const body = frame.subarray(0, frame.length - 1);
  return crc8Maxim(body) === frame[frame.length - 1];
}

export function isChecksumAlgorithm(value: string): value is ChecksumAlgorithm {
  return (CHECKSUM_ALGORITHMS as readonly string[]).includes(value);
}
