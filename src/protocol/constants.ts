/**
 * BLE protocol constants for OxySmart pulse oximeters.
 */

// Nordic UART Service TX characteristic; the oximeter streams all frames here
export const NUS_TX_CHARACTERISTIC_UUID = '6e400003-b5a3-f393-e0a9-e50e24dcca9e';

export const DEFAULT_NAME_FILTER = 'OxySmart';

// Frame layout: [0xAA 0x55][token][length][type][payload...][checksum]
export const FRAME_MARKER = Uint8Array.of(0xaa, 0x55);
export const FRAME_TOKEN = 0x0f;
export const FRAME_HEADER_SIZE = 4; // marker + token + length
export const MIN_FRAME_LENGTH = 2; // type + checksum
export const MAX_FRAME_LENGTH = 32;
export const MAX_FRAME_SIZE = FRAME_HEADER_SIZE + MAX_FRAME_LENGTH;

// Offsets relative to the first marker byte
export const OFFSET_TOKEN = 2;
export const OFFSET_LENGTH = 3;
export const OFFSET_TYPE = 4;
export const OFFSET_PAYLOAD = 5;

/**
 * Frame types carried in byte 4.
 */
export enum FrameType {
  VITALS = 0x01,
  WAVEFORM = 0x02,
}

// Vitals frames always carry this length byte
export const VITALS_FRAME_LENGTH = 0x08;

// Vitals payload offsets
export const VITALS_OFFSET_SPO2 = 0;
export const VITALS_OFFSET_PULSE_RATE = 1;

// Waveform sample byte: low 7 bits value, high bit pulse beat
export const WAVEFORM_VALUE_MASK = 0x7f;
export const WAVEFORM_BEAT_FLAG = 0x80;

// Values outside these ranges are the device's "searching" / invalid markers
export const SPO2_MIN = 1;
export const SPO2_MAX = 100;
export const PULSE_RATE_MIN = 1;
export const PULSE_RATE_MAX = 254;
