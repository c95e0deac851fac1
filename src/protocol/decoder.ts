/**
 * Frame decoder for the oximeter notification stream.
 *
 * The device sends a continuous byte stream over one characteristic. Frame
 * boundaries do not line up with notification boundaries, and a connection may
 * start mid-frame, so the decoder carries an explicit buffer between calls and
 * resynchronizes on the start marker.
 */

import { MalformedFrameError } from '../exceptions';
import {
  createVitalsReading,
  createWaveformReading,
  type Reading,
} from '../models/reading';
import { verifyChecksum, type ChecksumAlgorithm } from './checksum';
import {
  FRAME_HEADER_SIZE,
  FRAME_MARKER,
  FRAME_TOKEN,
  FrameType,
  MAX_FRAME_LENGTH,
  MIN_FRAME_LENGTH,
  OFFSET_LENGTH,
  OFFSET_PAYLOAD,
  OFFSET_TOKEN,
  OFFSET_TYPE,
  PULSE_RATE_MAX,
  PULSE_RATE_MIN,
  SPO2_MAX,
  SPO2_MIN,
  VITALS_OFFSET_PULSE_RATE,
  VITALS_FRAME_LENGTH,
  VITALS_OFFSET_SPO2,
  WAVEFORM_BEAT_FLAG,
  WAVEFORM_VALUE_MASK,
} from './constants';

export interface DecodeOptions {
  /** Checksum verification (default: 'none') */
  checksum?: ChecksumAlgorithm;
}

export interface DecodeResult {
  /** Unconsumed tail to pass into the next call */
  buffer: Uint8Array;

  /** Readings in wire order */
  readings: Reading[];

  /** Bytes dropped while resynchronizing */
  discardedBytes: number;

  /** Candidate frames rejected by validation */
  malformedFrames: number;

  /** Structurally valid frames consumed, including ignored frame types */
  frames: number;
}

export const EMPTY_BUFFER: Uint8Array = new Uint8Array(0);

/**
 * Decode as many frames as possible from the carried buffer plus new bytes.
 *
 * Neither input is modified.
 *
 * @param buffer - Tail returned by the previous call (EMPTY_BUFFER to start)
 * @param newBytes - Newly received notification payload
 * @param options - Decoder options
 * @returns Remaining buffer, decoded readings and resync counters
 */
export function decodeFrames(
  buffer: Uint8Array,
  newBytes: Uint8Array,
  options: DecodeOptions = {}
): DecodeResult {
  const checksum = options.checksum ?? 'none';
  const data = concatBytes(buffer, newBytes);
  const readings: Reading[] = [];
  let discardedBytes = 0;
  let malformedFrames = 0;
  let frames = 0;
  let pos = 0;

  while (pos < data.length) {
    const start = findMarker(data, pos);
    if (start === -1) {
      discardedBytes += data.length - pos;
      pos = data.length;
      break;
    }
    discardedBytes += start - pos;
    pos = start;

    if (data.length - pos < FRAME_HEADER_SIZE) {
      break; // header incomplete
    }

    const frameEnd = pos + FRAME_HEADER_SIZE + data[pos + OFFSET_LENGTH];
    try {
      validateHeader(data, pos);
      if (checksum === 'none') {
        // Without a checksum, a truncated frame would swallow the next one
        assertNoFrameStart(data, pos + 1, Math.min(frameEnd, data.length));
      }
    } catch (error) {
      if (!(error instanceof MalformedFrameError)) throw error;
      malformedFrames++;
      discardedBytes++;
      pos++;
      continue;
    }

    if (frameEnd > data.length) {
      break; // frame incomplete
    }

    const frame = data.subarray(pos, frameEnd);
    if (!verifyChecksum(frame, checksum)) {
      malformedFrames++;
      discardedBytes++;
      pos++;
      continue;
    }

    readings.push(...parseFrame(frame));
    frames++;
    pos = frameEnd;
  }

  return {
    buffer: pos >= data.length ? EMPTY_BUFFER : new Uint8Array(data.subarray(pos)),
    readings,
    discardedBytes,
    malformedFrames,
    frames,
  };
}

/**
 * Parse a validated frame into readings.
 *
 * Frames of unknown type yield no readings.
 *
 * @param frame - Complete frame, marker through checksum
 */
export function parseFrame(frame: Uint8Array): Reading[] {
  const payload = frame.subarray(OFFSET_PAYLOAD, frame.length - 1);

  switch (frame[OFFSET_TYPE]) {
    case FrameType.VITALS: {
      if (payload.length <= VITALS_OFFSET_PULSE_RATE) {
        return [];
      }
      return [
        createVitalsReading(
          inRange(payload[VITALS_OFFSET_SPO2], SPO2_MIN, SPO2_MAX),
          inRange(payload[VITALS_OFFSET_PULSE_RATE], PULSE_RATE_MIN, PULSE_RATE_MAX)
        ),
      ];
    }
    case FrameType.WAVEFORM:
      return Array.from(payload, (byte) =>
        createWaveformReading(byte & WAVEFORM_VALUE_MASK, (byte & WAVEFORM_BEAT_FLAG) !== 0)
      );
    default:
      return [];
  }
}

/**
 * Check token and length of the frame header at `pos`, and the fixed length
 * of vitals frames once the type byte is there.
 *
 * @throws {MalformedFrameError} If the header cannot start a frame
 */
function validateHeader(data: Uint8Array, pos: number): void {
  const token = data[pos + OFFSET_TOKEN];
  if (token !== FRAME_TOKEN) {
    throw new MalformedFrameError(
      `bad token 0x${token.toString(16).padStart(2, '0')}`
    );
  }

  const length = data[pos + OFFSET_LENGTH];
  if (length < MIN_FRAME_LENGTH || length > MAX_FRAME_LENGTH) {
    throw new MalformedFrameError(`length ${length} out of range`);
  }

  if (data[pos + OFFSET_TYPE] === FrameType.VITALS && length !== VITALS_FRAME_LENGTH) {
    throw new MalformedFrameError(`vitals frame with length ${length}`);
  }
}

/**
 * Reject a candidate whose span holds the header of another frame.
 *
 * @throws {MalformedFrameError} If marker and token occur in [from, to)
 */
function assertNoFrameStart(data: Uint8Array, from: number, to: number): void {
  for (let i = from; i + 2 < to; i++) {
    if (
      data[i] === FRAME_MARKER[0] &&
      data[i + 1] === FRAME_MARKER[1] &&
      data[i + 2] === FRAME_TOKEN
    ) {
      throw new MalformedFrameError(`frame header at offset ${i - from + 1}`);
    }
  }
}

/**
 * Index of the first complete marker at or after `from`, or of a lone first
 * marker byte at the very end of the data. -1 if neither exists.
 */
function findMarker(data: Uint8Array, from: number): number {
  for (let i = from; i < data.length; i++) {
    if (data[i] !== FRAME_MARKER[0]) {
      continue;
    }
    if (i + 1 === data.length || data[i + 1] === FRAME_MARKER[1]) {
      return i;
    }
  }
  return -1;
}

function inRange(value: number, min: number, max: number): number | null {
  return value >= min && value <= max ? value : null;
}

function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length === 0) return b;
  if (b.length === 0) return a;
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
