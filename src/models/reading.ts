/**
 * Decoded oximeter readings.
 */

/**
 * SpO2 and pulse rate from one vitals frame.
 *
 * `null` means the device reported its "searching" / no-finger value or a
 * value outside the physiological range.
 */
export interface VitalsReading {
  readonly type: 'vitals';

  /** Blood oxygen saturation in percent (1-100) */
  readonly spo2: number | null;

  /** Pulse rate in beats per minute */
  readonly pulseRate: number | null;
}

/**
 * One plethysmograph waveform sample.
 */
export interface WaveformReading {
  readonly type: 'waveform';

  /** Sample amplitude (0-127) */
  readonly sample: number;

  /** Set on the sample where the device detected a pulse beat */
  readonly pulseBeat: boolean;
}

export type Reading = VitalsReading | WaveformReading;

export function createVitalsReading(
  spo2: number | null,
  pulseRate: number | null
): VitalsReading {
  return Object.freeze({ type: 'vitals', spo2, pulseRate });
}

export function createWaveformReading(sample: number, pulseBeat: boolean): WaveformReading {
  return Object.freeze({ type: 'waveform', sample, pulseBeat });
}

/**
 * True when a vitals reading carries neither SpO2 nor pulse rate.
 */
export function isEmptyVitals(reading: Reading): boolean {
  return reading.type === 'vitals' && reading.spo2 === null && reading.pulseRate === null;
}
