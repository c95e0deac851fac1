/**
 * Reading sinks: where decoded readings go.
 */

import { isEmptyVitals, type Reading } from './models/reading';

/**
 * Receives readings one at a time, in wire order.
 */
export interface ReadingSink {
  accept(reading: Reading): void | Promise<void>;
}

/**
 * Anything with a `write(text)` method, such as process.stdout.
 */
export interface TextOutput {
  write(text: string): unknown;
}

export interface CsvReadingSinkOptions {
  /** Write waveform samples as a fourth `pleth` column (default: false) */
  includeWaveform?: boolean;

  /** Write vitals readings that carry neither SpO2 nor pulse rate (default: false) */
  includeEmpty?: boolean;

  /** Clock used for the time column (default: current time) */
  now?: () => Date;
}

/**
 * Writes readings as CSV lines: `time,spo2,heartrate[,pleth]`.
 *
 * The header is written before the first row. Values the device reported as
 * invalid are left empty.
 *
 * @example
 * ```typescript
 * const sink = new CsvReadingSink(process.stdout);
 * ```
 */
export class CsvReadingSink implements ReadingSink {
  private headerWritten = false;
  private readonly includeWaveform: boolean;
  private readonly includeEmpty: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly output: TextOutput,
    options: CsvReadingSinkOptions = {}
  ) {
    this.includeWaveform = options.includeWaveform ?? false;
    this.includeEmpty = options.includeEmpty ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get header(): string {
    return this.includeWaveform ? 'time,spo2,heartrate,pleth' : 'time,spo2,heartrate';
  }

  /**
   * Write the header if it has not been written yet.
   */
  writeHeader(): void {
    if (this.headerWritten) {
      return;
    }
    this.headerWritten = true;
    this.output.write(`${this.header}\n`);
  }

  accept(reading: Reading): void {
    if (reading.type === 'waveform') {
      if (!this.includeWaveform) {
        return;
      }
      this.writeRow(['', '', String(reading.sample)]);
      return;
    }

    if (isEmptyVitals(reading) && !this.includeEmpty) {
      console.debug('Suppressing null data');
      return;
    }

    const row = [formatValue(reading.spo2), formatValue(reading.pulseRate)];
    if (this.includeWaveform) {
      row.push('');
    }
    this.writeRow(row);
  }

  private writeRow(values: string[]): void {
    this.writeHeader();
    this.output.write(`${[this.now().toISOString(), ...values].join(',')}\n`);
  }
}

/**
 * Forwards readings to a function.
 */
export class CallbackReadingSink implements ReadingSink {
  constructor(private readonly callback: (reading: Reading) => void | Promise<void>) {}

  accept(reading: Reading): void | Promise<void> {
    return this.callback(reading);
  }
}

function formatValue(value: number | null): string {
  return value === null ? '' : String(value);
}
