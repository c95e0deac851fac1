/**
 * Command-line option parsing for oximeter-stream.
 */

import { parseArgs } from 'node:util';
import type { DeviceIdentity } from './models/identity';
import { DEFAULT_NAME_FILTER } from './protocol/constants';
import { isChecksumAlgorithm, type ChecksumAlgorithm } from './protocol/checksum';
import { ReconnectionSupervisor } from './supervisor';
import { Session } from './transport/session';

export type LogLevel = 'quiet' | 'normal' | 'verbose';

export interface CliOptions {
  identity: DeviceIdentity;
  scanTimeoutMs: number;
  inactivityTimeoutMs: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  checksum: ChecksumAlgorithm;
  includeWaveform: boolean;
  includeEmpty: boolean;
  logLevel: LogLevel;
  help: boolean;
}

export const DEFAULT_RETRY_DELAY_MS = 1000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 15000;

export const USAGE = `Usage: oximeter-stream [options]

Streams SpO2 and pulse rate from an OxySmart pulse oximeter as CSV on stdout,
reconnecting whenever the device drops the link. Logs go to stderr.

Options:
  --name <text>                Match peripherals whose name contains <text> (default: ${DEFAULT_NAME_FILTER})
  --address <addr>             Match the peripheral with this address
  --scan-timeout <ms>          Give up a scan after <ms> (default: ${Session.DEFAULT_SCAN_TIMEOUT})
  --inactivity-timeout <ms>    Reconnect after <ms> without notifications (default: ${ReconnectionSupervisor.DEFAULT_INACTIVITY_TIMEOUT})
  --retry-delay <ms>           Delay after the first failure (default: ${DEFAULT_RETRY_DELAY_MS})
  --max-retry-delay <ms>       Upper bound for the backoff delay (default: ${DEFAULT_MAX_RETRY_DELAY_MS})
  --checksum <none|crc8-maxim> Frame checksum verification (default: none)
  --waveform                   Also write plethysmograph samples (pleth column)
  --include-empty              Write rows where the device reported no SpO2 and no pulse
  -v, --verbose                Debug logging
  -q, --quiet                  Only warnings and errors
  -h, --help                   Show this help
`;

/**
 * Parse command-line arguments.
 *
 * @param argv - Arguments without the node executable and script path
 * @throws {Error} On unknown options or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      name: { type: 'string' },
      address: { type: 'string' },
      'scan-timeout': { type: 'string' },
      'inactivity-timeout': { type: 'string' },
      'retry-delay': { type: 'string' },
      'max-retry-delay': { type: 'string' },
      checksum: { type: 'string' },
      waveform: { type: 'boolean', default: false },
      'include-empty': { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      quiet: { type: 'boolean', short: 'q', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.verbose && values.quiet) {
    throw new Error('--verbose and --quiet cannot be combined');
  }

  const checksum = values.checksum ?? 'none';
  if (!isChecksumAlgorithm(checksum)) {
    throw new Error(`Unknown checksum "${checksum}" (expected none or crc8-maxim)`);
  }

  // An explicit address alone should not also match any OxySmart by name
  const identity: DeviceIdentity =
    values.address && values.name === undefined
      ? { address: values.address }
      : { nameContains: values.name ?? DEFAULT_NAME_FILTER, address: values.address };

  const retryDelayMs = parseMilliseconds('retry-delay', values['retry-delay'], DEFAULT_RETRY_DELAY_MS);
  const maxRetryDelayMs = parseMilliseconds(
    'max-retry-delay',
    values['max-retry-delay'],
    DEFAULT_MAX_RETRY_DELAY_MS
  );
  if (maxRetryDelayMs < retryDelayMs) {
    throw new Error('--max-retry-delay must not be smaller than --retry-delay');
  }

  return {
    identity,
    scanTimeoutMs: parseMilliseconds('scan-timeout', values['scan-timeout'], Session.DEFAULT_SCAN_TIMEOUT),
    inactivityTimeoutMs: parseMilliseconds(
      'inactivity-timeout',
      values['inactivity-timeout'],
      ReconnectionSupervisor.DEFAULT_INACTIVITY_TIMEOUT
    ),
    retryDelayMs,
    maxRetryDelayMs,
    checksum,
    includeWaveform: values.waveform ?? false,
    includeEmpty: values['include-empty'] ?? false,
    logLevel: values.verbose ? 'verbose' : values.quiet ? 'quiet' : 'normal',
    help: values.help ?? false,
  };
}

function parseMilliseconds(flag: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new Error(`--${flag} must be a positive integer, got "${value}"`);
  }
  return ms;
}

/**
 * Route console output for the CLI.
 *
 * stdout carries CSV only, so log/info/debug go to stderr. Lower levels are
 * silenced according to `level`.
 */
export function configureLogging(level: LogLevel, target: Console = console): void {
  const toStderr = (...args: unknown[]) => target.error(...args);
  const silent = () => undefined;

  target.debug = level === 'verbose' ? toStderr : silent;
  target.info = level === 'quiet' ? silent : toStderr;
  target.log = level === 'quiet' ? silent : toStderr;
}
