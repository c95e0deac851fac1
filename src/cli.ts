#!/usr/bin/env node
/**
 * oximeter-stream: print oximeter readings as CSV until interrupted.
 */

import { configureLogging, parseCliArgs, USAGE, type CliOptions } from './cli-options';
import { errorMessage } from './exceptions';
import { CsvReadingSink } from './sink';
import { ReconnectionSupervisor, exponentialBackoff } from './supervisor';
import { NobleAdapter } from './transport/noble-adapter';
import { sessionOpener } from './transport/session';

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  configureLogging(options.logLevel);

  const sink = new CsvReadingSink(process.stdout, {
    includeWaveform: options.includeWaveform,
    includeEmpty: options.includeEmpty,
  });
  sink.writeHeader();

  const supervisor = new ReconnectionSupervisor({
    identity: options.identity,
    openSession: sessionOpener(new NobleAdapter()),
    sink,
    delay: exponentialBackoff({
      initialMs: options.retryDelayMs,
      maxMs: options.maxRetryDelayMs,
    }),
    inactivityTimeoutMs: options.inactivityTimeoutMs,
    sessionOptions: {
      scanTimeoutMs: options.scanTimeoutMs,
      checksum: options.checksum,
    },
  });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await supervisor.run(controller.signal);
    return 0;
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    // noble keeps the HCI handle open, so exit explicitly
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`Fatal: ${errorMessage(error)}`);
      process.exit(1);
    }
  );
}
