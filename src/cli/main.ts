#!/usr/bin/env node
/**
 * ntlm-carve — find NTLMv2 hashes in raw capture files.
 *
 *   ntlm-carve -i capture.pcapng -o hashes.txt
 *   ntlm-carve -i PktMon.etl -f -q
 */
import { ConfigurationError } from '../errors.js';
import { HELP, USAGE, readCommandLine, validateInput } from './options.js';
import { Reporter } from './reporter.js';
import { runScan } from './run.js';

async function main(argv: string[]): Promise<number> {
  if (argv.length === 0) {
    console.log(USAGE);
    return 1;
  }

  const color = process.stdout.isTTY === true && process.env['NO_COLOR'] === undefined;

  try {
    const command = readCommandLine(argv, { env: process.env, isTTY: process.stdout.isTTY === true });
    if (command.kind === 'help') {
      console.log(HELP);
      return 0;
    }
    const { config } = command;
    validateInput(config);

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);
    try {
      await runScan(config, { signal: controller.signal });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
    if (controller.signal.aborted) {
      console.log('Bye!');
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      new Reporter({ color }).error(error.message);
      if (error.exitCode === 2) console.log(USAGE);
      return error.exitCode;
    }
    throw error;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
);
