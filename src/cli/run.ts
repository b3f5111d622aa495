/**
 * Wires configuration, scanning, rendering and the optional hash file together.
 */
import { readFileSync } from 'node:fs';
import { scanBuffer } from '../ntlm/assembler.js';
import type { ScanEvent } from '../ntlm/types.js';
import { followFile } from './follow.js';
import { HashFileWriter } from './output.js';
import { Reporter } from './reporter.js';
import type { ScanConfig } from './options.js';

export interface RunOptions {
  reporter?: Reporter;
  signal?: AbortSignal;
}

export interface RunResult {
  hashes: number;
  passes: number;
}

export async function runScan(config: ScanConfig, options: RunOptions = {}): Promise<RunResult> {
  const reporter =
    options.reporter ??
    new Reporter({ verbose: config.verbose, quiet: config.quiet, color: config.color });
  const writer = config.output !== undefined ? new HashFileWriter(config.output) : null;

  reporter.log(`Searching ${config.input} for NTLMv2 hashes...`, 'data');
  if (writer !== null) {
    reporter.log(`Writing output to: ${writer.path}`, 'data');
  }
  reporter.blank();

  const onEvent = (event: ScanEvent): void => {
    reporter.event(event);
    if (event.kind === 'hash' && writer !== null) {
      writer.append(event.hash);
    }
  };

  if (config.follow) {
    const summary = await followFile(config.input, {
      intervalMs: config.intervalMs,
      signal: options.signal,
      onEvent,
    });
    return { hashes: summary.hashes, passes: summary.passes };
  }

  const pass = scanBuffer(readFileSync(config.input), { onEvent });
  return { hashes: pass.hashes.length, passes: 1 };
}
