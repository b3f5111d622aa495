import { existsSync, statSync } from 'node:fs';
import { ConfigurationError, UsageError } from '../errors.js';

export const DEFAULT_INTERVAL_MS = 1000;

export interface ScanConfig {
  input: string;
  output?: string;
  verbose: boolean;
  quiet: boolean;
  follow: boolean;
  intervalMs: number;
  color: boolean;
}

export type CommandLine = { kind: 'help' } | { kind: 'scan'; config: ScanConfig };

export interface Environment {
  env?: Record<string, string | undefined>;
  isTTY?: boolean;
}

export const USAGE = 'usage: ntlm-carve -i <inputfile> [-o <outputfile>] [-f] [-n <ms>] [-h] [-q] [-v]';

export const HELP = `${USAGE}

Main options:
  -f, --follow               Continuously "follow" the input file for new data
  -h, --help
  -i, --input  <inputfile>   Binary packet data input file
                             (.pcap, .pcapng, .cap, .etl, others)
  -n, --interval <ms>        Poll interval for --follow (default ${DEFAULT_INTERVAL_MS})
  -o, --output <outputfile>  Output file to record any found NTLM hashes
  -q, --quiet                Only output found NTLM hashes; disables --verbose
  -v, --verbose              Show offsets and field lengths

Short options combine (-qf) and take attached values (-icapture.pcap).
Set NO_COLOR to disable coloured output.`;

/**
 * Parse argv (without the node and script entries). Throws UsageError for
 * unknown options and ConfigurationError for a missing input.
 */
export function readCommandLine(args: string[], environment: Environment = {}): CommandLine {
  let input: string | undefined;
  let output: string | undefined;
  let interval: string | undefined;
  let verbose = false;
  let quiet = false;
  let follow = false;

  const queue = [...args];
  let i = 0;
  while (i < queue.length) {
    const [flag, inline, rest] = splitInline(queue[i++]);
    if (rest !== undefined) queue.splice(i, 0, rest);
    const value = (): string => {
      if (inline !== undefined) return inline;
      if (i >= queue.length) {
        throw new UsageError(`Option '${flag}' requires a value.`);
      }
      return queue[i++];
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-i':
      case '--input':
        input = value();
        break;
      case '-o':
      case '--output':
        output = value();
        break;
      case '-n':
      case '--interval':
        interval = value();
        break;
      case '-f':
      case '--follow':
        follow = true;
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '-q':
      case '--quiet':
        quiet = true;
        break;
      default:
        throw new UsageError(`Unexpected argument '${flag}'.`);
    }
  }

  if (input === undefined || input === '') {
    throw new ConfigurationError('Input file not specified.  Did you mean to specify -i?');
  }

  const env = environment.env ?? {};
  return {
    kind: 'scan',
    config: {
      input,
      output: output === '' ? undefined : output,
      verbose: verbose && !quiet,
      quiet,
      follow,
      intervalMs: parseInterval(interval),
      color: (environment.isTTY ?? false) && env['NO_COLOR'] === undefined,
    },
  };
}

/**
 * Fail before any scanning when the input cannot be read as a file.
 */
export function validateInput(config: ScanConfig): void {
  if (!existsSync(config.input)) {
    throw new ConfigurationError('Input file not found.');
  }
  if (!statSync(config.input).isFile()) {
    throw new ConfigurationError(`Input is not a file: ${config.input}`);
  }
}

const SHORT_WITH_VALUE = new Set(['-i', '-o', '-n']);

/**
 * `--name=value` gives [--name, value]. Short options follow getopt: `-icap.pcap`
 * gives [-i, cap.pcap] and `-qf` gives [-q, undefined, -f].
 */
function splitInline(arg: string): [flag: string, inline?: string, rest?: string] {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    return eq === -1 ? [arg] : [arg.slice(0, eq), arg.slice(eq + 1)];
  }
  if (arg.startsWith('-') && arg.length > 2) {
    const flag = arg.slice(0, 2);
    const tail = arg.slice(2);
    return SHORT_WITH_VALUE.has(flag) ? [flag, tail] : [flag, undefined, `-${tail}`];
  }
  return [arg];
}

function parseInterval(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_INTERVAL_MS;
  const ms = Number(raw);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigurationError(`Invalid interval '${raw}': expected a positive number of milliseconds.`);
  }
  return ms;
}
