/**
 * Terminal rendering of scan events.
 *
 * Normal mode prints one block per occurrence, verbose adds offsets and raw
 * field geometry, quiet prints hash lines only. Hash lines always go out,
 * uncoloured, so stdout can be piped straight into a cracker.
 */
import { toHex } from '../bytes/primitives.js';
import { NtlmMessageType, messageTypeName } from '../ntlm/layout.js';
import type { AuthenticateFields, DecodedField, ScanEvent, SignatureOccurrence } from '../ntlm/types.js';

export type LogLevel = 'info' | 'ok' | 'warn' | 'err' | 'data';

export interface ReporterOptions {
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
  /** Line sink for stdout; defaults to console.log. */
  out?: (line: string) => void;
  /** Line sink for stderr; defaults to console.error. */
  err?: (line: string) => void;
}

const ANSI: Record<LogLevel | 'bold' | 'dim', string> = {
  info: '\x1b[36m',
  ok: '\x1b[32m',
  warn: '\x1b[33m',
  err: '\x1b[31m',
  data: '\x1b[97m',
  bold: '\x1b[1;37m',
  dim: '\x1b[90m',
};
const RESET = '\x1b[0m';

export class Reporter {
  readonly verbose: boolean;
  readonly quiet: boolean;
  private readonly color: boolean;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.quiet = options.quiet ?? false;
    // --quiet wins over --verbose
    this.verbose = !this.quiet && (options.verbose ?? false);
    this.color = options.color ?? false;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  private paint(style: keyof typeof ANSI, text: string): string {
    return this.color ? `${ANSI[style]}${text}${RESET}` : text;
  }

  /** Diagnostic line; dropped in quiet mode. */
  log(message: string, level: LogLevel = 'info'): void {
    if (this.quiet) return;
    if (level === 'err') {
      this.err(`${this.paint('err', 'Error:')} ${message}`);
      return;
    }
    this.out(level === 'info' ? message : this.paint(level, message));
  }

  /** Fatal error; printed even in quiet mode. */
  error(message: string): void {
    this.err(`${this.paint('err', 'Error:')} ${message}`);
  }

  /** A recovered hash; printed in every mode. */
  hash(line: string): void {
    this.out(line);
  }

  blank(): void {
    if (!this.quiet) this.out('');
  }

  /** Render one scan event. */
  event(event: ScanEvent): void {
    if (event.kind === 'hash') {
      if (!this.quiet) {
        this.renderHeader(event.occurrence);
        this.renderFields(event.fields);
        this.out(this.paint('bold', 'NTLMv2 Hash recovered:'));
      }
      this.hash(event.hash);
      this.blank();
      return;
    }
    if (this.quiet) return;

    this.renderHeader(event.occurrence);
    switch (event.kind) {
      case 'negotiate':
      case 'unknown':
        break;
      case 'challenge':
        this.out(this.field('Server Challenge', toHex(event.serverChallenge)));
        break;
      case 'no-challenge':
        this.renderFields(event.fields);
        this.out(this.paint('err', "Server Challenge not found... can't create crackable hash"));
        break;
      case 'null-session':
        this.renderFields(event.fields);
        this.out(this.paint('dim', 'NTLM NULL session found... no hash to generate'));
        break;
      case 'truncated':
        this.out(this.paint('warn', `Truncated message, skipped (${event.error.message})`));
        break;
      case 'error':
        this.out(this.paint('warn', `Could not decode message, skipped (${event.error.message})`));
        break;
    }
    this.blank();
  }

  private renderHeader(occurrence: SignatureOccurrence): void {
    const type = occurrence.messageType;
    const label =
      type === NtlmMessageType.Unknown
        ? `Found NTLMSSP Message Type ${occurrence.rawType ?? '?'}`
        : `Found NTLMSSP Message Type ${type}`;
    const name = this.paint('ok', messageTypeName(type));
    const offset = this.verbose ? this.paint('dim', ` > Offset ${occurrence.offset}`) : '';
    this.out(`${this.paint('bold', `${label} :`)} ${name}${offset}`);
  }

  private renderFields(fields: AuthenticateFields): void {
    this.renderText('Domain', fields.domain);
    this.renderText('Username', fields.username);
    this.renderText('Workstation', fields.workstation);
    if (this.verbose) {
      this.out(this.detail('NTLM length', fields.ntResponse.length));
      this.out(this.detail('NTLM offset', fields.ntResponse.offset));
      this.out(this.field('NTProofStr', toHex(fields.ntProofStr)));
      this.out(this.field('NTLMv2 Response', toHex(fields.ntlmv2Response)));
    }
  }

  private renderText(label: string, field: DecodedField): void {
    this.out(this.field(label, field.text));
    if (this.verbose) {
      this.out(this.detail(`${label} length`, field.descriptor.length));
      this.out(this.detail(`${label} offset`, field.descriptor.offset));
    }
  }

  private field(label: string, value: string): string {
    return `    ${this.paint('info', '>')} ${label.padEnd(22)} : ${this.paint('data', value)}`;
  }

  private detail(label: string, value: number): string {
    return `      ${label.padEnd(22)} : ${value}`;
  }
}
