/**
 * ntlm-hash-carver — find NTLMSSP messages in raw capture bytes and rebuild
 * crackable NTLMv2 hashes from Challenge / Authenticate pairs.
 *
 * Capture containers (pcap, pcapng, etl) are not parsed: the input is searched
 * for the "NTLMSSP\0" signature as an opaque byte sequence.
 */

// ── Byte utilities ──────────────────────────────────────────────────────────
export {
  concat,
  fromHex,
  toHex,
  matchesAt,
  indexOfBytes,
  readUint16LE,
  readUint32LE,
  sliceExact,
  u16le,
  u32le,
} from './bytes/primitives.js';
export { decodeNtlmText, strToUtf16le, strToBytes } from './bytes/encoding.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { ConfigurationError, UsageError, TruncatedFieldError } from './errors.js';

// ── NTLMSSP layout ──────────────────────────────────────────────────────────
export {
  NTLMSSP_SIGNATURE,
  NtlmMessageType,
  classifyMessageType,
  messageTypeName,
  SERVER_CHALLENGE_OFFSET,
  NT_RESPONSE_DESCRIPTOR,
  DOMAIN_DESCRIPTOR,
  USERNAME_DESCRIPTOR,
  WORKSTATION_DESCRIPTOR,
  NT_PROOF_LENGTH,
} from './ntlm/layout.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  SignatureOccurrence,
  FieldDescriptor,
  DecodedField,
  AuthenticateFields,
  PendingChallenge,
  ScanEvent,
  ScanPass,
} from './ntlm/types.js';

// ── Scanning and decoding ───────────────────────────────────────────────────
export { SignatureScanner, scanSignatures } from './ntlm/scanner.js';
export {
  readFieldDescriptor,
  readFieldBytes,
  decodeTextField,
  decodeChallenge,
  decodeAuthenticate,
} from './ntlm/decoder.js';
export { formatNtlmv2Hash, type Ntlmv2HashParts } from './ntlm/hash.js';
export {
  HOLD_LIMIT,
  processOccurrence,
  scanBuffer,
  type ProcessResult,
  type ScanOptions,
} from './ntlm/assembler.js';

// ── Command line building blocks ────────────────────────────────────────────
export { Reporter, type ReporterOptions, type LogLevel } from './cli/reporter.js';
export { readCommandLine, validateInput, type ScanConfig, type CommandLine } from './cli/options.js';
export { followFile, type FollowOptions, type FollowSummary } from './cli/follow.js';
export { HashFileWriter } from './cli/output.js';
export { runScan, type RunOptions, type RunResult } from './cli/run.js';
