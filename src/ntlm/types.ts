/**
 * Records produced while scanning a buffer for NTLMSSP messages.
 */
import type { NtlmMessageType } from './layout.js';
import type { TruncatedFieldError } from '../errors.js';

/** One "NTLMSSP\0" hit in the buffer. */
export interface SignatureOccurrence {
  readonly offset: number;          // position of the signature's first byte
  readonly messageType: NtlmMessageType;
  readonly rawType: number | null;  // null when fewer than 4 bytes follow the signature
}

/** NTLM security buffer: length, max length, offset (relative to the message start). */
export interface FieldDescriptor {
  readonly length: number;
  readonly maxLength: number;
  readonly offset: number;
}

/** A length/offset field resolved against the buffer. */
export interface DecodedField {
  readonly descriptor: FieldDescriptor;
  readonly bytes: Uint8Array;
  readonly text: string;
}

/** Type 3 fields needed to build an NTLMv2 hash. */
export interface AuthenticateFields {
  domain: DecodedField;
  username: DecodedField;
  workstation: DecodedField;
  ntResponse: FieldDescriptor;
  ntProofStr: Uint8Array;      // 16 bytes, empty on a NULL session
  ntlmv2Response: Uint8Array;  // response length - 16, possibly empty
}

/** The 8-byte server challenge waiting for a Type 3, or null. */
export type PendingChallenge = Uint8Array | null;

/**
 * Outcome of one occurrence. The reporter renders these; the scan only
 * collects them.
 */
export type ScanEvent =
  | { kind: 'negotiate'; occurrence: SignatureOccurrence }
  | { kind: 'challenge'; occurrence: SignatureOccurrence; serverChallenge: Uint8Array }
  | { kind: 'no-challenge'; occurrence: SignatureOccurrence; fields: AuthenticateFields }
  | { kind: 'null-session'; occurrence: SignatureOccurrence; fields: AuthenticateFields; serverChallenge: Uint8Array }
  | {
      kind: 'hash';
      occurrence: SignatureOccurrence;
      fields: AuthenticateFields;
      serverChallenge: Uint8Array;
      hash: string;
    }
  | { kind: 'truncated'; occurrence: SignatureOccurrence; error: TruncatedFieldError }
  | { kind: 'error'; occurrence: SignatureOccurrence; error: Error }
  | { kind: 'unknown'; occurrence: SignatureOccurrence };

/** State and output of a single pass over a buffer. */
export interface ScanPass {
  events: ScanEvent[];
  hashes: string[];
  pending: PendingChallenge;  // pending challenge after the last occurrence
  start: number;
  end: number;                // buffer length at scan time
  held: SignatureOccurrence | null;  // cut-off message left unprocessed (holdIncomplete)
}
