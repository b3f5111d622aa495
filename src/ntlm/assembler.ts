/**
 * Pairs Type 2 challenges with the Type 3 responses that follow them.
 *
 * State is a single pending challenge, passed in and returned explicitly:
 *   Type 2       → pending = challenge (replaces any earlier one)
 *   Type 3       → consumes pending, whatever the outcome
 *   Type 1 / ??? → pending unchanged
 */
import { TruncatedFieldError } from '../errors.js';
import { NtlmMessageType } from './layout.js';
import { decodeAuthenticate, decodeChallenge } from './decoder.js';
import { formatNtlmv2Hash } from './hash.js';
import { SignatureScanner } from './scanner.js';
import type { PendingChallenge, ScanEvent, ScanPass, SignatureOccurrence } from './types.js';

export interface ProcessResult {
  event: ScanEvent;
  pending: PendingChallenge;
}

/**
 * Decode one occurrence against the pending challenge. Never throws: a decode
 * failure becomes a `truncated` or `error` event.
 */
export function processOccurrence(
  buffer: Uint8Array,
  occurrence: SignatureOccurrence,
  pending: PendingChallenge
): ProcessResult {
  try {
    return decodeOccurrence(buffer, occurrence, pending);
  } catch (e: unknown) {
    // A Type 3 consumes the challenge even when it cannot be decoded.
    const next = occurrence.messageType === NtlmMessageType.Authenticate ? null : pending;
    if (e instanceof TruncatedFieldError) {
      return { event: { kind: 'truncated', occurrence, error: e }, pending: next };
    }
    const error = e instanceof Error ? e : new Error(String(e));
    return { event: { kind: 'error', occurrence, error }, pending: next };
  }
}

function decodeOccurrence(
  buffer: Uint8Array,
  occurrence: SignatureOccurrence,
  pending: PendingChallenge
): ProcessResult {
  switch (occurrence.messageType) {
    case NtlmMessageType.Negotiate:
      return { event: { kind: 'negotiate', occurrence }, pending };

    case NtlmMessageType.Challenge: {
      const serverChallenge = decodeChallenge(buffer, occurrence);
      return { event: { kind: 'challenge', occurrence, serverChallenge }, pending: serverChallenge };
    }

    case NtlmMessageType.Authenticate: {
      const fields = decodeAuthenticate(buffer, occurrence);
      if (pending === null) {
        return { event: { kind: 'no-challenge', occurrence, fields }, pending: null };
      }
      if (fields.ntResponse.length === 0) {
        return {
          event: { kind: 'null-session', occurrence, fields, serverChallenge: pending },
          pending: null,
        };
      }
      const hash = formatNtlmv2Hash({
        domain: fields.domain.text,
        username: fields.username.text,
        workstation: fields.workstation.text,
        serverChallenge: pending,
        ntProofStr: fields.ntProofStr,
        ntlmv2Response: fields.ntlmv2Response,
        includeDomain: fields.domain.descriptor.length > 0,
      });
      return {
        event: { kind: 'hash', occurrence, fields, serverChallenge: pending, hash },
        pending: null,
      };
    }

    case NtlmMessageType.Unknown:
      return { event: { kind: 'unknown', occurrence }, pending };
  }
}

export interface ScanOptions {
  /** First byte to search for signatures. Fields may still reference earlier bytes. */
  start?: number;
  /** Challenge carried over from an earlier pass. */
  pending?: PendingChallenge;
  /** Called for each event as it is produced. */
  onEvent?: (event: ScanEvent) => void;
  /**
   * Stop at the first message cut off by the end of the buffer instead of
   * reporting it as truncated; the pass returns it as `held`.
   */
  holdIncomplete?: boolean;
}

/** Furthest a held message may reach past its signature; beyond this it is reported. */
export const HOLD_LIMIT = 0x10000;

/**
 * Whether an occurrence only failed because the buffer ends too early: its type
 * field is cut off, or a field it needs runs past the end by a plausible amount.
 */
function waitsForMoreData(buffer: Uint8Array, occurrence: SignatureOccurrence, event: ScanEvent): boolean {
  if (occurrence.rawType === null) return true;
  return (
    event.kind === 'truncated' &&
    event.error.limit === buffer.length &&
    event.error.end > buffer.length &&
    event.error.end - occurrence.offset <= HOLD_LIMIT
  );
}

/**
 * One full pass over `buffer`. Deterministic: the same bytes and options give
 * the same events in the same order.
 */
export function scanBuffer(buffer: Uint8Array, options: ScanOptions = {}): ScanPass {
  const start = options.start ?? 0;
  const events: ScanEvent[] = [];
  const hashes: string[] = [];
  let pending = options.pending ?? null;
  let held: SignatureOccurrence | null = null;

  for (const occurrence of new SignatureScanner(buffer, start)) {
    const result = processOccurrence(buffer, occurrence, pending);
    if (options.holdIncomplete === true && waitsForMoreData(buffer, occurrence, result.event)) {
      held = occurrence;
      break;
    }
    pending = result.pending;
    events.push(result.event);
    if (result.event.kind === 'hash') hashes.push(result.event.hash);
    options.onEvent?.(result.event);
  }

  return { events, hashes, pending, start, end: buffer.length, held };
}
