/**
 * Continuous scan of a growing capture file.
 *
 * Each pass re-reads the file and scans only what was appended since the last
 * pass, starting 7 bytes before the old end so that a signature straddling the
 * boundary is found exactly once. The pending challenge is carried from pass to
 * pass, so a Type 2 and a Type 3 written in separate chunks still pair up.
 * A message cut off by the end of the file is held back and decoded again from
 * its signature on the next pass, with the challenge pending before it.
 * A file that shrinks (rotated or truncated) is scanned again from the start.
 */
import { readFileSync } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { scanBuffer } from '../ntlm/assembler.js';
import { NTLMSSP_SIGNATURE } from '../ntlm/layout.js';
import type { PendingChallenge, ScanEvent, ScanPass } from '../ntlm/types.js';

export interface FollowOptions {
  intervalMs: number;
  /** Stops the loop between passes. */
  signal?: AbortSignal;
  onEvent?: (event: ScanEvent) => void;
  onPass?: (pass: ScanPass) => void;
  /** Keep an unconsumed challenge for the next pass. Default: true. */
  carryChallenge?: boolean;
  /** File reader, replaceable in tests. */
  read?: (path: string) => Uint8Array;
}

export interface FollowSummary {
  /** Passes that scanned new bytes. */
  passes: number;
  hashes: number;
  lastEnd: number;
}

const OVERLAP = NTLMSSP_SIGNATURE.length - 1;

export async function followFile(path: string, options: FollowOptions): Promise<FollowSummary> {
  const read = options.read ?? ((p: string) => readFileSync(p));
  const carry = options.carryChallenge ?? true;
  const { signal } = options;

  let lastEnd = 0;
  let resumeAt: number | null = null;
  let pending: PendingChallenge = null;
  let passes = 0;
  let hashes = 0;
  let first = true;

  while (!signal?.aborted) {
    if (!first) {
      try {
        await sleep(options.intervalMs, undefined, { signal });
      } catch (e: unknown) {
        if (signal?.aborted) break;
        throw e;
      }
    }

    const buffer = read(path);
    if (buffer.length < lastEnd) {
      lastEnd = 0;
      resumeAt = null;
      pending = null;
    }

    if (first || buffer.length > lastEnd) {
      const start = resumeAt ?? (lastEnd === 0 ? 0 : Math.max(0, lastEnd - OVERLAP));
      const pass = scanBuffer(buffer, {
        start,
        // a held message keeps the challenge that preceded it
        pending: carry || resumeAt !== null ? pending : null,
        onEvent: options.onEvent,
        holdIncomplete: true,
      });
      pending = pass.pending;
      resumeAt = pass.held === null ? null : pass.held.offset;
      lastEnd = pass.end;
      hashes += pass.hashes.length;
      passes++;
      options.onPass?.(pass);
    }
    first = false;
  }

  return { passes, hashes, lastEnd };
}
