/**
 * NTLMSSP signature scanner.
 *
 * Treats the input as an opaque byte sequence: no capture-container framing is
 * parsed, so truncated or non-standard wrappers still yield their messages.
 */
import { indexOfBytes, readUint32LE } from '../bytes/primitives.js';
import { MESSAGE_TYPE_OFFSET, NTLMSSP_SIGNATURE, classifyMessageType } from './layout.js';
import type { SignatureOccurrence } from './types.js';

/**
 * Lazy, restartable iterator over signature occurrences in ascending offset order.
 *
 * After each hit the cursor moves one byte past the start of the signature, not
 * past the message, so back-to-back messages are never skipped.
 */
export class SignatureScanner implements IterableIterator<SignatureOccurrence> {
  private cursor: number;

  constructor(
    private readonly buffer: Uint8Array,
    start = 0
  ) {
    this.cursor = Math.max(0, start);
  }

  /** Where the next search begins. */
  get position(): number {
    return this.cursor;
  }

  /** Restart the search from `position`. */
  seek(position: number): void {
    this.cursor = Math.max(0, position);
  }

  next(): IteratorResult<SignatureOccurrence> {
    const offset = indexOfBytes(this.buffer, NTLMSSP_SIGNATURE, this.cursor);
    if (offset === -1) {
      this.cursor = this.buffer.length;
      return { done: true, value: undefined };
    }
    this.cursor = offset + 1;
    const rawType = readUint32LE(this.buffer, offset + MESSAGE_TYPE_OFFSET);
    return {
      done: false,
      value: { offset, rawType, messageType: classifyMessageType(rawType) },
    };
  }

  [Symbol.iterator](): IterableIterator<SignatureOccurrence> {
    return this;
  }
}

/**
 * Every signature occurrence at or after `start`.
 */
export function scanSignatures(buffer: Uint8Array, start = 0): SignatureOccurrence[] {
  return Array.from(new SignatureScanner(buffer, start));
}
