/**
 * Pure byte utilities for scanning untrusted capture data.
 * Every read is bounds-checked: out-of-range access yields null, never throws.
 */
import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';

/**
 * Concatenate multiple Uint8Arrays into one.
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  return concatBytes(...arrays);
}

/**
 * Decode a hex string to a Uint8Array.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error(`fromHex: odd-length hex string`);
  }
  return hexToBytes(hex);
}

/**
 * Encode a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/**
 * True when `pattern` occurs in `bytes` starting exactly at `offset`.
 */
export function matchesAt(bytes: Uint8Array, offset: number, pattern: Uint8Array): boolean {
  if (offset < 0 || offset + pattern.length > bytes.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    if (bytes[offset + i] !== pattern[i]) return false;
  }
  return true;
}

/**
 * Position of the first occurrence of `pattern` at or after `from`, or -1.
 */
export function indexOfBytes(bytes: Uint8Array, pattern: Uint8Array, from = 0): number {
  if (pattern.length === 0) return -1;
  const first = pattern[0];
  const last = bytes.length - pattern.length;
  for (let i = Math.max(0, from); i <= last; i++) {
    // indexOf on the first byte skips most of the buffer natively
    const candidate = bytes.indexOf(first, i);
    if (candidate === -1 || candidate > last) return -1;
    if (matchesAt(bytes, candidate, pattern)) return candidate;
    i = candidate;
  }
  return -1;
}

/** Little-endian u16 at `offset`, or null past the end of the buffer. */
export function readUint16LE(bytes: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 2 > bytes.length) return null;
  return bytes[offset] | (bytes[offset + 1] << 8);
}

/** Little-endian u32 at `offset`, or null past the end of the buffer. */
export function readUint32LE(bytes: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 4 > bytes.length) return null;
  return (
    (bytes[offset] |
      (bytes[offset + 1] << 8) |
      (bytes[offset + 2] << 16) |
      (bytes[offset + 3] << 24)) >>>
    0
  );
}

/**
 * Copy of `bytes[start, end)`, or null when the range is not fully inside the buffer.
 */
export function sliceExact(bytes: Uint8Array, start: number, end: number): Uint8Array | null {
  if (start < 0 || end < start || end > bytes.length) return null;
  return bytes.slice(start, end);
}

/**
 * Little-endian encodings, used when laying out NTLM messages.
 */
export function u16le(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new Error(`u16le: value ${value} overflows 2 bytes`);
  }
  return new Uint8Array([value & 0xff, (value >>> 8) & 0xff]);
}

export function u32le(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`u32le: value ${value} overflows 4 bytes`);
  }
  return new Uint8Array([
    value & 0xff,
    (value >>> 8) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 24) & 0xff,
  ]);
}
