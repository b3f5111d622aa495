/**
 * String encoding utilities for NTLM text fields.
 */

const UTF8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Decode an NTLM text field to a string.
 *
 * The bytes are decoded as UTF-8 (malformed sequences become U+FFFD) and every
 * NUL is stripped. For the ASCII range of UTF-16LE this recovers the original
 * text. Legitimate U+0000 code units and non-ASCII UTF-16 text do not survive.
 */
export function decodeNtlmText(bytes: Uint8Array): string {
  return UTF8.decode(bytes).replace(/\0/g, '');
}

/**
 * Encode a string as UTF-16LE bytes, as used by Unicode NTLM payloads.
 */
export function strToUtf16le(s: string): Uint8Array {
  const bytes = new Uint8Array(s.length * 2);
  for (let i = 0; i < s.length; i++) {
    const unit = s.charCodeAt(i);
    bytes[i * 2] = unit & 0xff;
    bytes[i * 2 + 1] = unit >>> 8;
  }
  return bytes;
}

/**
 * Encode a string to ASCII/UTF-8 bytes.
 */
export function strToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}
