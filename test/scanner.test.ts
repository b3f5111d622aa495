import { describe, it, expect } from 'vitest';
import { SignatureScanner, scanSignatures } from '../src/ntlm/scanner.js';
import { NTLMSSP_SIGNATURE, NtlmMessageType } from '../src/ntlm/layout.js';
import { concat, u32le } from '../src/bytes/primitives.js';
import { strToBytes } from '../src/bytes/encoding.js';
import {
  authenticateMessage,
  challengeMessage,
  filled,
  layout,
  negotiateMessage,
} from './helpers/messages.js';

const CHALLENGE = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);

describe('SignatureScanner', () => {
  it('yields nothing for a buffer without signatures', () => {
    expect(scanSignatures(new Uint8Array(0))).toEqual([]);
    expect(scanSignatures(strToBytes('NTLMSS NTLMSSP no terminator'))).toEqual([]);
    expect(scanSignatures(filled(4096, 0x4e))).toEqual([]);
  });

  it('classifies each message type at its offset', () => {
    const buffer = layout(400, [
      [10, negotiateMessage()],
      [60, challengeMessage(CHALLENGE)],
      [200, authenticateMessage({ username: 'bob' })],
    ]);
    const found = scanSignatures(buffer);
    expect(found.map((o) => [o.offset, o.messageType])).toEqual([
      [10, NtlmMessageType.Negotiate],
      [60, NtlmMessageType.Challenge],
      [200, NtlmMessageType.Authenticate],
    ]);
    expect(found.map((o) => o.rawType)).toEqual([1, 2, 3]);
  });

  it('reports other type values as Unknown with the raw value', () => {
    const buffer = concat(NTLMSSP_SIGNATURE, u32le(7));
    expect(scanSignatures(buffer)).toEqual([
      { offset: 0, messageType: NtlmMessageType.Unknown, rawType: 7 },
    ]);
  });

  it('reports a type field cut off by the end of the buffer as Unknown', () => {
    const buffer = concat(filled(3, 0), NTLMSSP_SIGNATURE, new Uint8Array([0x03, 0x00]));
    expect(scanSignatures(buffer)).toEqual([
      { offset: 3, messageType: NtlmMessageType.Unknown, rawType: null },
    ]);
  });

  it('finds back-to-back signatures', () => {
    // the first signature's "type" is the next signature's first four bytes
    const buffer = concat(NTLMSSP_SIGNATURE, NTLMSSP_SIGNATURE, u32le(2));
    expect(scanSignatures(buffer)).toEqual([
      { offset: 0, messageType: NtlmMessageType.Unknown, rawType: 1296847950 },
      { offset: 8, messageType: NtlmMessageType.Challenge, rawType: 2 },
    ]);
  });

  it('produces strictly increasing offsets', () => {
    const parts: Array<[number, Uint8Array]> = [];
    for (let i = 0; i < 20; i++) {
      parts.push([i * 53, i % 2 === 0 ? challengeMessage(CHALLENGE) : negotiateMessage()]);
    }
    const offsets = scanSignatures(layout(0, parts)).map((o) => o.offset);
    expect(offsets).toHaveLength(20);
    for (let i = 1; i < offsets.length; i++) {
      expect(offsets[i]).toBeGreaterThan(offsets[i - 1]);
    }
  });

  it('starts searching at the given position', () => {
    const buffer = layout(0, [
      [0, negotiateMessage()],
      [100, challengeMessage(CHALLENGE)],
    ]);
    expect(scanSignatures(buffer, 1).map((o) => o.offset)).toEqual([100]);
    expect(scanSignatures(buffer, 101)).toEqual([]);
  });

  it('is lazy and restartable', () => {
    const buffer = layout(0, [
      [0, negotiateMessage()],
      [100, challengeMessage(CHALLENGE)],
    ]);
    const scanner = new SignatureScanner(buffer);
    expect(scanner.position).toBe(0);

    const first = scanner.next();
    expect(first.done).toBe(false);
    expect(first.value?.offset).toBe(0);
    expect(scanner.position).toBe(1);

    expect(scanner.next().value?.offset).toBe(100);
    expect(scanner.next().done).toBe(true);
    expect(scanner.position).toBe(buffer.length);

    scanner.seek(0);
    expect(Array.from(scanner).map((o) => o.offset)).toEqual([0, 100]);
  });
});
