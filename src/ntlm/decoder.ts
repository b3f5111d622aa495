/**
 * Field decoding for Challenge (Type 2) and Authenticate (Type 3) messages.
 *
 * Security buffer (8 bytes, little endian):
 *   length (2) || maxLength (2) || offset (4)
 * The payload lives at [messageStart + offset, messageStart + offset + length).
 * maxLength is read for diagnostics and otherwise ignored.
 *
 * Every read is checked against the buffer; a read past the end throws
 * TruncatedFieldError, which the assembler confines to the occurrence.
 */
import { readUint16LE, readUint32LE, sliceExact } from '../bytes/primitives.js';
import { decodeNtlmText } from '../bytes/encoding.js';
import { TruncatedFieldError } from '../errors.js';
import {
  DESCRIPTOR_LENGTH,
  DOMAIN_DESCRIPTOR,
  NT_PROOF_LENGTH,
  NT_RESPONSE_DESCRIPTOR,
  SERVER_CHALLENGE_LENGTH,
  SERVER_CHALLENGE_OFFSET,
  USERNAME_DESCRIPTOR,
  WORKSTATION_DESCRIPTOR,
} from './layout.js';
import type {
  AuthenticateFields,
  DecodedField,
  FieldDescriptor,
  SignatureOccurrence,
} from './types.js';

/**
 * Read the security buffer located `at` bytes into the message.
 */
export function readFieldDescriptor(
  buffer: Uint8Array,
  messageStart: number,
  at: number,
  field = 'descriptor'
): FieldDescriptor {
  const base = messageStart + at;
  const length = readUint16LE(buffer, base);
  const maxLength = readUint16LE(buffer, base + 2);
  const offset = readUint32LE(buffer, base + 4);
  if (length === null || maxLength === null || offset === null) {
    throw new TruncatedFieldError(field, base, base + DESCRIPTOR_LENGTH, buffer.length);
  }
  return { length, maxLength, offset };
}

/**
 * The payload bytes a descriptor points at.
 */
export function readFieldBytes(
  buffer: Uint8Array,
  messageStart: number,
  descriptor: FieldDescriptor,
  field = 'payload'
): Uint8Array {
  // empty fields often carry a stale or zero offset
  if (descriptor.length === 0) return new Uint8Array(0);
  const start = messageStart + descriptor.offset;
  const end = start + descriptor.length;
  const bytes = sliceExact(buffer, start, end);
  if (bytes === null) {
    throw new TruncatedFieldError(field, start, end, buffer.length);
  }
  return bytes;
}

/**
 * Resolve a text field (domain, username, workstation).
 */
export function decodeTextField(
  buffer: Uint8Array,
  messageStart: number,
  at: number,
  field: string
): DecodedField {
  const descriptor = readFieldDescriptor(buffer, messageStart, at, `${field} descriptor`);
  const bytes = readFieldBytes(buffer, messageStart, descriptor, field);
  return { descriptor, bytes, text: decodeNtlmText(bytes) };
}

/**
 * The 8-byte server challenge of a Type 2 message.
 */
export function decodeChallenge(buffer: Uint8Array, occurrence: SignatureOccurrence): Uint8Array {
  const start = occurrence.offset + SERVER_CHALLENGE_OFFSET;
  const end = start + SERVER_CHALLENGE_LENGTH;
  const challenge = sliceExact(buffer, start, end);
  if (challenge === null) {
    throw new TruncatedFieldError('server challenge', start, end, buffer.length);
  }
  return challenge;
}

/**
 * Decode the fields of a Type 3 message.
 *
 * The NT response is split into NTProofStr (first 16 bytes) and the NTLMv2
 * response blob (the rest). A zero-length response is a NULL session and
 * decodes to two empty arrays; a non-zero length below 16 cannot hold a proof
 * and is reported as truncated.
 */
export function decodeAuthenticate(
  buffer: Uint8Array,
  occurrence: SignatureOccurrence
): AuthenticateFields {
  const start = occurrence.offset;
  const domain = decodeTextField(buffer, start, DOMAIN_DESCRIPTOR, 'domain');
  const username = decodeTextField(buffer, start, USERNAME_DESCRIPTOR, 'username');
  const workstation = decodeTextField(buffer, start, WORKSTATION_DESCRIPTOR, 'workstation');

  const ntResponse = readFieldDescriptor(buffer, start, NT_RESPONSE_DESCRIPTOR, 'NT response descriptor');
  if (ntResponse.length > 0 && ntResponse.length < NT_PROOF_LENGTH) {
    const from = start + ntResponse.offset;
    throw new TruncatedFieldError('NTProofStr', from, from + NT_PROOF_LENGTH, from + ntResponse.length);
  }
  const response = readFieldBytes(buffer, start, ntResponse, 'NT response');

  return {
    domain,
    username,
    workstation,
    ntResponse,
    ntProofStr: response.slice(0, NT_PROOF_LENGTH),
    ntlmv2Response: response.slice(NT_PROOF_LENGTH),
  };
}
