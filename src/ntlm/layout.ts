/**
 * NTLMSSP wire layout: signature, message types, and the fixed offsets of
 * the fields this library reads. All offsets are relative to the start of the
 * message, i.e. the first byte of the signature.
 *
 * Reference: "The NTLM Authentication Protocol and Security Support Provider"
 * (davenport.sourceforge.net/ntlm.html), MS-NLMP §2.2.1.
 */

/** "NTLMSSP\0" */
export const NTLMSSP_SIGNATURE = new Uint8Array([0x4e, 0x54, 0x4c, 0x4d, 0x53, 0x53, 0x50, 0x00]);

export enum NtlmMessageType {
  Negotiate = 1,
  Challenge = 2,
  Authenticate = 3,
  Unknown = -1,
}

/** u32 LE directly after the signature. */
export const MESSAGE_TYPE_OFFSET = 8;

// ── Type 2 (Challenge) ──────────────────────────────────────────────────────
export const SERVER_CHALLENGE_OFFSET = 24;
export const SERVER_CHALLENGE_LENGTH = 8;

// ── Type 3 (Authenticate) security buffers ─────────────────────────────────
export const NT_RESPONSE_DESCRIPTOR = 20;
export const DOMAIN_DESCRIPTOR = 28;
export const USERNAME_DESCRIPTOR = 36;
export const WORKSTATION_DESCRIPTOR = 44;
/** length (2) || maxLength (2) || offset (4) */
export const DESCRIPTOR_LENGTH = 8;

/** NTProofStr is the leading HMAC-MD5 of the NTLMv2 response. */
export const NT_PROOF_LENGTH = 16;

const MESSAGE_TYPE_NAMES: Record<NtlmMessageType, string> = {
  [NtlmMessageType.Negotiate]: 'Negotiation',
  [NtlmMessageType.Challenge]: 'Challenge',
  [NtlmMessageType.Authenticate]: 'Authentication',
  [NtlmMessageType.Unknown]: 'Unknown',
};

/**
 * Classify a raw message type value. Null (type field cut off by end of buffer)
 * and any value other than 1, 2 or 3 map to Unknown.
 */
export function classifyMessageType(raw: number | null): NtlmMessageType {
  switch (raw) {
    case 1:
      return NtlmMessageType.Negotiate;
    case 2:
      return NtlmMessageType.Challenge;
    case 3:
      return NtlmMessageType.Authenticate;
    default:
      return NtlmMessageType.Unknown;
  }
}

export function messageTypeName(type: NtlmMessageType): string {
  return MESSAGE_TYPE_NAMES[type];
}
