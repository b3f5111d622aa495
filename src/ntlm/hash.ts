/**
 * NTLMv2 hash line in the format read by offline crackers (hashcat mode 5600,
 * John's netntlmv2):
 *
 *   [DOMAIN\]USERNAME::WORKSTATION:CHALLENGE:NTPROOFSTR:NTLMV2_RESPONSE
 *
 * Binary parts are lowercase hex.
 */
import { toHex } from '../bytes/primitives.js';

export interface Ntlmv2HashParts {
  domain: string;
  username: string;
  workstation: string;
  serverChallenge: Uint8Array;
  ntProofStr: Uint8Array;
  ntlmv2Response: Uint8Array;
  /** Whether the domain segment is written. Defaults to a non-empty domain. */
  includeDomain?: boolean;
}

export function formatNtlmv2Hash(parts: Ntlmv2HashParts): string {
  const includeDomain = parts.includeDomain ?? parts.domain.length > 0;
  const account = includeDomain ? `${parts.domain}\\${parts.username}` : parts.username;
  return [
    `${account}:`,
    parts.workstation,
    toHex(parts.serverChallenge),
    toHex(parts.ntProofStr),
    toHex(parts.ntlmv2Response),
  ].join(':');
}
