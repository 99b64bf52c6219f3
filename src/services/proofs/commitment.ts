// =============================================================================
// CLAIMER — Recipient Commitment
//
// recipientHash = keccak256(utf8(lowercase(trim(address))))
//
// This must stay byte-for-byte identical to the commitment the on-chain
// verifier stores for each recipient.
// =============================================================================

import { keccak256, toUtf8Bytes } from 'ethers';

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

/**
 * Commitment hash for a recipient address, as 0x + 64 hex digits.
 * Addresses differing only in case or surrounding whitespace commit
 * to the same value.
 */
export function computeRecipientCommitment(address: string): string {
  return keccak256(toUtf8Bytes(normalizeAddress(address)));
}
