// =============================================================================
// CLAIMER — Claim Input Types
//
// Two input shapes are accepted: a claim package exported from the chain
// (tagged by its "type" marker) and a direct message (untagged, from older
// exports). Both normalize into MessageData.
// =============================================================================

export const CLAIM_PACKAGE_TYPE = 'farewell-claim-package';

// ── Inputs ─────────────────────────────────────────────────────────────

/**
 * On-chain message claim. The body is encrypted under
 * key = skShare XOR s', where s' travels out of band.
 */
export interface ClaimPackage {
  kind: 'claim-package';
  recipients: string[];
  contentHash: string;

  /** On-chain key share (hex, 16 bytes) */
  skShare?: string;

  /** nonce ‖ ciphertext ‖ tag (hex) */
  encryptedPayload?: string;

  subject?: string;

  /** Message owner, when the export carries it */
  owner?: string;
  messageIndex?: number;
}

export interface DirectMessage {
  kind: 'direct';
  recipients: string[];
  contentHash: string;
  message: string;
  subject?: string;
}

export type ClaimInput = ClaimPackage | DirectMessage;

// ── Normalized output ──────────────────────────────────────────────────

/**
 * Where the body came from:
 *   direct    — plaintext supplied in the input
 *   decrypted — recovered locally with the off-chain secret
 *   deferred  — no secret given; body points to the external decrypter
 */
export type MessageSource = 'direct' | 'decrypted' | 'deferred';

export interface MessageData {
  recipients: string[];
  contentHash: string;
  body: string;
  subject: string;
  source: MessageSource;
  owner?: string;
  messageIndex?: number;
}

export interface ParseOptions {
  /** Off-chain secret s' (hex). Enables local decryption when present. */
  secret?: string;

  /** Link shown in the placeholder body when decryption is deferred */
  decrypterUrl: string;
}
