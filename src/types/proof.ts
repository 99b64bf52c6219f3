// =============================================================================
// CLAIMER — Delivery Proof Types
//
// Shapes consumed by the on-chain delivery verifier. Proof points are
// Groth16 values produced by an external prover; this service guarantees
// their shape, not their validity.
// =============================================================================

export const DELIVERY_PROOF_TYPE = 'farewell-delivery-proof';
export const DELIVERY_PROOF_VERSION = 1;

/** A field element as the verifier accepts it: decimal or 0x-hex */
export type ProofScalar = string | number;

export type G1Point = [ProofScalar, ProofScalar];
export type G2Point = [[ProofScalar, ProofScalar], [ProofScalar, ProofScalar]];

/**
 * One proof per recipient.
 * publicSignals = [recipientHash, dkimKeyHash, contentHash]
 */
export interface RecipientProof {
  recipientIndex: number;
  recipientHash: string;
  pA: G1Point;
  pB: G2Point;
  pC: G1Point;
  publicSignals: ProofScalar[];
}

export interface DeliveryProofJson {
  type: typeof DELIVERY_PROOF_TYPE;
  version: typeof DELIVERY_PROOF_VERSION;
  owner: string;
  messageIndex: number;
  recipientProofs: RecipientProof[];
  metadata: {
    recipientCount: number;
    contentHash: string;
    generatedAt: string;
  };
}

// ── Prover seam ────────────────────────────────────────────────────────

export interface ProofRequest {
  contentHash: string;
  recipientHash: string;

  /** Raw text of the message as sent to this recipient */
  sentMessage: string;
}

export interface ProofPoints {
  pA: G1Point;
  pB: G2Point;
  pC: G1Point;

  /** Hash of the DKIM public key that signed the sent message */
  dkimKeyHash: string;
}

/**
 * Supplies proof points for a recipient. Real proving happens outside
 * this service; implementations wrap whatever prover is in use.
 */
export interface ProofSource {
  readonly name: string;
  prove(request: ProofRequest): ProofPoints;
}

// ── Validation ─────────────────────────────────────────────────────────

export interface ValidationVerdict {
  valid: boolean;

  /** Empty when valid; otherwise names the first failing field */
  error: string;
}
