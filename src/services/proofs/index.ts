// =============================================================================
// CLAIMER — Delivery Proof Services
// =============================================================================

export { computeRecipientCommitment, normalizeAddress } from './commitment';
export {
  generateRecipientProof,
  buildDeliveryProof,
  assembleDeliveryProof,
  placeholderProofSource,
} from './assembler';
export { validateDeliveryProof, assertValidDeliveryProof } from './validator';
