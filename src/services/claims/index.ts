// =============================================================================
// CLAIMER — Claim Services
// =============================================================================

export {
  parseClaimInput,
  parseClaimJson,
  readRecipients,
  readContentHash,
  deferredBody,
} from './parser';
export * from './fields';
