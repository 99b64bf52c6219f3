// =============================================================================
// CLAIMER — Crypto Core Services
// =============================================================================

export { reconstructKey, deriveKeyShare, KEY_LENGTH } from './key-share';
export {
  decryptPayload,
  encryptPayload,
  splitPayload,
  NONCE_LENGTH,
  AUTH_TAG_LENGTH,
  MIN_PAYLOAD_LENGTH,
} from './encryption';
export { decodeHex, encodeHex, isHexString, withHexPrefix } from './hex';
