// =============================================================================
// CLAIMER — Hex Encoding Helpers
//
// Claim packages carry every binary value as a hex string, with or without
// a leading "0x". Buffer.from(..., 'hex') silently stops at the first bad
// digit, so input is matched against a strict pattern first.
// =============================================================================

const BYTE_HEX_PATTERN = /^(0x)?(?:[0-9a-fA-F]{2})*$/;
const HEX_DIGITS_PATTERN = /^(0x)?[0-9a-fA-F]+$/;

/**
 * Decode a hex string into bytes.
 * Returns null when the value is not an even-length run of hex digits.
 */
export function decodeHex(value: string): Buffer | null {
  if (!BYTE_HEX_PATTERN.test(value)) return null;
  const digits = value.startsWith('0x') ? value.slice(2) : value;
  return Buffer.from(digits, 'hex');
}

/** Encode bytes as a lowercase, 0x-prefixed hex string. */
export function encodeHex(bytes: Uint8Array): string {
  return `0x${Buffer.from(bytes).toString('hex')}`;
}

/**
 * Add the 0x prefix to a hex string that lacks one. Bare digit runs such
 * as "1234" would otherwise read as decimal wherever values are numeric.
 */
export function withHexPrefix(value: string): string {
  return value.startsWith('0x') ? value : `0x${value}`;
}

/** True for a non-empty run of hex digits, optionally 0x-prefixed. */
export function isHexString(value: string): boolean {
  return HEX_DIGITS_PATTERN.test(value);
}
