// =============================================================================
// CLAIMER — Key Share Reconstruction
//
// The message key is split into an on-chain share (skShare) and an
// off-chain secret (s') known only to sender and recipient:
//
//   skShare = key XOR s'        key = skShare XOR s'
//
// Both halves are exactly one AES-128 key long. Anything else means the
// key cannot be derived and is reported as KeyLengthMismatch.
// =============================================================================

import { ClaimError } from '../../errors';
import { decodeHex } from './hex';

/** AES-128-GCM key length in bytes */
export const KEY_LENGTH = 16;

function decodeKeyPart(value: string, field: string): Buffer {
  const bytes = decodeHex(value);
  if (!bytes) {
    throw new ClaimError('KeyLengthMismatch', `${field} is not a valid hex string`, { field });
  }
  return bytes;
}

function xorEqualLength(a: Buffer, aField: string, b: Buffer, bField: string): Buffer {
  if (a.length !== b.length) {
    throw new ClaimError(
      'KeyLengthMismatch',
      `${aField} is ${a.length} bytes but ${bField} is ${b.length} bytes`,
      { field: bField }
    );
  }
  if (a.length !== KEY_LENGTH) {
    throw new ClaimError(
      'KeyLengthMismatch',
      `${aField} and ${bField} must be ${KEY_LENGTH} bytes, got ${a.length}`,
      { field: aField }
    );
  }

  const out = Buffer.alloc(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] ^ b[i];
  }
  return out;
}

/**
 * Reconstruct the message key from the on-chain share and the
 * off-chain secret.
 *
 * @param skShare — hex-encoded on-chain key share
 * @param secret — hex-encoded off-chain secret (s')
 * @returns the 16-byte AES-128 key
 * @throws ClaimError(KeyLengthMismatch) on bad hex or mismatched lengths
 */
export function reconstructKey(skShare: string, secret: string): Buffer {
  const share = decodeKeyPart(skShare, 'skShare');
  const offChain = decodeKeyPart(secret, 'secret');
  return xorEqualLength(share, 'skShare', offChain, 'secret');
}

/**
 * Sender-side inverse of reconstructKey: the share to publish on chain
 * for a given key and secret.
 */
export function deriveKeyShare(key: Buffer, secret: string): Buffer {
  const offChain = decodeKeyPart(secret, 'secret');
  return xorEqualLength(key, 'key', offChain, 'secret');
}
