// =============================================================================
// CLAIMER — AES-128-GCM Payload Encryption
//
// Encrypted claim payloads are a single hex string:
//
//   nonce (12 bytes) ‖ ciphertext (N bytes) ‖ auth tag (16 bytes)
//
// No additional authenticated data is bound. Decryption verifies the GCM
// tag before any plaintext is released; a failed check never yields a
// partial result.
// =============================================================================

import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { TextDecoder } from 'util';
import { ClaimError } from '../../errors';
import { decodeHex, encodeHex } from './hex';
import { KEY_LENGTH } from './key-share';

const ALGORITHM = 'aes-128-gcm';
export const NONCE_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;
export const MIN_PAYLOAD_LENGTH = NONCE_LENGTH + AUTH_TAG_LENGTH;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Byte ranges of a decoded payload */
export interface PayloadParts {
  nonce: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

function assertKey(key: Buffer): void {
  if (key.length !== KEY_LENGTH) {
    throw new ClaimError(
      'KeyLengthMismatch',
      `AES-128-GCM requires a ${KEY_LENGTH}-byte key, got ${key.length}`,
      { field: 'key' }
    );
  }
}

/**
 * Split an encoded payload into nonce, ciphertext and tag.
 * @throws ClaimError(MalformedPayload) on bad hex or a payload too short
 *         to hold a nonce and a tag
 */
export function splitPayload(encryptedPayload: string): PayloadParts {
  const bytes = decodeHex(encryptedPayload);
  if (!bytes) {
    throw new ClaimError('MalformedPayload', 'encryptedPayload is not a valid hex string', {
      field: 'encryptedPayload',
    });
  }
  if (bytes.length < MIN_PAYLOAD_LENGTH) {
    throw new ClaimError(
      'MalformedPayload',
      `encryptedPayload is ${bytes.length} bytes; at least ${MIN_PAYLOAD_LENGTH} ` +
      `(${NONCE_LENGTH}-byte nonce + ${AUTH_TAG_LENGTH}-byte tag) are required`,
      { field: 'encryptedPayload' }
    );
  }

  return {
    nonce: bytes.subarray(0, NONCE_LENGTH),
    ciphertext: bytes.subarray(NONCE_LENGTH, bytes.length - AUTH_TAG_LENGTH),
    authTag: bytes.subarray(bytes.length - AUTH_TAG_LENGTH),
  };
}

/**
 * Decrypt and authenticate an encoded claim payload.
 *
 * @param key — 16-byte key from reconstructKey
 * @param encryptedPayload — hex nonce ‖ ciphertext ‖ tag
 * @returns the UTF-8 plaintext
 * @throws ClaimError — MalformedPayload, DecryptionAuthFailure or EncodingError
 */
export function decryptPayload(key: Buffer, encryptedPayload: string): string {
  assertKey(key);
  const { nonce, ciphertext, authTag } = splitPayload(encryptedPayload);

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  let plaintext: Buffer;
  try {
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ClaimError(
      'DecryptionAuthFailure',
      `GCM tag check failed (${reason}): wrong key or secret, or the nonce, ` +
      `ciphertext or tag has been altered`,
      { field: 'encryptedPayload' }
    );
  }

  try {
    return utf8.decode(plaintext);
  } catch {
    throw new ClaimError(
      'EncodingError',
      `decrypted payload (${plaintext.length} bytes) is not valid UTF-8 text`,
      { field: 'encryptedPayload' }
    );
  }
}

/**
 * Encrypt a message into the claim payload layout.
 * A fresh random nonce is used unless one is given.
 */
export function encryptPayload(key: Buffer, plaintext: string, nonce: Buffer = randomBytes(NONCE_LENGTH)): string {
  assertKey(key);
  if (nonce.length !== NONCE_LENGTH) {
    throw new ClaimError('MalformedInput', `nonce must be ${NONCE_LENGTH} bytes, got ${nonce.length}`, {
      field: 'nonce',
    });
  }

  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);

  return encodeHex(Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]));
}
