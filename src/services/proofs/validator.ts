// =============================================================================
// CLAIMER — Delivery Proof Validator
//
// Structural check of a delivery proof before it is submitted. Runs on
// untrusted JSON, so a bad structure is an expected outcome reported as a
// verdict, never an exception. Checks short-circuit on the first failure:
//
//   1. envelope fields  (type, version, owner, messageIndex, recipientProofs)
//   2. per recipient    (recipientIndex, recipientHash, pA, pB, pC, publicSignals)
//   3. duplicate recipients
//
// Element values are checked for type only (number or numeric string),
// not for field membership. publicSignals needs at least the three
// entries the delivery circuit reads.
// =============================================================================

import { ClaimError } from '../../errors';
import {
  DELIVERY_PROOF_TYPE,
  DELIVERY_PROOF_VERSION,
  ValidationVerdict,
} from '../../types/proof';
import { isObject } from '../claims/fields';

const NUMERIC_STRING = /^(0x[0-9a-fA-F]+|[0-9]+)$/;

/** recipientHash, DKIM key hash, content hash */
const MIN_PUBLIC_SIGNALS = 3;

function isScalar(value: unknown): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') return NUMERIC_STRING.test(value);
  return false;
}

/**
 * Returns a diagnostic, or null when the vector holds only scalars and has
 * exactly `length` of them (or, without a length, at least `minLength`).
 */
function checkVector(value: unknown, path: string, length?: number, minLength = 1): string | null {
  if (value === undefined) return `${path}: missing`;
  if (!Array.isArray(value)) return `${path}: must be a list`;
  if (length !== undefined && value.length !== length) {
    return `${path}: expected ${length} elements, got ${value.length}`;
  }
  if (length === undefined) {
    if (value.length === 0) return `${path}: must be a non-empty list`;
    if (value.length < minLength) return `${path}: expected at least ${minLength} elements, got ${value.length}`;
  }

  const bad = value.findIndex(el => !isScalar(el));
  return bad === -1 ? null : `${path}[${bad}]: must be a number or numeric string`;
}

function checkMatrix(value: unknown, path: string): string | null {
  if (value === undefined) return `${path}: missing`;
  if (!Array.isArray(value)) return `${path}: must be a list`;
  if (value.length !== 2) return `${path}: expected 2 rows, got ${value.length}`;

  for (let row = 0; row < value.length; row++) {
    const err = checkVector(value[row], `${path}[${row}]`, 2);
    if (err) return err;
  }
  return null;
}

function checkRecipientProof(entry: unknown, index: number): string | null {
  const path = `recipientProofs[${index}]`;
  if (!isObject(entry)) return `${path}: must be an object`;

  if (entry.recipientIndex !== undefined && entry.recipientIndex !== index) {
    return `${path}.recipientIndex: expected ${index}, got ${JSON.stringify(entry.recipientIndex)}`;
  }
  if (entry.recipientHash === undefined) return `${path}.recipientHash: missing`;
  if (typeof entry.recipientHash !== 'string' || entry.recipientHash === '') {
    return `${path}.recipientHash: must be a non-empty string`;
  }

  return (
    checkVector(entry.pA, `${path}.pA`, 2) ??
    checkMatrix(entry.pB, `${path}.pB`) ??
    checkVector(entry.pC, `${path}.pC`, 2) ??
    checkVector(entry.publicSignals, `${path}.publicSignals`, undefined, MIN_PUBLIC_SIGNALS)
  );
}

function findFirstError(input: unknown): string | null {
  if (!isObject(input)) return 'delivery proof: must be a JSON object';

  if (input.type !== undefined && input.type !== DELIVERY_PROOF_TYPE) {
    return `type: expected "${DELIVERY_PROOF_TYPE}", got ${JSON.stringify(input.type)}`;
  }
  if (input.version !== undefined && input.version !== DELIVERY_PROOF_VERSION) {
    return `version: expected ${DELIVERY_PROOF_VERSION}, got ${JSON.stringify(input.version)}`;
  }

  if (input.owner === undefined) return 'owner: missing';
  if (typeof input.owner !== 'string' || input.owner === '') return 'owner: must be a non-empty string';

  const { messageIndex } = input;
  if (messageIndex === undefined) return 'messageIndex: missing';
  if (typeof messageIndex !== 'number' || !Number.isInteger(messageIndex) || messageIndex < 0) {
    return 'messageIndex: must be a non-negative integer';
  }

  const proofs = input.recipientProofs;
  if (proofs === undefined) return 'recipientProofs: missing';
  if (!Array.isArray(proofs) || proofs.length === 0) return 'recipientProofs: must be a non-empty list';

  const hashes: string[] = [];
  for (let i = 0; i < proofs.length; i++) {
    const entry: unknown = proofs[i];
    const err = checkRecipientProof(entry, i);
    if (err) return err;
    if (isObject(entry)) hashes.push(String(entry.recipientHash).toLowerCase());
  }

  const seen = new Map<string, number>();
  for (let i = 0; i < hashes.length; i++) {
    const hash = hashes[i];
    const first = seen.get(hash);
    if (first !== undefined) {
      return `recipientProofs[${i}].recipientHash: duplicate of recipientProofs[${first}]`;
    }
    seen.set(hash, i);
  }

  return null;
}

/**
 * Validate a structure claiming to be a DeliveryProofJson.
 * Returns { valid: true, error: '' } or the first diagnostic.
 */
export function validateDeliveryProof(input: unknown): ValidationVerdict {
  const error = findFirstError(input);
  return error === null ? { valid: true, error: '' } : { valid: false, error };
}

/**
 * Throwing form of validateDeliveryProof.
 * @throws ClaimError(ValidationFailure) with the validator's diagnostic
 */
export function assertValidDeliveryProof(input: unknown): void {
  const verdict = validateDeliveryProof(input);
  if (!verdict.valid) {
    throw new ClaimError('ValidationFailure', verdict.error);
  }
}
