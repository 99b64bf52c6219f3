// =============================================================================
// CLAIMER — Error Taxonomy
//
// Every failure of the parsing, decryption and proof-assembly path is a
// ClaimError carrying one of the codes below. Validation verdicts from
// the proof validator are returned as data and only become a
// ValidationFailure when a caller asks for an assertion.
// =============================================================================

export type ClaimErrorCode =
  | 'MissingField'
  | 'MalformedInput'
  | 'KeyLengthMismatch'
  | 'MalformedPayload'
  | 'DecryptionAuthFailure'
  | 'EncodingError'
  | 'RecipientCountMismatch'
  | 'ValidationFailure';

export interface ClaimErrorDetails {
  /** Input field the failure refers to */
  field?: string;

  /** Zero-based position in the recipient list */
  recipientIndex?: number;
}

export class ClaimError extends Error {
  readonly code: ClaimErrorCode;
  readonly field?: string;
  readonly recipientIndex?: number;

  constructor(code: ClaimErrorCode, message: string, details: ClaimErrorDetails = {}) {
    super(`${code}: ${message}`);
    this.name = 'ClaimError';
    this.code = code;
    this.field = details.field;
    this.recipientIndex = details.recipientIndex;
  }
}

export function isClaimError(err: unknown): err is ClaimError {
  return err instanceof ClaimError;
}

/** Shorthand for the most common failure: a required field is absent. */
export function missingField(field: string, context: string): ClaimError {
  return new ClaimError('MissingField', `${context} is missing required field "${field}"`, { field });
}
