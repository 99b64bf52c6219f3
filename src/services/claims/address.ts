// =============================================================================
// CLAIMER — Recipient Address Shape
// =============================================================================

import { ClaimError } from '../../errors';

/**
 * Minimal address shape check: contains "@" and carries no surrounding
 * whitespace. Full RFC 5322 validation belongs to the mail transport.
 */
export function isValidAddress(address: string): boolean {
  return address.includes('@') && address === address.trim();
}

/**
 * Validate a recipient list as it appears in claim input.
 * @throws ClaimError(MalformedInput) naming the offending index
 */
export function assertRecipientList(value: unknown[], field = 'recipients'): string[] {
  if (value.length === 0) {
    throw new ClaimError('MalformedInput', `${field} must contain at least one address`, { field });
  }

  return value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ClaimError('MalformedInput', `${field}[${index}] must be a string, got ${typeof entry}`, {
        field,
        recipientIndex: index,
      });
    }
    if (!isValidAddress(entry)) {
      throw new ClaimError('MalformedInput', `${field}[${index}] "${entry}" is not a valid email address`, {
        field,
        recipientIndex: index,
      });
    }
    return entry;
  });
}
