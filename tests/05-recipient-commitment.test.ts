// =============================================================================
// CLAIMER — Test Suite 05: Recipient Commitment
// =============================================================================

import { computeRecipientCommitment, normalizeAddress } from '../src/services/proofs';

const KECCAK_EMPTY = '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470';

describe('computeRecipientCommitment', () => {
  test('returns 0x plus 64 lowercase hex digits', () => {
    expect(computeRecipientCommitment('recipient@test.com')).toMatch(/^0x[0-9a-f]{64}$/);
  });

  test('hashes with keccak-256', () => {
    expect(computeRecipientCommitment('')).toBe(KECCAK_EMPTY);
  });

  test('is case-insensitive', () => {
    for (const address of ['a@x.com', 'Alice.Smith@Example.org', 'MiXeD+tag@Sub.Domain.io']) {
      expect(computeRecipientCommitment(address.toUpperCase())).toBe(computeRecipientCommitment(address));
    }
  });

  test('ignores surrounding whitespace', () => {
    expect(computeRecipientCommitment('Test@Example.COM  ')).toBe(computeRecipientCommitment('test@example.com'));
    expect(computeRecipientCommitment('   ')).toBe(KECCAK_EMPTY);
  });

  test('different addresses commit differently', () => {
    expect(computeRecipientCommitment('user1@test.com')).not.toBe(computeRecipientCommitment('user2@test.com'));
  });

  test('is deterministic', () => {
    expect(computeRecipientCommitment('same@test.com')).toBe(computeRecipientCommitment('same@test.com'));
  });
});

describe('normalizeAddress', () => {
  test('trims and lower-cases', () => {
    expect(normalizeAddress('  Bob@Example.COM\n')).toBe('bob@example.com');
  });
});
