// =============================================================================
// CLAIMER — Delivery Proof Assembler
//
// Builds one RecipientProof per recipient, then wraps them with the owner
// and message index into the envelope the on-chain verifier consumes.
//
// Proof points come from a ProofSource. The default source emits zero
// points and a zero DKIM key hash: Groth16 proving runs outside this
// service, and the assembler only guarantees shape and ordering.
//
// publicSignals layout (fixed by the delivery circuit):
//   [0] recipient commitment
//   [1] DKIM public key hash
//   [2] content hash
// =============================================================================

import { ClaimError } from '../../errors';
import { MessageData } from '../../types/claim';
import {
  DELIVERY_PROOF_TYPE,
  DELIVERY_PROOF_VERSION,
  DeliveryProofJson,
  ProofPoints,
  ProofSource,
  RecipientProof,
} from '../../types/proof';
import { isValidAddress } from '../claims/address';
import { withHexPrefix } from '../crypto/hex';
import { computeRecipientCommitment, normalizeAddress } from './commitment';
import { assertValidDeliveryProof } from './validator';

const ZERO_HASH = `0x${'0'.repeat(64)}`;

export const placeholderProofSource: ProofSource = {
  name: 'placeholder',
  prove(): ProofPoints {
    return {
      pA: ['0x0', '0x0'],
      pB: [['0x0', '0x0'], ['0x0', '0x0']],
      pC: ['0x0', '0x0'],
      dkimKeyHash: ZERO_HASH,
    };
  },
};

export interface RecipientProofInput {
  contentHash: string;
  recipient: string;
  sentMessage: string;
  recipientIndex?: number;
}

/**
 * Produce the proof record for one recipient.
 *
 * @throws ClaimError(MalformedInput) for a bad address,
 *         ClaimError(MissingField) for empty sent-message text
 */
export function generateRecipientProof(
  input: RecipientProofInput,
  source: ProofSource = placeholderProofSource
): RecipientProof {
  const recipientIndex = input.recipientIndex ?? 0;

  if (!isValidAddress(normalizeAddress(input.recipient))) {
    throw new ClaimError('MalformedInput', `recipient "${input.recipient}" is not a valid email address`, {
      field: 'recipient',
      recipientIndex,
    });
  }
  if (input.sentMessage === '') {
    throw new ClaimError('MissingField', `sent message text for recipient ${recipientIndex} is empty`, {
      field: 'sentMessage',
      recipientIndex,
    });
  }

  const contentHash = withHexPrefix(input.contentHash);
  const recipientHash = computeRecipientCommitment(input.recipient);
  const { pA, pB, pC, dkimKeyHash } = source.prove({
    contentHash,
    recipientHash,
    sentMessage: input.sentMessage,
  });

  return {
    recipientIndex,
    recipientHash,
    pA,
    pB,
    pC,
    publicSignals: [recipientHash, dkimKeyHash, contentHash],
  };
}

export interface EnvelopeInput {
  owner: string;
  messageIndex: number;
  recipientProofs: RecipientProof[];

  /** Recipient list of the source message, in order */
  expectedRecipients: string[];
  contentHash: string;
}

/**
 * Wrap per-recipient proofs into a delivery proof envelope.
 *
 * @throws ClaimError — RecipientCountMismatch when the proof count differs
 *         from the recipient count; MalformedInput for a bad owner or index,
 *         an out-of-order proof or a duplicate recipient
 */
export function buildDeliveryProof(input: EnvelopeInput): DeliveryProofJson {
  const { owner, messageIndex, recipientProofs, expectedRecipients } = input;

  if (owner.trim() === '') {
    throw new ClaimError('MalformedInput', 'owner must be a non-empty address', { field: 'owner' });
  }
  if (!Number.isInteger(messageIndex) || messageIndex < 0) {
    throw new ClaimError('MalformedInput', `messageIndex must be a non-negative integer, got ${messageIndex}`, {
      field: 'messageIndex',
    });
  }
  if (recipientProofs.length !== expectedRecipients.length) {
    throw new ClaimError(
      'RecipientCountMismatch',
      `${recipientProofs.length} recipient proofs for ${expectedRecipients.length} recipients`,
      { field: 'recipientProofs' }
    );
  }

  const seen = new Map<string, number>();
  const ordered: RecipientProof[] = [];

  expectedRecipients.forEach((recipient, index) => {
    const proof = recipientProofs[index];
    const expectedHash = computeRecipientCommitment(recipient);

    if (proof.recipientHash !== expectedHash) {
      throw new ClaimError(
        'MalformedInput',
        `recipientProofs[${index}] does not commit to recipient ${index} (${recipient})`,
        { field: 'recipientProofs', recipientIndex: index }
      );
    }
    const first = seen.get(expectedHash);
    if (first !== undefined) {
      throw new ClaimError(
        'MalformedInput',
        `recipient ${index} (${recipient}) duplicates recipient ${first}`,
        { field: 'recipients', recipientIndex: index }
      );
    }
    seen.set(expectedHash, index);

    ordered.push({ ...proof, recipientIndex: index });
  });

  return {
    type: DELIVERY_PROOF_TYPE,
    version: DELIVERY_PROOF_VERSION,
    owner,
    messageIndex,
    recipientProofs: ordered,
    metadata: {
      recipientCount: ordered.length,
      contentHash: withHexPrefix(input.contentHash),
      generatedAt: new Date().toISOString(),
    },
  };
}

export interface AssembleOptions {
  owner: string;
  messageIndex: number;

  /** Raw sent-message text, one per recipient in MessageData order */
  sentMessages: string[];
}

/**
 * Build the full delivery proof for a parsed message.
 * The result has passed validateDeliveryProof.
 */
export function assembleDeliveryProof(
  message: MessageData,
  options: AssembleOptions,
  source: ProofSource = placeholderProofSource
): DeliveryProofJson {
  if (options.sentMessages.length !== message.recipients.length) {
    throw new ClaimError(
      'RecipientCountMismatch',
      `${options.sentMessages.length} sent messages for ${message.recipients.length} recipients`,
      { field: 'sentMessages' }
    );
  }

  const recipientProofs = message.recipients.map((recipient, recipientIndex) =>
    generateRecipientProof(
      {
        contentHash: message.contentHash,
        recipient,
        sentMessage: options.sentMessages[recipientIndex],
        recipientIndex,
      },
      source
    )
  );

  const envelope = buildDeliveryProof({
    owner: options.owner,
    messageIndex: options.messageIndex,
    recipientProofs,
    expectedRecipients: message.recipients,
    contentHash: message.contentHash,
  });

  assertValidDeliveryProof(envelope);
  return envelope;
}
