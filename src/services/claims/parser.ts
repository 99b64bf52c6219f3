// =============================================================================
// CLAIMER — Claim Input Parser
//
// Accepts either input shape and produces MessageData:
//
//   { "type": "farewell-claim-package", recipients, skShare,
//     encryptedPayload, contentHash, subject? }
//   { recipients, contentHash, message, subject? }
//
// Anything without the claim-package marker is treated as a direct
// message, so older exports keep working as the claim format evolves.
//
// Claim packages are decrypted locally only when the off-chain secret is
// supplied. Without it the body is a fixed placeholder pointing the
// recipient at the external decrypter.
// =============================================================================

import { ClaimError, missingField } from '../../errors';
import { decryptPayload } from '../crypto/encryption';
import { isHexString, withHexPrefix } from '../crypto/hex';
import { reconstructKey } from '../crypto/key-share';
import { assertRecipientList } from './address';
import {
  JsonObject,
  optionalIndex,
  optionalString,
  requiredList,
  requiredString,
  requireObject,
} from './fields';
import {
  CLAIM_PACKAGE_TYPE,
  ClaimInput,
  ClaimPackage,
  MessageData,
  ParseOptions,
} from '../../types/claim';

// ── Field readers ──────────────────────────────────────────────────────

export function readRecipients(raw: JsonObject, context: string): string[] {
  return assertRecipientList(requiredList(raw, 'recipients', context));
}

export function readContentHash(raw: JsonObject, context: string): string {
  const contentHash = requiredString(raw, 'contentHash', context);
  if (!isHexString(contentHash)) {
    throw new ClaimError('MalformedInput', `contentHash "${contentHash}" is not a hex string`, {
      field: 'contentHash',
    });
  }
  return withHexPrefix(contentHash);
}

/**
 * Discriminate the raw structure into one of the two input variants.
 */
function readClaimInput(value: unknown): ClaimInput {
  const raw = requireObject(value, 'claim input');

  if (raw.type === CLAIM_PACKAGE_TYPE) {
    const context = 'claim package';
    return {
      kind: 'claim-package',
      recipients: readRecipients(raw, context),
      contentHash: readContentHash(raw, context),
      skShare: optionalString(raw, 'skShare'),
      encryptedPayload: optionalString(raw, 'encryptedPayload'),
      subject: optionalString(raw, 'subject'),
      owner: optionalString(raw, 'owner'),
      messageIndex: optionalIndex(raw, 'messageIndex'),
    };
  }

  const context = 'direct message';
  return {
    kind: 'direct',
    recipients: readRecipients(raw, context),
    contentHash: readContentHash(raw, context),
    message: requiredString(raw, 'message', context),
    subject: optionalString(raw, 'subject'),
  };
}

// ── Normalization ──────────────────────────────────────────────────────

export function deferredBody(decrypterUrl: string): string {
  return [
    'This message was left for you encrypted on chain.',
    '',
    `To read it, open ${decrypterUrl} and provide the claim package`,
    'together with the secret the sender shared with you.',
  ].join('\n');
}

function resolveClaimPackage(pkg: ClaimPackage, options: ParseOptions): MessageData {
  const base = {
    recipients: pkg.recipients,
    contentHash: pkg.contentHash,
    subject: pkg.subject ?? '',
    ...(pkg.owner !== undefined ? { owner: pkg.owner } : {}),
    ...(pkg.messageIndex !== undefined ? { messageIndex: pkg.messageIndex } : {}),
  };

  if (options.secret === undefined) {
    return { ...base, body: deferredBody(options.decrypterUrl), source: 'deferred' };
  }

  if (pkg.skShare === undefined) throw missingField('skShare', 'claim package');
  if (pkg.encryptedPayload === undefined) throw missingField('encryptedPayload', 'claim package');

  const key = reconstructKey(pkg.skShare, options.secret);
  try {
    return { ...base, body: decryptPayload(key, pkg.encryptedPayload), source: 'decrypted' };
  } finally {
    key.fill(0);
  }
}

function assertNever(value: never): never {
  throw new ClaimError('MalformedInput', `unsupported claim input: ${JSON.stringify(value)}`);
}

/**
 * Parse a claim package or direct message into MessageData.
 *
 * @throws ClaimError — MissingField, MalformedInput, and for a claim
 *         package with a secret, any key reconstruction or decryption error
 */
export function parseClaimInput(raw: unknown, options: ParseOptions): MessageData {
  const input = readClaimInput(raw);

  switch (input.kind) {
    case 'direct':
      return {
        recipients: input.recipients,
        contentHash: input.contentHash,
        body: input.message,
        subject: input.subject ?? '',
        source: 'direct',
      };
    case 'claim-package':
      return resolveClaimPackage(input, options);
    default:
      return assertNever(input);
  }
}

/**
 * Parse raw JSON text (a claim package file's contents).
 */
export function parseClaimJson(text: string, options: ParseOptions): MessageData {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ClaimError('MalformedInput', `claim input is not valid JSON (${reason})`);
  }
  return parseClaimInput(raw, options);
}
