// =============================================================================
// CLAIMER — Delivery Proof Routes
//
// Mounted at /api/proofs.
//
// Routes:
//   POST  /recipient  — One RecipientProof for a sent message
//   POST  /envelope   — Full DeliveryProofJson for a parsed message
//   POST  /validate   — Structural verdict for any submitted structure
// =============================================================================

import { NextFunction, Request, Response, Router } from 'express';
import { isClaimError } from '../errors';
import { sendClaimError } from '../middleware/security';
import {
  optionalIndex,
  readContentHash,
  readRecipients,
  requiredIndex,
  requiredString,
  requiredStringList,
  requireObject,
} from '../services/claims';
import {
  assembleDeliveryProof,
  generateRecipientProof,
  placeholderProofSource,
  validateDeliveryProof,
} from '../services/proofs';
import { ProofSource } from '../types/proof';

export function createProofRouter(source: ProofSource = placeholderProofSource): Router {
  const router = Router();

  /**
   * POST /proofs/recipient
   * Body: { contentHash, recipient, sentMessage, recipientIndex? }
   */
  router.post('/recipient', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body, 'request body');
      const proof = generateRecipientProof(
        {
          contentHash: readContentHash(body, 'request body'),
          recipient: requiredString(body, 'recipient', 'request body'),
          sentMessage: requiredString(body, 'sentMessage', 'request body'),
          recipientIndex: optionalIndex(body, 'recipientIndex'),
        },
        source
      );
      res.json(proof);
    } catch (err: unknown) {
      if (!isClaimError(err)) return next(err);
      console.warn(`[Proofs] Recipient proof rejected (${req.requestId}): ${err.code}`);
      sendClaimError(req, res, err);
    }
  });

  /**
   * POST /proofs/envelope
   * Body: { message: { recipients, contentHash }, owner, messageIndex, sentMessages }
   */
  router.post('/envelope', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = requireObject(req.body, 'request body');
      const message = requireObject(body.message, 'message');

      const envelope = assembleDeliveryProof(
        {
          recipients: readRecipients(message, 'message'),
          contentHash: readContentHash(message, 'message'),
          body: '',
          subject: '',
          source: 'direct',
        },
        {
          owner: requiredString(body, 'owner', 'request body'),
          messageIndex: requiredIndex(body, 'messageIndex', 'request body'),
          sentMessages: requiredStringList(body, 'sentMessages', 'request body'),
        },
        source
      );

      console.log(
        `[Proofs] Built delivery proof for message ${envelope.messageIndex} ` +
        `(${envelope.recipientProofs.length} recipient(s), ${source.name} source, ${req.requestId})`
      );
      res.status(201).json(envelope);
    } catch (err: unknown) {
      if (!isClaimError(err)) return next(err);
      console.warn(`[Proofs] Envelope rejected (${req.requestId}): ${err.code}`);
      sendClaimError(req, res, err);
    }
  });

  /**
   * POST /proofs/validate
   * Body: any structure claiming to be a DeliveryProofJson.
   * Always 200: the verdict is the result.
   */
  router.post('/validate', (req: Request, res: Response) => {
    const verdict = validateDeliveryProof(req.body);
    if (!verdict.valid) {
      console.log(`[Proofs] Validation failed (${req.requestId}): ${verdict.error}`);
    }
    res.json(verdict);
  });

  return router;
}
