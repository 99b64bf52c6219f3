// =============================================================================
// CLAIMER — Claim Routes
//
// Mounted at /api/claims.
//
// Routes:
//   POST  /parse            — Claim package or direct message → MessageData
//   POST  /reconstruct-key  — skShare XOR secret → key
// =============================================================================

import { NextFunction, Request, Response, Router } from 'express';
import { config } from '../config';
import { isClaimError, missingField } from '../errors';
import { sendClaimError } from '../middleware/security';
import { optionalString, parseClaimInput, requiredString, requireObject } from '../services/claims';
import { encodeHex, reconstructKey } from '../services/crypto';

const router = Router();

/**
 * POST /claims/parse
 * Body: { input: <claim package | direct message>, secret?: hex }
 *
 * With a secret the claim package is decrypted here; without one the
 * body is the placeholder pointing at the external decrypter.
 */
router.post('/parse', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = requireObject(req.body, 'request body');
    if (body.input === undefined || body.input === null) throw missingField('input', 'request body');
    const secret = optionalString(body, 'secret');

    const message = parseClaimInput(body.input, {
      secret,
      decrypterUrl: config.claims.decrypterUrl,
    });

    console.log(
      `[Claims] Parsed ${message.source} message for ${message.recipients.length} recipient(s) ` +
      `(${req.requestId})`
    );
    res.json(message);
  } catch (err: unknown) {
    if (!isClaimError(err)) return next(err);
    console.warn(`[Claims] Parse rejected (${req.requestId}): ${err.code}`);
    sendClaimError(req, res, err);
  }
});

/**
 * POST /claims/reconstruct-key
 * Body: { skShare: hex, secret: hex }
 */
router.post('/reconstruct-key', (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = requireObject(req.body, 'request body');
    const key = reconstructKey(
      requiredString(body, 'skShare', 'request body'),
      requiredString(body, 'secret', 'request body')
    );

    res.json({ key: encodeHex(key), length: key.length });
  } catch (err: unknown) {
    if (!isClaimError(err)) return next(err);
    console.warn(`[Claims] Key reconstruction rejected (${req.requestId}): ${err.code}`);
    sendClaimError(req, res, err);
  }
});

export default router;
