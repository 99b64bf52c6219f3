// =============================================================================
// CLAIMER — Request Hardening & Error Middleware
//
// Covers:
//   - Request IDs for tracing
//   - Null-byte stripping of JSON bodies
//   - Error handling (ClaimError → 4xx, no stack traces in production)
// =============================================================================

import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ClaimError, isClaimError } from '../errors';
import '../types/express';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `claim-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

function stripNullBytes(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(stripNullBytes);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, stripNullBytes(inner)])
    );
  }
  return value;
}

/**
 * Strip null bytes from every string in a JSON body.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = stripNullBytes(req.body);
    }
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * HTTP status for a taxonomy error. Authentication and validation
 * failures concern well-formed requests whose content is rejected.
 */
export function statusForClaimError(err: ClaimError): number {
  switch (err.code) {
    case 'DecryptionAuthFailure':
    case 'ValidationFailure':
      return 422;
    default:
      return 400;
  }
}

export function sendClaimError(req: Request, res: Response, err: ClaimError): void {
  res.status(statusForClaimError(err)).json({
    error: err.message,
    code: err.code,
    ...(err.field !== undefined ? { field: err.field } : {}),
    ...(err.recipientIndex !== undefined ? { recipientIndex: err.recipientIndex } : {}),
    requestId: req.requestId,
  });
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isClaimError(err)) {
      sendClaimError(req, res, err);
      return;
    }

    if (isBodyParseError(err)) {
      sendClaimError(req, res, new ClaimError('MalformedInput', 'request body is not valid JSON'));
      return;
    }

    const isProd = process.env.NODE_ENV === 'production';
    const error = err instanceof Error ? err : new Error(String(err));

    console.error(`[ERROR] ${error.message}`, isProd ? '' : error.stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
      requestId: req.requestId,
      ...(isProd ? {} : { stack: error.stack }),
    });
  };
}
