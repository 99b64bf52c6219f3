// =============================================================================
// CLAIMER — HTTP Application
//
//   /api/claims/*   — Claim parsing and key reconstruction
//   /api/proofs/*   — Delivery proof assembly and validation
//   /api/health     — Health check
// =============================================================================

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { errorHandler, requestId, requestSanitization } from './middleware/security';
import claimRoutes from './routes/claims';
import { createProofRouter } from './routes/proofs';
import { placeholderProofSource } from './services/proofs';
import { ProofSource } from './types/proof';

export const SERVICE_NAME = 'farewell-claimer-core';
export const SERVICE_VERSION = '0.1.0';

export interface AppOptions {
  proofSource?: ProofSource;
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const proofSource = options.proofSource ?? placeholderProofSource;
  const startTime = Date.now();

  // ── Middleware ───────────────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : false,
  }));
  app.use(express.json({ limit: config.http.bodyLimit }));
  app.use(requestId());
  app.use(requestSanitization());

  const apiLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: config.http.rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      proofSource: proofSource.name,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/claims', apiLimiter, claimRoutes);
  app.use('/api/proofs', apiLimiter, createProofRouter(proofSource));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler());

  return app;
}
