// =============================================================================
// CLAIMER — Application Configuration
// Loads from environment variables with defaults for development.
// =============================================================================

export const config = {
  port: parseInt(process.env.PORT || '3200', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  http: {
    bodyLimit: process.env.REQUEST_BODY_LIMIT || '1mb',
    rateLimitPerMinute: parseInt(process.env.RATE_LIMIT_API_MAX || '120', 10),
  },

  // Claim packages parsed without the off-chain secret get a placeholder
  // body pointing here.
  claims: {
    decrypterUrl: process.env.CLAIM_DECRYPTER_URL || 'http://localhost:5173/claim',
  },
} as const;
