// Request fields set by the middleware in src/middleware/security.ts.

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export {};
