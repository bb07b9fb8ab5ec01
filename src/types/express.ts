// src/types/express.ts

/**
 * Request fields added by this service's middleware.
 * Imported for its side effect by every module that reads them.
 */
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
