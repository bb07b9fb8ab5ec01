// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Purpose:
 * - Ensure every request has a correlationId for cross-service tracing.
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via module augmentation)
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import '../../types/express';

const MAX_CORRELATION_ID_LENGTH = 128;

function readCorrelationIdHeader(req: Request): string | undefined {
  const headerId = req.header('x-correlation-id')?.trim();
  if (!headerId || headerId.length > MAX_CORRELATION_ID_LENGTH) return undefined;
  return headerId;
}

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = readCorrelationIdHeader(req) ?? randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}
