// src/http/middleware/notFound.ts

import type { Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';
import '../../types/express';

export function notFound(req: Request, res: Response): void {
  res.status(404).json(
    buildErrorEnvelope({
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      correlationId: req.correlationId,
    }),
  );
}
