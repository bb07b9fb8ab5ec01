// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Malformed or oversized JSON bodies -> 400 / 413
 * - Store unreachable -> 503 (transient, client may retry)
 * - Stored document unreadable -> 500 with its own code
 * - Anything else -> 500
 * Always returns the standard error envelope with the correlationId.
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';

import {
  StoredDocumentCorruptedError,
  StoreUnavailableError,
} from '../../plans/domain/PlanStoreErrors';
import { logger } from '../../shared/logging/Logger';
import '../../types/express';

/**
 * Errors raised by express.json() carry a `type` such as "entity.parse.failed".
 */
type BodyParserError = Error & { type: string };

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && 'type' in err && typeof err.type === 'string';
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isBodyParserError(err) && err.type === 'entity.parse.failed') {
    logger.debug({ correlationId: req.correlationId }, 'Malformed JSON body');

    res.status(400).json(
      buildErrorEnvelope({
        code: 'MALFORMED_JSON',
        message: 'Request body is not valid JSON.',
        correlationId: req.correlationId,
      }),
    );
    return;
  }

  if (isBodyParserError(err) && err.type === 'entity.too.large') {
    res.status(413).json(
      buildErrorEnvelope({
        code: 'PAYLOAD_TOO_LARGE',
        message: 'Request body exceeds the configured limit.',
        correlationId: req.correlationId,
      }),
    );
    return;
  }

  if (err instanceof StoreUnavailableError) {
    logger.warn({ correlationId: req.correlationId, err }, 'Plan store unavailable');

    res.status(503).json(
      buildErrorEnvelope({
        code: 'STORE_UNAVAILABLE',
        message: 'Plan store is temporarily unavailable.',
        correlationId: req.correlationId,
      }),
    );
    return;
  }

  if (err instanceof StoredDocumentCorruptedError) {
    logger.error(
      { correlationId: req.correlationId, planId: err.planId, err },
      'Stored plan document is corrupted',
    );

    res.status(500).json(
      buildErrorEnvelope({
        code: 'STORED_DOCUMENT_CORRUPTED',
        message: 'Stored plan could not be read.',
        correlationId: req.correlationId,
      }),
    );
    return;
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}
