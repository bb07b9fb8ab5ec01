/**
 * Express application setup for the plan store.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation id, JSON parsing, request logging).
 * - Exposes liveness and readiness endpoints.
 * - Mounts the /v1/plans routes when a plan store is supplied.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';
import { correlationIdMiddleware } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { buildErrorEnvelope } from './http/errors/errorEnvelope';
import { createPlanRoutes, type PlanStorePort } from './http/routes/planRoutes';
import './types/express';

export type AppDeps = {
  plans: PlanStorePort;

  /**
   * Resolves when the backing store answers; rejects otherwise.
   */
  readiness: () => Promise<void>;
};

export function createApp(deps: Partial<AppDeps> = {}): Application {
  const app = express();

  // Version tags are computed from plan content; Express must not add its own.
  app.set('etag', false);

  app.use(correlationIdMiddleware);

  // Parse JSON bodies, including application/merge-patch+json
  app.use(
    express.json({
      limit: config.jsonBodyLimit,
      type: ['application/json', 'application/*+json'],
    }),
  );

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: req.correlationId },
      'Incoming request',
    );
    next();
  });

  // Liveness: the process is up
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness: the plan store answers
  app.get('/health/ready', async (req: Request, res: Response) => {
    try {
      await (deps.readiness ?? (async () => undefined))();
      res.status(200).json({ status: 'ready' });
    } catch (err) {
      logger.warn({ correlationId: req.correlationId, err }, 'Readiness check failed');
      res.status(503).json(
        buildErrorEnvelope({
          code: 'STORE_UNAVAILABLE',
          message: 'Plan store is not reachable.',
          correlationId: req.correlationId,
        }),
      );
    }
  });

  if (deps.plans) {
    app.use(createPlanRoutes(deps.plans));
  }

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
