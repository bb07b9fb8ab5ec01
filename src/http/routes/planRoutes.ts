// src/http/routes/planRoutes.ts

/**
 * /v1/plans routes
 *
 * Keep the HTTP boundary thin: translate conditional headers into client tags,
 * call the plan service, map each typed outcome to a status code.
 * Store faults are thrown by the service and reach the global error handler.
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';

import type {
  DeleteOutcome,
  GetOutcome,
  PatchOutcome,
  PutOutcome,
} from '../../plans/domain/PlanOutcomes';
import type { ClientTags } from '../../plans/application/PlanService';
import { buildErrorEnvelope } from '../errors/errorEnvelope';
import { formatETag, parseETagHeader } from '../etagHeaders';
import '../../types/express';

export interface PlanStorePort {
  create(document: unknown): Promise<PutOutcome>;
  get(planId: string, clientTags?: ClientTags): Promise<GetOutcome>;
  patch(planId: string, patchDocument: unknown, clientTags?: ClientTags): Promise<PatchOutcome>;
  delete(planId: string): Promise<DeleteOutcome>;
}

export function createPlanRoutes(plans: PlanStorePort): Router {
  const router = Router();

  /**
   * POST /v1/plans
   * Create-or-replace keyed by the body's objectId.
   * 201 when written, 200 when the stored bytes were already identical.
   */
  router.post('/v1/plans', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await plans.create(req.body);

      if (outcome.kind === 'validation_failed') {
        sendValidationError(req, res, outcome.issues);
        return;
      }

      res
        .status(outcome.kind === 'created' ? 201 : 200)
        .set('ETag', formatETag(outcome.etag))
        .json({ status: outcome.kind, objectId: outcome.planId, etag: outcome.etag });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /v1/plans/:id
   * Honors If-None-Match with 304 and no body.
   */
  router.get('/v1/plans/:id', async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const outcome = await plans.get(req.params.id, parseETagHeader(req.header('if-none-match')));

      switch (outcome.kind) {
        case 'not_found':
          sendPlanNotFound(req, res);
          return;
        case 'not_modified':
          res.status(304).set('ETag', formatETag(outcome.etag)).end();
          return;
        case 'found':
          res.status(200).set('ETag', formatETag(outcome.etag)).json(outcome.plan);
          return;
      }
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /v1/plans/:id
   * Merge-patch guarded by a mandatory If-Match.
   */
  router.patch('/v1/plans/:id', async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const outcome = await plans.patch(
        req.params.id,
        req.body,
        parseETagHeader(req.header('if-match')),
      );

      switch (outcome.kind) {
        case 'precondition_required':
          res.status(428).json(
            buildErrorEnvelope({
              code: 'PRECONDITION_REQUIRED',
              message: 'If-Match header is required to patch a plan.',
              correlationId: req.correlationId,
            }),
          );
          return;
        case 'not_found':
          sendPlanNotFound(req, res);
          return;
        case 'precondition_failed':
          res.status(412).json(
            buildErrorEnvelope({
              code: 'PRECONDITION_FAILED',
              message: 'Plan has changed since it was read; fetch it again and retry.',
              correlationId: req.correlationId,
            }),
          );
          return;
        case 'validation_failed':
          sendValidationError(req, res, outcome.issues);
          return;
        case 'updated':
        case 'unchanged':
          res.status(200).set('ETag', formatETag(outcome.etag)).json(outcome.plan);
          return;
      }
    } catch (err) {
      next(err);
    }
  });

  /**
   * DELETE /v1/plans/:id
   * Unconditional.
   */
  router.delete('/v1/plans/:id', async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const outcome = await plans.delete(req.params.id);

      if (outcome.kind === 'not_found') {
        sendPlanNotFound(req, res);
        return;
      }

      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function sendValidationError(req: Request, res: Response, issues: string[]): void {
  res.status(400).json(
    buildErrorEnvelope({
      code: 'VALIDATION_ERROR',
      message: 'Plan failed schema validation',
      correlationId: req.correlationId,
      issues,
    }),
  );
}

function sendPlanNotFound(req: Request, res: Response): void {
  res.status(404).json(
    buildErrorEnvelope({
      code: 'PLAN_NOT_FOUND',
      message: `Plan ${req.params.id} not found`,
      correlationId: req.correlationId,
    }),
  );
}
