// src/plans/infrastructure/LoggingPlanChangeNotifier.ts

import type { IPlanChangeNotifier, PlanChangeEvent } from '../domain/PlanChangeNotifier';
import type { AppLogger } from '../../shared/logging/Logger';

/**
 * Publishes plan change events to the structured log.
 * Stands in where no message broker is wired; the document body is not logged.
 */
export class LoggingPlanChangeNotifier implements IPlanChangeNotifier {
  public constructor(private readonly log: AppLogger) {}

  public async notify(event: PlanChangeEvent): Promise<void> {
    this.log.info(
      { objectId: event.objectId, op: event.op, etag: event.etag },
      'Plan change published',
    );
  }
}
