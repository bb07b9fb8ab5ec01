// src/bootstrap/buildDeps.ts

/**
 * Composition root
 * ----------------
 * The only place that wires infrastructure and application services.
 *
 * - The schema is loaded and compiled once here; a bad schema aborts start-up.
 * - One Redis connection is shared by the plan store and the readiness probe.
 * - app.ts depends on ports, never on Redis directly, so tests build the app
 *   without opening a connection.
 */

import { config } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';
import { disconnectRedis } from '../shared/redis/RedisClient';

import { PlanService } from '../plans/application/PlanService';
import { SchemaValidator } from '../plans/application/SchemaValidator';
import { LoggingPlanChangeNotifier } from '../plans/infrastructure/LoggingPlanChangeNotifier';
import { RedisPlanStore } from '../plans/infrastructure/RedisPlanStore';

import type { AppDeps } from '../app';

export type RuntimeDeps = AppDeps & {
  /**
   * Called during graceful shutdown to release the Redis connection.
   */
  shutdown: () => Promise<void>;
};

export function buildRuntimeDeps(): RuntimeDeps {
  const validator = SchemaValidator.fromFile(config.schemaPath);
  logger.info({ schemaPath: config.schemaPath }, 'Plan schema loaded');

  const store = new RedisPlanStore();

  const plans = new PlanService({
    store,
    validator,
    notifier: new LoggingPlanChangeNotifier(logger),
  });

  return {
    plans,
    readiness: () => store.ping(),
    shutdown: async () => {
      await disconnectRedis();
    },
  };
}
