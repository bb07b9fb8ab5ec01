// tests/support/planFixtures.ts

import path from 'path';

import type { PlanDocument } from '../../src/plans/domain/PlanDocument';
import type { IPlanChangeNotifier } from '../../src/plans/domain/PlanChangeNotifier';
import { PlanService } from '../../src/plans/application/PlanService';
import { SchemaValidator } from '../../src/plans/application/SchemaValidator';
import { RedisPlanStore } from '../../src/plans/infrastructure/RedisPlanStore';
import { InMemoryRedisHashClient } from './InMemoryRedisHashClient';

export const PLAN_SCHEMA_PATH = path.resolve(__dirname, '../../schema/plan-schema.json');

export function loadPlanValidator(): SchemaValidator {
  return SchemaValidator.fromFile(PLAN_SCHEMA_PATH);
}

/**
 * The linked plan service every plan from buildPlan() starts with.
 */
export function annualCheckupService(): PlanDocument {
  return {
    linkedService: {
      _org: 'insurer.test',
      objectId: 'svc-102',
      objectType: 'service',
      name: 'Annual checkup',
    },
    planserviceCostShares: {
      deductible: 10,
      _org: 'insurer.test',
      copay: 0,
      objectId: 'mcs-103',
      objectType: 'membercostshare',
    },
    _org: 'insurer.test',
    objectId: 'ps-104',
    objectType: 'planservice',
  };
}

/**
 * A linked plan service not present in buildPlan().
 */
export function dentalCleaningService(): PlanDocument {
  return {
    linkedService: {
      _org: 'insurer.test',
      objectId: 'svc-201',
      objectType: 'service',
      name: 'Dental cleaning',
    },
    planserviceCostShares: {
      deductible: 50,
      _org: 'insurer.test',
      copay: 15,
      objectId: 'mcs-202',
      objectType: 'membercostshare',
    },
    _org: 'insurer.test',
    objectId: 'ps-200',
    objectType: 'planservice',
  };
}

/**
 * A plan that satisfies the full schema.
 */
export function buildPlan(objectId = 'plan-100'): PlanDocument {
  return {
    planCostShares: {
      deductible: 2000,
      _org: 'insurer.test',
      copay: 25,
      objectId: 'mcs-101',
      objectType: 'membercostshare',
    },
    linkedPlanServices: [annualCheckupService()],
    _org: 'insurer.test',
    objectId,
    objectType: 'plan',
    planType: 'inNetwork',
    creationDate: '01-02-2024',
  };
}

export type TestPlanStack = {
  client: InMemoryRedisHashClient;
  store: RedisPlanStore;
  service: PlanService;
};

export function createTestPlanStack(notifier?: IPlanChangeNotifier): TestPlanStack {
  const client = new InMemoryRedisHashClient();
  const store = new RedisPlanStore(client);
  const service = new PlanService({ store, validator: loadPlanValidator(), notifier });
  return { client, store, service };
}
