// src/plans/application/PlanService.ts

/**
 * PlanService
 *
 * Conditional document store for plans. Orchestrates
 * validation -> version check -> merge -> persistence against the record store.
 *
 * No lock is held across the read-decide-write sequence of any operation; the
 * store's atomic multi-field write is the only concurrency guarantee. The patch
 * precondition therefore checks a snapshot and is not a compare-and-swap: two
 * patches presenting the same tag can both succeed, and the later write wins.
 *
 * Store faults (StoreUnavailableError, StoredDocumentCorruptedError) reject the
 * returned promise and are never retried here.
 */

import type { IPlanChangeNotifier, PlanChangeEvent } from '../domain/PlanChangeNotifier';
import { isJsonObject, readPlanId, type PlanDocument } from '../domain/PlanDocument';
import type {
  DeleteOutcome,
  GetOutcome,
  PatchOutcome,
  PutOutcome,
  ValidationFailed,
} from '../domain/PlanOutcomes';
import type { IPlanRecordStore } from '../domain/PlanRecordStore';
import { StoredDocumentCorruptedError } from '../domain/PlanStoreErrors';
import { logger } from '../../shared/logging/Logger';

import { mergePlanPatch, plansEqual } from './MergePatch';
import type { ISchemaValidator } from './SchemaValidator';
import {
  createVersionTag,
  createVersionTagFromSerialized,
  matchesVersionTag,
  serializePlan,
} from './VersionTagGenerator';

/** Field names of a stored plan record. */
export const DATA_FIELD = 'data';
export const ETAG_FIELD = 'etag';

/**
 * A tag (or list of tags) presented by the client, e.g. from If-Match / If-None-Match.
 */
export type ClientTags = string | readonly string[];

export type PlanServiceDeps = {
  store: IPlanRecordStore;
  validator: ISchemaValidator;
  notifier?: IPlanChangeNotifier;
};

type LoadedPlan = {
  plan: PlanDocument;
  serialized: string;
};

export class PlanService {
  public constructor(private readonly deps: PlanServiceDeps) {}

  /**
   * Create-or-replace keyed by the document's own `objectId`.
   */
  public async create(document: unknown): Promise<PutOutcome> {
    const validation = this.validateFull(document);
    if (validation.kind === 'validation_failed') return validation;

    const planId = readPlanId(validation.plan);
    if (planId === undefined) {
      return {
        kind: 'validation_failed',
        issues: ['/objectId must be a non-empty string'],
      };
    }

    return this.save(planId, validation.plan);
  }

  /**
   * Create-or-replace under `planId`.
   *
   * A document whose serialization equals the stored bytes is not written again
   * and reports `unchanged` with the existing tag.
   */
  public async put(planId: string, document: unknown): Promise<PutOutcome> {
    const validation = this.validateFull(document);
    if (validation.kind === 'validation_failed') return validation;

    return this.save(planId, validation.plan);
  }

  /**
   * Read a plan. When a client tag names the stored version the body is omitted.
   */
  public async get(planId: string, clientTags?: ClientTags): Promise<GetOutcome> {
    const fields = await this.deps.store.get(planId);
    if (fields === null) {
      logger.debug({ planId }, 'Plan not found');
      return { kind: 'not_found' };
    }

    const data = requireData(planId, fields);
    const etag = fields[ETAG_FIELD] ?? createVersionTagFromSerialized(data);

    if (matchesVersionTag(etag, toTagList(clientTags))) {
      return { kind: 'not_modified', etag };
    }

    return { kind: 'found', plan: parseStoredPlan(planId, data), etag };
  }

  /**
   * Conditional partial update. `clientTags` is mandatory: a patch has no
   * unconditional form and is rejected before the store is touched.
   */
  public async patch(
    planId: string,
    patchDocument: unknown,
    clientTags?: ClientTags,
  ): Promise<PatchOutcome> {
    const tags = toTagList(clientTags);
    if (tags.length === 0) {
      return { kind: 'precondition_required' };
    }

    const existing = await this.load(planId);
    if (existing === null) {
      return { kind: 'not_found' };
    }

    // Recomputed from the stored bytes rather than trusting the cached field.
    const currentEtag = createVersionTagFromSerialized(existing.serialized);
    if (!matchesVersionTag(currentEtag, tags)) {
      logger.debug({ planId }, 'Plan patch rejected: stale version tag');
      return { kind: 'precondition_failed', currentEtag };
    }

    const validation = this.deps.validator.validatePartial(patchDocument);
    if (!validation.valid) {
      return { kind: 'validation_failed', issues: validation.issues };
    }
    if (!isJsonObject(patchDocument)) {
      return { kind: 'validation_failed', issues: ['/ must be object'] };
    }

    const merged = mergePlanPatch(existing.plan, patchDocument);
    if (plansEqual(merged, existing.plan)) {
      logger.debug({ planId }, 'Plan patch had no effect');
      return { kind: 'unchanged', plan: existing.plan, etag: currentEtag };
    }

    const serialized = serializePlan(merged);
    const etag = createVersionTagFromSerialized(serialized);
    await this.deps.store.putFields(planId, { [DATA_FIELD]: serialized, [ETAG_FIELD]: etag });

    logger.debug({ planId, etag }, 'Plan patched');
    await this.announce({ objectId: planId, op: 'PATCH', etag, plan: merged });

    return { kind: 'updated', plan: merged, etag };
  }

  /**
   * Unconditional delete.
   */
  public async delete(planId: string): Promise<DeleteOutcome> {
    const existed = await this.deps.store.delete(planId);
    if (!existed) {
      return { kind: 'not_found' };
    }

    logger.debug({ planId }, 'Plan deleted');
    await this.announce({ objectId: planId, op: 'DELETE' });

    return { kind: 'deleted' };
  }

  private validateFull(
    document: unknown,
  ): ValidationFailed | { kind: 'valid'; plan: PlanDocument } {
    const result = this.deps.validator.validate(document);
    if (!result.valid) {
      return { kind: 'validation_failed', issues: result.issues };
    }
    if (!isJsonObject(document)) {
      return { kind: 'validation_failed', issues: ['/ must be object'] };
    }
    return { kind: 'valid', plan: document };
  }

  private async save(planId: string, plan: PlanDocument): Promise<PutOutcome> {
    const serialized = serializePlan(plan);
    const fields = await this.deps.store.get(planId);

    // Raw bytes are compared; a corrupted record simply differs and is replaced.
    if (fields !== null && fields[DATA_FIELD] === serialized) {
      const etag = fields[ETAG_FIELD] ?? createVersionTagFromSerialized(serialized);
      logger.debug({ planId, etag }, 'Plan unchanged, write skipped');
      return { kind: 'unchanged', planId, etag };
    }

    const etag = createVersionTag(plan);
    await this.deps.store.putFields(planId, { [DATA_FIELD]: serialized, [ETAG_FIELD]: etag });

    logger.debug({ planId, etag, replaced: fields !== null }, 'Plan saved');
    await this.announce({ objectId: planId, op: 'CREATE', etag, plan });

    return { kind: 'created', planId, etag };
  }

  private async load(planId: string): Promise<LoadedPlan | null> {
    const fields = await this.deps.store.get(planId);
    if (fields === null) return null;

    const serialized = requireData(planId, fields);
    return { plan: parseStoredPlan(planId, serialized), serialized };
  }

  /**
   * Change notification follows a persisted write and cannot undo it,
   * so a failure is logged and the write's outcome stands.
   */
  private async announce(event: PlanChangeEvent): Promise<void> {
    if (!this.deps.notifier) return;

    try {
      await this.deps.notifier.notify(event);
    } catch (err) {
      logger.warn({ err, planId: event.objectId, op: event.op }, 'Plan change notification failed');
    }
  }
}

function toTagList(clientTags: ClientTags | undefined): string[] {
  if (clientTags === undefined) return [];
  const list = typeof clientTags === 'string' ? [clientTags] : [...clientTags];
  return list.filter((tag) => tag.length > 0);
}

function requireData(planId: string, fields: Record<string, string>): string {
  const data: string | undefined = fields[DATA_FIELD];
  if (data === undefined) {
    throw new StoredDocumentCorruptedError(planId, `Stored record for plan ${planId} has no data`);
  }
  return data;
}

function parseStoredPlan(planId: string, data: string): PlanDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new StoredDocumentCorruptedError(
      planId,
      `Stored data for plan ${planId} is not valid JSON`,
      { cause: err },
    );
  }

  if (!isJsonObject(parsed)) {
    throw new StoredDocumentCorruptedError(
      planId,
      `Stored data for plan ${planId} is not a JSON object`,
    );
  }

  return parsed;
}
