/**
 * Typed outcomes of the plan store operations.
 *
 * Every expected result of a call (including rejections caused by client
 * input) is a member of one of these unions, discriminated by `kind`.
 * The HTTP layer maps each kind to a response.
 */
import type { PlanDocument } from './PlanDocument';

export type ValidationFailed = {
  kind: 'validation_failed';
  issues: string[];
};

export type PlanNotFound = {
  kind: 'not_found';
};

export type PutOutcome =
  | { kind: 'created'; planId: string; etag: string }
  | { kind: 'unchanged'; planId: string; etag: string }
  | ValidationFailed;

export type GetOutcome =
  | { kind: 'found'; plan: PlanDocument; etag: string }
  | { kind: 'not_modified'; etag: string }
  | PlanNotFound;

export type PatchOutcome =
  | { kind: 'updated'; plan: PlanDocument; etag: string }
  | { kind: 'unchanged'; plan: PlanDocument; etag: string }
  | { kind: 'precondition_required' }
  | { kind: 'precondition_failed'; currentEtag: string }
  | PlanNotFound
  | ValidationFailed;

export type DeleteOutcome = { kind: 'deleted' } | PlanNotFound;
