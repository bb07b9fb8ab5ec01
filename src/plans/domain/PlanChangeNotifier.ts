/**
 * IPlanChangeNotifier
 *
 * Port for announcing plan writes to downstream consumers (e.g. a search
 * indexer fed through a message queue). Called after a write has been
 * persisted; it never decides whether the write succeeds.
 */
import type { PlanDocument } from './PlanDocument';

export type PlanChangeOperation = 'CREATE' | 'PATCH' | 'DELETE';

export interface PlanChangeEvent {
  objectId: string;
  op: PlanChangeOperation;
  etag?: string;
  /** Full document after the write; absent for DELETE. */
  plan?: PlanDocument;
}

export interface IPlanChangeNotifier {
  notify(event: PlanChangeEvent): Promise<void>;
}
