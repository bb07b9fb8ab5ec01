/**
 * Infrastructure faults raised while talking to the plan record store.
 *
 * These are not request outcomes: the facade never retries them and the
 * global error handler maps each class to its own response.
 */

/**
 * The backend could not be reached or did not answer in time.
 * Transient; the caller decides on a retry policy.
 */
export class StoreUnavailableError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A stored record could not be read back as a plan document.
 * Indicates backend corruption, never a missing plan.
 */
export class StoredDocumentCorruptedError extends Error {
  public readonly planId: string;

  public constructor(planId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoredDocumentCorruptedError';
    this.planId = planId;
  }
}
