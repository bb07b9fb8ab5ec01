/**
 * IPlanRecordStore
 * ----------------
 * Domain contract for the associative backend holding plan records.
 *
 * One key per plan id, two fields per key (`data`, `etag`).
 * Implementations must write all fields of one key atomically and read
 * them back as a consistent snapshot.
 *
 * Infrastructure (RedisPlanStore) implements this; tests stub it.
 */
export interface IPlanRecordStore {
  /**
   * Read every field stored under `key`.
   * Returns null when the key does not exist.
   */
  get(key: string): Promise<Record<string, string> | null>;

  /**
   * Write the given fields under `key` in one atomic operation.
   */
  putFields(key: string, fields: Record<string, string>): Promise<void>;

  /**
   * Remove `key`. Resolves to true when the key existed.
   */
  delete(key: string): Promise<boolean>;

  /**
   * Round-trip to the backend; rejects when it cannot be reached.
   */
  ping(): Promise<void>;
}
