/**
 * Storage Adapter Interface
 *
 * A named box of JSON values. The blog cache and the auth session both live
 * in one, so the backing store (JSON files, memory, something else) can be
 * swapped without touching data sources.
 */
export interface StorageAdapter {
  /**
   * Read one entry
   * Resolves to undefined when the key was never written or was cleared
   */
  get(key: string): Promise<unknown>;

  /**
   * Write one entry, replacing any previous value
   */
  put(key: string, value: unknown): Promise<void>;

  delete(key: string): Promise<void>;

  /**
   * Drop every entry in the box
   */
  clear(): Promise<void>;
}
