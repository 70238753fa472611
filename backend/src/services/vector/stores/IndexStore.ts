import type { PersistedIndex, PersistedIndexContent } from '../IndexSnapshot';

/**
 * Durable home of the embedding index. `commit` must be all-or-nothing: after a
 * failed commit, `load` still returns the previously committed index.
 */
export interface IndexStore {
  /** The last committed index, or null when nothing was ever committed. */
  load(): Promise<PersistedIndex | null>;
  /**
   * Persists a complete index as generation `baseGeneration + 1` and returns that
   * number. Throws IndexConflictError when another writer has committed since
   * `baseGeneration`, or is committing on top of it right now.
   */
  commit(content: PersistedIndexContent, baseGeneration: number): Promise<number>;
  describe(): string;
}
