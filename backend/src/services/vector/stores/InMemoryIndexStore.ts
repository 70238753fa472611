import { IndexConflictError } from '../../../errors/PipelineErrors';
import type { PersistedIndex, PersistedIndexContent } from '../IndexSnapshot';
import type { IndexStore } from './IndexStore';

export class InMemoryIndexStore implements IndexStore {
  private committed: PersistedIndex | null;
  private generation: number;

  constructor(initial: PersistedIndex | null = null) {
    this.committed = initial ? structuredClone(initial) : null;
    this.generation = initial?.generation ?? 0;
  }

  async load(): Promise<PersistedIndex | null> {
    return this.committed ? structuredClone(this.committed) : null;
  }

  async commit(content: PersistedIndexContent, baseGeneration: number): Promise<number> {
    if (baseGeneration !== this.generation) {
      throw new IndexConflictError(baseGeneration, this.generation);
    }
    const generation = this.generation + 1;
    this.committed = structuredClone({ ...content, generation });
    this.generation = generation;
    return generation;
  }

  describe(): string {
    return 'in-memory';
  }
}
