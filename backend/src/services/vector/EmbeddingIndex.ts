import {
  EmbeddingDimensionMismatchError,
  IndexConflictError,
  IndexCorruptionError
} from '../../errors/PipelineErrors';
import type { Corpus, RetrievedCandidate } from '../../types/Pipeline';
import { IndexSnapshot, IndexWriteBatch, vectorNorm, type IndexRecord } from './IndexSnapshot';
import type { IndexStore } from './stores/IndexStore';

export type IndexStatus = 'ready' | 'corrupt';

export interface WriteOptions {
  /** start from an empty index instead of the current one */
  rebuild?: boolean;
}

export interface WriteResult<T> {
  result: T;
  generation: number;
  committed: boolean;
}

export interface IndexStats {
  status: IndexStatus;
  store: string;
  generation: number;
  dimension: number | null;
  documents: number;
  chunks: number;
  byCorpus: Record<Corpus, { documents: number; chunks: number }>;
}

/** Reloads and reapplies a batch at most this many times when another writer got there first. */
const MAX_CONFLICT_RETRIES = 3;

interface LoadedState {
  snapshot: IndexSnapshot;
  corruption: IndexCorruptionError | null;
}

const CORPUS_PRIORITY: Record<Corpus, number> = {
  course: 0,
  forum: 1
};

/**
 * Ranking order for candidates: similarity, then course material before forum
 * posts, then the most recently fetched source, then chunk id.
 */
export function compareCandidates(a: RetrievedCandidate, b: RetrievedCandidate): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  const corpusOrder = CORPUS_PRIORITY[a.chunk.corpus] - CORPUS_PRIORITY[b.chunk.corpus];
  if (corpusOrder !== 0) {
    return corpusOrder;
  }
  const recency = b.fetchedAt.getTime() - a.fetchedAt.getTime();
  if (recency !== 0) {
    return recency;
  }
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

/**
 * In-process vector index over an immutable snapshot. Searches read whichever
 * snapshot is current when they start; writes are queued one at a time, persisted
 * through the store, and only then swapped in.
 */
export class EmbeddingIndex {
  private snapshot: IndexSnapshot;
  private corruption: IndexCorruptionError | null;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: IndexStore,
    snapshot: IndexSnapshot = IndexSnapshot.empty(),
    corruption: IndexCorruptionError | null = null
  ) {
    this.snapshot = snapshot;
    this.corruption = corruption;
  }

  /**
   * Loads the persisted index. An unreadable index does not throw here: the
   * returned index reports `corrupt` and refuses queries until a rebuild commits.
   */
  static async open(store: IndexStore): Promise<EmbeddingIndex> {
    const { snapshot, corruption } = await EmbeddingIndex.load(store);
    return new EmbeddingIndex(store, snapshot, corruption);
  }

  private static async load(store: IndexStore): Promise<LoadedState> {
    try {
      const persisted = await store.load();
      if (!persisted) {
        console.log(`No persisted index found in ${store.describe()} store, starting empty`);
        return { snapshot: IndexSnapshot.empty(), corruption: null };
      }
      return { snapshot: IndexSnapshot.fromPersisted(persisted), corruption: null };
    } catch (error) {
      if (error instanceof IndexCorruptionError) {
        console.error(`${error.message}. Queries are disabled until the index is rebuilt.`);
        return { snapshot: IndexSnapshot.empty(error.generation ?? 0), corruption: error };
      }
      throw error;
    }
  }

  getStatus(): IndexStatus {
    return this.corruption ? 'corrupt' : 'ready';
  }

  /** The snapshot readers should use; throws while the index is corrupt. */
  current(): IndexSnapshot {
    if (this.corruption) {
      throw this.corruption;
    }
    return this.snapshot;
  }

  search(queryVector: readonly number[], k: number, corpusFilter?: Corpus): RetrievedCandidate[] {
    const snapshot = this.current();
    if (k <= 0 || snapshot.size === 0) {
      return [];
    }
    if (snapshot.dimension !== null && queryVector.length !== snapshot.dimension) {
      throw new EmbeddingDimensionMismatchError(snapshot.dimension, queryVector.length);
    }

    const queryNorm = vectorNorm(queryVector);
    if (queryNorm === 0) {
      return [];
    }

    const candidates: RetrievedCandidate[] = [];
    for (const entry of snapshot.entries.values()) {
      if ((corpusFilter && entry.chunk.corpus !== corpusFilter) || entry.norm === 0) {
        continue;
      }
      const document = snapshot.documents.get(entry.documentId);
      if (!document) {
        continue;
      }

      let dot = 0;
      for (let i = 0; i < queryVector.length; i++) {
        dot += queryVector[i] * entry.vector[i];
      }

      candidates.push({
        chunk: entry.chunk,
        score: dot / (queryNorm * entry.norm),
        sourceUrl: document.sourceUrl,
        title: document.title,
        fetchedAt: document.fetchedAt
      });
    }

    return candidates.sort(compareCandidates).slice(0, k);
  }

  /**
   * Runs `mutate` against a working copy and commits everything it did as one
   * generation. Batches never interleave; a failure anywhere leaves the current
   * snapshot untouched.
   */
  write<T>(
    mutate: (batch: IndexWriteBatch) => T | Promise<T>,
    options: WriteOptions = {}
  ): Promise<WriteResult<T>> {
    const run = this.writeQueue.then(() => this.applyBatch(mutate, options));
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  async upsert(records: readonly IndexRecord[]): Promise<number> {
    const { generation } = await this.write(batch => batch.upsert(records));
    return generation;
  }

  async delete(documentId: string): Promise<boolean> {
    const { result } = await this.write(batch => batch.delete(documentId));
    return result;
  }

  stats(): IndexStats {
    const snapshot = this.snapshot;
    const byCorpus: Record<Corpus, { documents: number; chunks: number }> = {
      course: { documents: 0, chunks: 0 },
      forum: { documents: 0, chunks: 0 }
    };

    for (const document of snapshot.documents.values()) {
      byCorpus[document.corpus].documents += 1;
      byCorpus[document.corpus].chunks += document.chunkIds.length;
    }

    return {
      status: this.getStatus(),
      store: this.store.describe(),
      generation: snapshot.generation,
      dimension: snapshot.dimension,
      documents: snapshot.documents.size,
      chunks: snapshot.size,
      byCorpus
    };
  }

  /**
   * A commit that loses the race against another process sharing the store is
   * not retried blindly: the latest generation is reloaded and `mutate` runs
   * again on top of it.
   */
  private async applyBatch<T>(
    mutate: (batch: IndexWriteBatch) => T | Promise<T>,
    options: WriteOptions
  ): Promise<WriteResult<T>> {
    const rebuild = options.rebuild ?? false;

    for (let conflicts = 0; ; conflicts++) {
      if (this.corruption && !rebuild) {
        throw this.corruption;
      }

      const base = this.snapshot;
      const batch = new IndexWriteBatch(base, rebuild);
      const result = await mutate(batch);

      if (!batch.hasChanges) {
        return { result, generation: base.generation, committed: false };
      }

      const pending = batch.toSnapshot(base.generation);
      let generation: number;
      try {
        generation = await this.store.commit(pending.toPersisted(), base.generation);
      } catch (error) {
        if (!(error instanceof IndexConflictError) || conflicts >= MAX_CONFLICT_RETRIES) {
          throw error;
        }
        console.warn(`${error.message}; reloading the index and reapplying the write`);
        const latest = await EmbeddingIndex.load(this.store);
        this.snapshot = latest.snapshot;
        this.corruption = latest.corruption;
        continue;
      }

      this.snapshot = batch.toSnapshot(generation);
      this.corruption = null;
      return { result, generation, committed: true };
    }
  }
}
