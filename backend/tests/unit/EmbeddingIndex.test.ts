import { describe, expect, it } from 'vitest';
import {
  EmbeddingDimensionMismatchError,
  IndexConflictError,
  IndexCorruptionError
} from '../../src/errors/PipelineErrors';
import { EmbeddingIndex } from '../../src/services/vector/EmbeddingIndex';
import type {
  IndexRecord,
  PersistedIndex,
  PersistedIndexContent
} from '../../src/services/vector/IndexSnapshot';
import type { IndexStore } from '../../src/services/vector/stores/IndexStore';
import { InMemoryIndexStore } from '../../src/services/vector/stores/InMemoryIndexStore';
import type { Corpus } from '../../src/types/Pipeline';
import { makeChunk } from '../helpers/documents';
import { FlakyIndexStore } from '../helpers/fakes';

function record(
  documentId: string,
  vector: number[],
  options: { corpus?: Corpus; index?: number; fetchedAt?: string } = {}
): IndexRecord {
  const corpus = options.corpus ?? 'course';
  const chunk = makeChunk(documentId, options.index ?? 0, `chunk of ${documentId}`, corpus);
  return {
    chunkId: chunk.id,
    vector,
    corpus,
    chunk,
    document: {
      id: documentId,
      sourceUrl: `https://${corpus}.example.edu/${documentId}`,
      corpus,
      fetchedAt: new Date(options.fetchedAt ?? '2024-01-01T00:00:00.000Z'),
      contentHash: `hash-${documentId}`,
      metadata: {}
    }
  };
}

/** Holds every commit until `release` is called. */
class GatedIndexStore extends InMemoryIndexStore {
  readonly commitStarted: Promise<void>;
  private markStarted: () => void = () => undefined;
  private readonly gate: Promise<void>;
  release: () => void = () => undefined;

  constructor(initial: PersistedIndex | null) {
    super(initial);
    this.commitStarted = new Promise(resolve => {
      this.markStarted = resolve;
    });
    this.gate = new Promise(resolve => {
      this.release = resolve;
    });
  }

  async commit(content: PersistedIndexContent, baseGeneration: number): Promise<number> {
    this.markStarted();
    await this.gate;
    return super.commit(content, baseGeneration);
  }
}

/** Another writer always commits first. */
class ContendedIndexStore implements IndexStore {
  attempts = 0;

  async load(): Promise<PersistedIndex | null> {
    return null;
  }

  async commit(_content: PersistedIndexContent, baseGeneration: number): Promise<number> {
    this.attempts++;
    throw new IndexConflictError(baseGeneration, baseGeneration + 1);
  }

  describe(): string {
    return 'contended';
  }
}

async function openEmpty(): Promise<EmbeddingIndex> {
  return EmbeddingIndex.open(new InMemoryIndexStore());
}

describe('EmbeddingIndex search', () => {
  it('ranks by cosine similarity and filters by corpus', async () => {
    const index = await openEmpty();
    await index.upsert([
      record('near', [1, 0]),
      record('far', [0.6, 0.8]),
      record('forum-post', [0.8, 0.6], { corpus: 'forum' })
    ]);

    const all = index.search([2, 0], 5);
    expect(all.map(candidate => candidate.chunk.id)).toEqual(['near:0', 'forum-post:0', 'far:0']);
    expect(all[0].score).toBe(1);
    expect(all[0].sourceUrl).toBe('https://course.example.edu/near');

    expect(index.search([2, 0], 1).map(candidate => candidate.chunk.id)).toEqual(['near:0']);
    expect(index.search([2, 0], 5, 'forum').map(candidate => candidate.chunk.id)).toEqual(['forum-post:0']);
  });

  it('breaks score ties by corpus, then recency, then chunk id', async () => {
    const index = await openEmpty();
    await index.upsert([
      record('a', [1, 0], { corpus: 'forum', fetchedAt: '2024-02-01T00:00:00.000Z' }),
      record('b', [1, 0], { fetchedAt: '2024-01-01T00:00:00.000Z' }),
      record('d', [1, 0], { fetchedAt: '2024-03-01T00:00:00.000Z' }),
      record('c', [1, 0], { fetchedAt: '2024-03-01T00:00:00.000Z' })
    ]);

    expect(index.search([1, 0], 10).map(candidate => candidate.chunk.id)).toEqual(['c:0', 'd:0', 'b:0', 'a:0']);
  });

  it('returns nothing for an empty index or a zero query vector', async () => {
    const index = await openEmpty();
    expect(index.search([1, 0], 5)).toEqual([]);

    await index.upsert([record('a', [1, 0])]);
    expect(index.search([0, 0], 5)).toEqual([]);
  });

  it('rejects a query vector of the wrong dimension', async () => {
    const index = await openEmpty();
    await index.upsert([record('a', [1, 0])]);

    expect(() => index.search([1, 0, 0], 5)).toThrow(EmbeddingDimensionMismatchError);
  });
});

describe('EmbeddingIndex writes', () => {
  it('rejects records whose dimension differs and keeps the index unchanged', async () => {
    const index = await openEmpty();
    await index.upsert([record('a', [1, 0])]);

    await expect(index.upsert([record('b', [0, 1]), record('c', [1, 0, 0])])).rejects.toBeInstanceOf(
      EmbeddingDimensionMismatchError
    );
    expect(index.stats()).toMatchObject({ generation: 1, documents: 1, chunks: 1, dimension: 2 });
  });

  it('deletes a document together with all of its chunks', async () => {
    const index = await openEmpty();
    await index.upsert([record('a', [1, 0]), record('a', [0.9, 0.1], { index: 1 }), record('b', [0, 1])]);

    expect(await index.delete('a')).toBe(true);
    expect(index.stats()).toMatchObject({ generation: 2, documents: 1, chunks: 1 });
    expect(index.search([1, 0.01], 5).map(candidate => candidate.chunk.id)).toEqual(['b:0']);

    expect(await index.delete('missing')).toBe(false);
    expect(index.stats().generation).toBe(2);
  });

  it('leaves the current snapshot in place when a commit fails', async () => {
    const store = new FlakyIndexStore();
    const index = await EmbeddingIndex.open(store);
    await index.upsert([record('a', [1, 0])]);

    store.failNextCommit = true;
    await expect(index.upsert([record('b', [0, 1])])).rejects.toThrow('disk full');
    expect(index.stats()).toMatchObject({ generation: 1, documents: 1, chunks: 1 });
    expect(index.search([0, 1], 5).map(candidate => candidate.chunk.id)).toEqual(['a:0']);

    expect(await index.upsert([record('b', [0, 1])])).toBe(2);
    expect(index.search([0, 1], 5).map(candidate => candidate.chunk.id)).toEqual(['b:0', 'a:0']);
  });

  it('overwrites a chunk in place when the same chunk id is upserted again', async () => {
    const index = await openEmpty();
    await index.upsert([record('a', [1, 0]), record('a', [0, 1], { index: 1 })]);
    const before = index.search([1, 0], 5);

    await index.upsert([record('a', [1, 0]), record('a', [0, 1], { index: 1 })]);
    expect(index.stats()).toMatchObject({ generation: 2, documents: 1, chunks: 2 });
    expect(index.search([1, 0], 5)).toEqual(before);

    await index.upsert([record('a', [0.6, 0.8])]);
    expect(index.stats()).toMatchObject({ generation: 3, documents: 1, chunks: 2 });
    const [first, second] = index.search([1, 0], 5);
    expect(first.chunk.id).toBe('a:0');
    expect(first.score).toBeCloseTo(0.6);
    expect(second.chunk.id).toBe('a:1');
  });

  it('keeps serving the previous snapshot while a commit is in flight', async () => {
    const seed = new InMemoryIndexStore();
    await (await EmbeddingIndex.open(seed)).upsert([record('a', [1, 0])]);
    const store = new GatedIndexStore(await seed.load());
    const index = await EmbeddingIndex.open(store);

    const pending = index.upsert([record('b', [0, 1])]);
    await store.commitStarted;

    expect(index.search([0, 1], 5).map(candidate => candidate.chunk.id)).toEqual(['a:0']);
    expect(index.stats()).toMatchObject({ generation: 1, documents: 1 });

    store.release();
    expect(await pending).toBe(2);
    expect(index.search([0, 1], 5).map(candidate => candidate.chunk.id)).toEqual(['b:0', 'a:0']);
  });

  it('applies concurrent writes one after another', async () => {
    const index = await openEmpty();
    const generations = await Promise.all([
      index.upsert([record('a', [1, 0])]),
      index.upsert([record('b', [0, 1])]),
      index.delete('a')
    ]);

    expect(generations).toEqual([1, 2, true]);
    expect(index.stats()).toMatchObject({ generation: 3, documents: 1, chunks: 1 });
  });

  it('does not commit a batch without changes', async () => {
    const index = await openEmpty();
    await index.upsert([record('a', [1, 0])]);

    const outcome = await index.write(batch => batch.getDocument('a')?.contentHash);
    expect(outcome).toEqual({ result: 'hash-a', generation: 1, committed: false });
  });

  it('reloads the committed state from its store', async () => {
    const store = new InMemoryIndexStore();
    const index = await EmbeddingIndex.open(store);
    await index.upsert([record('a', [1, 0]), record('b', [0, 1], { corpus: 'forum' })]);

    const reopened = await EmbeddingIndex.open(store);
    expect(reopened.stats()).toEqual(index.stats());
    expect(reopened.stats().byCorpus).toEqual({
      course: { documents: 1, chunks: 1 },
      forum: { documents: 1, chunks: 1 }
    });
    expect(reopened.search([0, 1], 5)).toEqual(index.search([0, 1], 5));
  });
});

describe('EmbeddingIndex with a shared store', () => {
  it('rejects a commit built on a generation that is no longer the latest', async () => {
    const store = new InMemoryIndexStore();
    const content: PersistedIndexContent = { dimension: null, documents: [], entries: [] };

    expect(await store.commit(content, 0)).toBe(1);
    await expect(store.commit(content, 0)).rejects.toBeInstanceOf(IndexConflictError);
    expect((await store.load())?.generation).toBe(1);
  });

  it('reloads and reapplies a write when another process committed first', async () => {
    const store = new InMemoryIndexStore();
    const ingestScript = await EmbeddingIndex.open(store);
    const server = await EmbeddingIndex.open(store);

    expect(await ingestScript.upsert([record('fromScript', [1, 0])])).toBe(1);
    expect(await server.upsert([record('fromApi', [0, 1])])).toBe(2);
    expect(server.stats()).toMatchObject({ generation: 2, documents: 2, chunks: 2 });

    const reopened = await EmbeddingIndex.open(store);
    expect(reopened.search([1, 1], 5).map(candidate => candidate.chunk.id)).toEqual([
      'fromApi:0',
      'fromScript:0'
    ]);
  });

  it('gives up after repeated conflicts and keeps its snapshot', async () => {
    const store = new ContendedIndexStore();
    const index = await EmbeddingIndex.open(store);

    await expect(index.upsert([record('a', [1, 0])])).rejects.toBeInstanceOf(IndexConflictError);
    expect(store.attempts).toBe(4);
    expect(index.stats()).toMatchObject({ generation: 0, documents: 0 });
  });
});

describe('EmbeddingIndex corruption', () => {
  const corrupt: PersistedIndex = {
    generation: 4,
    dimension: 2,
    documents: [
      {
        id: 'a',
        sourceUrl: 'https://course.example.edu/a',
        corpus: 'course',
        fetchedAt: new Date('2024-01-01T00:00:00.000Z'),
        contentHash: 'hash-a',
        metadata: {}
      }
    ],
    entries: [{ chunk: makeChunk('a', 0, 'chunk of a'), vector: [1, 0, 0] }]
  };

  it('opens in a corrupt state that refuses reads and incremental writes', async () => {
    const index = await EmbeddingIndex.open(new InMemoryIndexStore(corrupt));

    expect(index.getStatus()).toBe('corrupt');
    expect(() => index.search([1, 0], 5)).toThrow(IndexCorruptionError);
    await expect(index.upsert([record('b', [0, 1])])).rejects.toBeInstanceOf(IndexCorruptionError);
  });

  it('recovers once a rebuild commits', async () => {
    const index = await EmbeddingIndex.open(new InMemoryIndexStore(corrupt));

    const outcome = await index.write(batch => batch.upsert([record('b', [0, 1])]), { rebuild: true });

    expect(outcome.generation).toBe(5);
    expect(index.getStatus()).toBe('ready');
    expect(index.search([0, 1], 5).map(candidate => candidate.chunk.id)).toEqual(['b:0']);
  });
});
