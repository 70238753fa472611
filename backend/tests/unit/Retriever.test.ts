import { describe, expect, it } from 'vitest';
import { EmbeddingCapabilityError, IndexCorruptionError } from '../../src/errors/PipelineErrors';
import {
  Retriever,
  dedupeByDocument,
  selectWithRepresentation,
  type RetrieverOptions
} from '../../src/services/retrieval/Retriever';
import { EmbeddingIndex } from '../../src/services/vector/EmbeddingIndex';
import type { IndexRecord } from '../../src/services/vector/IndexSnapshot';
import { InMemoryIndexStore } from '../../src/services/vector/stores/InMemoryIndexStore';
import type { Corpus, RetrievedCandidate } from '../../src/types/Pipeline';
import { makeCandidate, makeChunk } from '../helpers/documents';
import { FailingEmbedder, FixedEmbedder, NO_RETRY } from '../helpers/fakes';

const OPTIONS: RetrieverOptions = { k: 2, maxCandidates: 10, similarityFloor: 0.2, retry: NO_RETRY };

function record(documentId: string, vector: number[], corpus: Corpus = 'course'): IndexRecord {
  const chunk = makeChunk(documentId, 0, `chunk of ${documentId}`, corpus);
  return {
    chunkId: chunk.id,
    vector,
    corpus,
    chunk,
    document: {
      id: documentId,
      sourceUrl: `https://${corpus}.example.edu/${documentId}`,
      corpus,
      fetchedAt: new Date('2024-01-01T00:00:00.000Z'),
      contentHash: `hash-${documentId}`,
      metadata: {}
    }
  };
}

async function seededIndex(): Promise<EmbeddingIndex> {
  const index = await EmbeddingIndex.open(new InMemoryIndexStore());
  await index.upsert([
    record('c1', [1, 0]),
    record('c2', [0.9, 0.1]),
    record('c3', [0.8, 0.6]),
    record('f1', [0.3, 1], 'forum')
  ]);
  return index;
}

const ids = (candidates: readonly RetrievedCandidate[]) => candidates.map(candidate => candidate.chunk.id);

describe('dedupeByDocument', () => {
  it('keeps non-overlapping spans of a document and drops overlapping ones', () => {
    const first = makeCandidate('a', 0.9, { index: 0 });
    const overlapping: RetrievedCandidate = {
      ...makeCandidate('a', 0.8, { index: 1 }),
      chunk: { ...makeChunk('a', 1, 'Text of a'), startOffset: 5, endOffset: 40 }
    };
    const separate = makeCandidate('a', 0.7, { index: 2 });
    const other = makeCandidate('b', 0.6);

    expect(ids(dedupeByDocument([first, overlapping, separate, other]))).toEqual(['a:0', 'a:2', 'b:0']);
  });
});

describe('selectWithRepresentation', () => {
  it('swaps the weakest surplus candidate for the best of a missing corpus', () => {
    const ranked = [
      makeCandidate('c1', 0.9),
      makeCandidate('c2', 0.8),
      makeCandidate('c3', 0.7),
      makeCandidate('f1', 0.5, { corpus: 'forum' })
    ];

    expect(ids(selectWithRepresentation(ranked, 3))).toEqual(['c1:0', 'c2:0', 'f1:0']);
    expect(ids(selectWithRepresentation(ranked, 4))).toEqual(['c1:0', 'c2:0', 'c3:0', 'f1:0']);
  });

  it('cannot make room when the limit holds a single candidate', () => {
    const ranked = [makeCandidate('c1', 0.9), makeCandidate('f1', 0.5, { corpus: 'forum' })];
    expect(ids(selectWithRepresentation(ranked, 1))).toEqual(['c1:0']);
  });
});

describe('Retriever', () => {
  it('merges the top k of each corpus', async () => {
    const retriever = new Retriever(new FixedEmbedder([1, 0]), await seededIndex(), OPTIONS);

    const candidates = await retriever.retrieve('which container tool?');

    expect(ids(candidates)).toEqual(['c1:0', 'c2:0', 'f1:0']);
    expect(candidates[2].sourceUrl).toBe('https://forum.example.edu/f1');
  });

  it('drops candidates under the similarity floor', async () => {
    const retriever = new Retriever(new FixedEmbedder([1, 0]), await seededIndex(), {
      ...OPTIONS,
      similarityFloor: 0.5
    });

    expect(ids(await retriever.retrieve('which container tool?'))).toEqual(['c1:0', 'c2:0']);
  });

  it('caps the result at twice k', async () => {
    const retriever = new Retriever(new FixedEmbedder([1, 0]), await seededIndex(), OPTIONS);

    expect(ids(await retriever.retrieve('which container tool?', 1))).toEqual(['c1:0', 'f1:0']);
  });

  it('returns nothing from an empty index without embedding the query', async () => {
    const embedder = new FailingEmbedder();
    const index = await EmbeddingIndex.open(new InMemoryIndexStore());

    expect(await new Retriever(embedder, index, OPTIONS).retrieve('anything')).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it('wraps embedding failures', async () => {
    const retriever = new Retriever(new FailingEmbedder(), await seededIndex(), OPTIONS);

    await expect(retriever.retrieve('anything')).rejects.toBeInstanceOf(EmbeddingCapabilityError);
  });

  it('refuses to query a corrupt index', async () => {
    const store = new InMemoryIndexStore({ generation: 2, dimension: 2, documents: [], entries: [
      { chunk: makeChunk('ghost', 0, 'orphan'), vector: [1, 0] }
    ] });
    const retriever = new Retriever(new FixedEmbedder([1, 0]), await EmbeddingIndex.open(store), OPTIONS);

    await expect(retriever.retrieve('anything')).rejects.toBeInstanceOf(IndexCorruptionError);
  });
});
