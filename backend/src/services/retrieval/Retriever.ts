import type { RetrievalConfig, RetryConfig } from '../../config/environment';
import { EmbeddingCapabilityError, errorMessage } from '../../errors/PipelineErrors';
import type { EmbeddingCapability } from '../../types/LLM';
import { CORPORA, type Corpus, type RetrievedCandidate } from '../../types/Pipeline';
import { withRetry } from '../llm/retry';
import { compareCandidates, type EmbeddingIndex } from '../vector/EmbeddingIndex';

export interface RetrieverOptions extends RetrievalConfig {
  retry: RetryConfig;
}

function spansOverlap(a: RetrievedCandidate, b: RetrievedCandidate): boolean {
  return a.chunk.startOffset < b.chunk.endOffset && b.chunk.startOffset < a.chunk.endOffset;
}

/**
 * Keeps the best chunk of each document, plus any further chunk of the same
 * document whose span does not overlap one already kept. Input must be ranked.
 */
export function dedupeByDocument(ranked: readonly RetrievedCandidate[]): RetrievedCandidate[] {
  const keptByDocument = new Map<string, RetrievedCandidate[]>();
  const result: RetrievedCandidate[] = [];

  for (const candidate of ranked) {
    const kept = keptByDocument.get(candidate.chunk.documentId) ?? [];
    if (kept.some(other => other.chunk.id === candidate.chunk.id || spansOverlap(other, candidate))) {
      continue;
    }
    kept.push(candidate);
    keptByDocument.set(candidate.chunk.documentId, kept);
    result.push(candidate);
  }

  return result;
}

/**
 * Cuts the ranked list to `limit`, then makes sure every corpus that had a
 * candidate before the cut still has one after it.
 */
export function selectWithRepresentation(ranked: readonly RetrievedCandidate[], limit: number): RetrievedCandidate[] {
  const selected = ranked.slice(0, limit);
  if (limit < 1) {
    return selected;
  }

  for (const corpus of CORPORA) {
    if (selected.some(candidate => candidate.chunk.corpus === corpus)) {
      continue;
    }
    const best = ranked.find(candidate => candidate.chunk.corpus === corpus);
    if (!best) {
      continue;
    }

    const replaceAt = lowestReplaceableIndex(selected);
    if (replaceAt === -1) {
      continue;
    }
    selected.splice(replaceAt, 1);
    selected.push(best);
    selected.sort(compareCandidates);
  }

  return selected;
}

/** Lowest-ranked entry whose corpus still has another entry in the list. */
function lowestReplaceableIndex(selected: readonly RetrievedCandidate[]): number {
  for (let i = selected.length - 1; i >= 0; i--) {
    const corpus: Corpus = selected[i].chunk.corpus;
    if (selected.filter(candidate => candidate.chunk.corpus === corpus).length > 1) {
      return i;
    }
  }
  return -1;
}

export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingCapability,
    private readonly index: EmbeddingIndex,
    private readonly options: RetrieverOptions
  ) {}

  /**
   * Embeds the query and returns up to `maxCandidates` ranked candidates drawn
   * from both corpora. An empty index gives an empty list.
   */
  async retrieve(
    normalizedText: string,
    k: number = this.options.k,
    signal?: AbortSignal
  ): Promise<RetrievedCandidate[]> {
    // throws while the index is corrupt
    const snapshot = this.index.current();
    if (snapshot.size === 0) {
      return [];
    }

    const queryVector = await this.embedQuery(normalizedText, signal);

    const perCorpus = CORPORA.map(corpus => this.index.search(queryVector, k, corpus));
    const merged = perCorpus
      .flat()
      .filter(candidate => candidate.score >= this.options.similarityFloor)
      .sort(compareCandidates);

    const limit = Math.min(this.options.maxCandidates, 2 * k);
    const selected = selectWithRepresentation(dedupeByDocument(merged), limit);

    console.log(
      `Retrieved ${selected.length} candidates (${perCorpus.map((list, i) => `${CORPORA[i]}: ${list.length}`).join(', ')} before filtering)`
    );
    return selected;
  }

  private embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    return withRetry(
      attemptSignal => this.embeddings.embed(text, { signal: attemptSignal }),
      { ...this.options.retry, signal, operation: 'Query embedding' },
      (lastError, attempts) =>
        new EmbeddingCapabilityError(`Query embedding failed: ${errorMessage(lastError)}`, attempts, lastError)
    );
  }
}
