import type { RetryConfig } from '../../config/environment';
import {
  EmbeddingCapabilityError,
  IngestionError,
  QueryAbortedError,
  errorMessage
} from '../../errors/PipelineErrors';
import type { EmbeddingCapability } from '../../types/LLM';
import type {
  AnsweredResult,
  AttachmentPayload,
  Chunk,
  Document,
  IngestionPhase,
  IngestionReport,
  QueryStage
} from '../../types/Pipeline';
import type { CourseTextChunker } from '../chunking/CourseTextChunker';
import type { ChatHistoryStore } from '../history/ChatHistoryStore';
import { isWithinWindow, type DateWindow, type DocumentNormalizer } from '../ingestion/DocumentNormalizer';
import { StaticDocumentSource, type DocumentSource } from '../ingestion/DocumentSource';
import { parseRawDocument } from '../ingestion/RawDocumentParser';
import { withRetry } from '../llm/retry';
import type { QueryNormalizer } from '../query/QueryNormalizer';
import type { Retriever } from '../retrieval/Retriever';
import type { AnswerSynthesizer } from '../synthesis/AnswerSynthesizer';
import type { EmbeddingIndex, IndexStats } from '../vector/EmbeddingIndex';

export interface PipelineDependencies {
  documentNormalizer: DocumentNormalizer;
  chunker: CourseTextChunker;
  index: EmbeddingIndex;
  embeddings: EmbeddingCapability;
  queryNormalizer: QueryNormalizer;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  history?: ChatHistoryStore;
  retry: RetryConfig;
}

export interface IngestOptions {
  /** re-embed everything into a fresh index, discarding the current one */
  rebuild?: boolean;
  /** only index forum posts written inside this window; course pages are unaffected */
  forumWindow?: DateWindow;
}

export interface AnswerOptions {
  sessionId?: string;
  signal?: AbortSignal;
}

export interface IngestionStatus {
  phase: IngestionPhase;
  source?: string;
  startedAt?: Date;
  finishedAt?: Date;
  lastReport?: IngestionReport;
  lastError?: string;
}

interface PreparedDocument {
  document: Document;
  chunks: Chunk[];
}

interface EmbeddedDocument extends PreparedDocument {
  vectors: number[][];
}

/**
 * Wires normalization, chunking, embedding and the index into ingestion runs,
 * and query normalization, retrieval and synthesis into answers.
 */
export class PipelineOrchestrator {
  private ingestionStatus: IngestionStatus = { phase: 'idle' };
  private ingestionQueue: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: PipelineDependencies) {}

  ingest(rawDocuments: readonly unknown[], options: IngestOptions = {}): Promise<IngestionReport> {
    return this.ingestFrom(new StaticDocumentSource(rawDocuments), options);
  }

  /** Runs are queued so that at most one ingestion is in flight. */
  ingestFrom(source: DocumentSource, options: IngestOptions = {}): Promise<IngestionReport> {
    const run = this.ingestionQueue.then(() => this.runIngestion(source, options));
    this.ingestionQueue = run.catch(() => undefined);
    return run;
  }

  getIngestionStatus(): IngestionStatus {
    return { ...this.ingestionStatus };
  }

  getIndexStats(): IndexStats {
    return this.deps.index.stats();
  }

  async answer(
    question: string,
    attachments: readonly AttachmentPayload[] = [],
    options: AnswerOptions = {}
  ): Promise<AnsweredResult> {
    const { signal, sessionId } = options;
    let stage: QueryStage = 'received';
    const ensureActive = () => {
      if (signal?.aborted) {
        throw new QueryAbortedError(stage);
      }
    };

    ensureActive();
    const context = await this.deps.queryNormalizer.normalize(question, attachments, signal);
    stage = 'normalized';
    ensureActive();

    const candidates = await this.deps.retriever.retrieve(context.normalizedText, undefined, signal);
    stage = 'retrieved';
    ensureActive();

    const synthesized = await this.deps.synthesizer.synthesize(context.normalizedText, candidates, signal);
    stage = 'synthesized';
    ensureActive();

    const result: AnsweredResult = {
      ...synthesized,
      warnings: [...context.warnings, ...synthesized.warnings]
    };

    if (sessionId) {
      this.recordHistory(sessionId, context.questionText || context.normalizedText, result.answerText);
    }

    stage = 'returned';
    console.log(
      `Answered query: ${candidates.length} candidates, ${result.links.length} links, grounded=${result.grounded}`
    );
    return result;
  }

  private recordHistory(sessionId: string, question: string, answer: string): void {
    const history = this.deps.history;
    if (!history) {
      return;
    }
    void Promise.resolve()
      .then(() => history.append(sessionId, question, answer))
      .catch((error: unknown) => {
        console.error(`Failed to append chat history for session ${sessionId}:`, error);
      });
  }

  private setPhase(phase: IngestionPhase): void {
    this.ingestionStatus = { ...this.ingestionStatus, phase };
  }

  private async runIngestion(source: DocumentSource, options: IngestOptions): Promise<IngestionReport> {
    const rebuild = options.rebuild ?? false;
    this.ingestionStatus = {
      phase: 'fetching',
      source: source.describe(),
      startedAt: new Date(),
      lastReport: this.ingestionStatus.lastReport
    };
    console.log(`Starting ingestion from ${source.describe()}${rebuild ? ' (rebuild)' : ''}`);

    try {
      const rawDocuments = await source.fetchDocuments();

      this.setPhase('normalizing');
      const { documents, skipped: rejected } = this.normalizeAll(rawDocuments, options.forumWindow);

      this.setPhase('chunking');
      const prepared: PreparedDocument[] = [];
      let empty = 0;
      for (const document of documents) {
        const chunks = this.deps.chunker.chunkDocument(document);
        if (chunks.length === 0) {
          console.warn(`Skipping ${document.sourceUrl}: no text to index`);
          empty++;
          continue;
        }
        prepared.push({ document, chunks });
      }

      this.setPhase('embedding');
      // throws while the index is corrupt, unless this run rebuilds it
      const current = rebuild ? null : this.deps.index.current();
      const changed = prepared.filter(({ document }) => {
        return current?.documents.get(document.id)?.contentHash !== document.contentHash;
      });
      const embedded = await this.embedAll(changed);

      const { generation } = await this.deps.index.write(batch => {
        for (const { document, chunks, vectors } of embedded) {
          const { rawText: _rawText, ...info } = document;
          batch.replaceDocument(info, chunks, vectors);
        }
      }, { rebuild });

      const report: IngestionReport = {
        documentsIndexed: embedded.length,
        chunksIndexed: embedded.reduce((sum, item) => sum + item.chunks.length, 0),
        documentsSkipped: rejected + empty,
        documentsUnchanged: prepared.length - changed.length,
        generation
      };

      this.ingestionStatus = { ...this.ingestionStatus, phase: 'committed', finishedAt: new Date(), lastReport: report };
      console.log(
        `Ingestion committed: ${report.documentsIndexed} documents (${report.chunksIndexed} chunks) indexed, ` +
        `${report.documentsUnchanged} unchanged, ${report.documentsSkipped} skipped, generation ${generation}`
      );
      return report;
    } catch (error) {
      this.ingestionStatus = {
        ...this.ingestionStatus,
        phase: 'failed',
        finishedAt: new Date(),
        lastError: errorMessage(error)
      };
      console.error('Ingestion failed, index left unchanged:', error);
      throw error;
    }
  }

  /** Later copies of the same source URL in one run replace earlier ones. */
  private normalizeAll(
    rawDocuments: readonly unknown[],
    forumWindow: DateWindow = {}
  ): { documents: Document[]; skipped: number } {
    const documents = new Map<string, Document>();
    let skipped = 0;

    for (const raw of rawDocuments) {
      try {
        const document = this.deps.documentNormalizer.normalize(parseRawDocument(raw));
        if (!isWithinWindow(document, forumWindow)) {
          console.log(`Skipping ${document.sourceUrl}: posted outside the forum date window`);
          skipped++;
          continue;
        }
        documents.set(document.id, document);
      } catch (error) {
        if (error instanceof IngestionError) {
          console.warn(`Skipping document: ${error.message}`);
          skipped++;
          continue;
        }
        throw error;
      }
    }

    return { documents: [...documents.values()], skipped };
  }

  private async embedAll(documents: readonly PreparedDocument[]): Promise<EmbeddedDocument[]> {
    const totalChunks = documents.reduce((sum, item) => sum + item.chunks.length, 0);
    const embedded: EmbeddedDocument[] = [];
    let processed = 0;

    if (totalChunks > 0) {
      console.log(`Embedding ${totalChunks} chunks from ${documents.length} documents...`);
    }

    for (const item of documents) {
      const vectors: number[][] = [];
      for (const chunk of item.chunks) {
        vectors.push(await this.embedChunk(chunk));
        processed++;

        if (processed % 10 === 0 || processed === totalChunks) {
          console.log(`Progress: ${processed}/${totalChunks} chunks embedded (${Math.round((processed / totalChunks) * 100)}%)`);
        }
      }
      embedded.push({ ...item, vectors });
    }

    return embedded;
  }

  private embedChunk(chunk: Chunk): Promise<number[]> {
    return withRetry(
      signal => this.deps.embeddings.embed(chunk.text, { signal }),
      { ...this.deps.retry, operation: `Embedding chunk ${chunk.id}` },
      (lastError, attempts) =>
        new EmbeddingCapabilityError(`Embedding chunk ${chunk.id} failed: ${errorMessage(lastError)}`, attempts, lastError)
    );
  }
}
