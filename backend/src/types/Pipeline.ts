export type Corpus = 'course' | 'forum';

export const CORPORA: readonly Corpus[] = ['course', 'forum'];

export type DocumentMetadata = Record<string, string | number | boolean>;

/** A scraped page or forum thread as the scraper hands it over. */
export interface RawDocument {
  sourceUrl: string;
  rawText: string;
  corpus: Corpus;
  title?: string;
  fetchedAt?: Date | string;
  metadata?: DocumentMetadata;
}

/**
 * A normalized source document. `rawText` is the cleaned plain text that chunk
 * offsets point into; `id` is derived from `sourceUrl`.
 */
export interface Document {
  id: string;
  sourceUrl: string;
  title?: string;
  rawText: string;
  corpus: Corpus;
  fetchedAt: Date;
  contentHash: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  startOffset: number;
  endOffset: number;
  corpus: Corpus;
}

export interface EmbeddingRecord {
  chunkId: string;
  vector: number[];
  corpus: Corpus;
}

export interface Attachment {
  mimeType: string;
  bytes: Buffer;
}

export interface AttachmentPayload {
  mimeType: string;
  base64Bytes: string;
}

export interface QueryContext {
  questionText: string;
  normalizedText: string;
  attachments: Attachment[];
  warnings: string[];
}

export interface RetrievedCandidate {
  chunk: Chunk;
  score: number;
  sourceUrl: string;
  title?: string;
  fetchedAt: Date;
}

export interface AnswerLink {
  url: string;
  excerpt: string;
}

export interface AnsweredResult {
  answerText: string;
  links: AnswerLink[];
  /** false when no retrieved passage was available to ground the answer */
  grounded: boolean;
  warnings: string[];
}

export interface IngestionReport {
  documentsIndexed: number;
  chunksIndexed: number;
  documentsSkipped: number;
  documentsUnchanged: number;
  generation: number;
}

export type IngestionPhase =
  | 'idle'
  | 'fetching'
  | 'normalizing'
  | 'chunking'
  | 'embedding'
  | 'committed'
  | 'failed';

export type QueryStage = 'received' | 'normalized' | 'retrieved' | 'synthesized' | 'returned';
