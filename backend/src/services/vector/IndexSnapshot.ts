import { EmbeddingDimensionMismatchError, IndexCorruptionError } from '../../errors/PipelineErrors';
import type { Chunk, Corpus, Document, DocumentMetadata, EmbeddingRecord } from '../../types/Pipeline';

export type IndexedDocumentInfo = Omit<Document, 'rawText'>;

export interface IndexedDocument extends IndexedDocumentInfo {
  chunkIds: readonly string[];
}

export interface IndexEntry {
  chunk: Chunk;
  vector: readonly number[];
  norm: number;
  documentId: string;
}

/** An embedding plus the chunk and document it belongs to. */
export interface IndexRecord extends EmbeddingRecord {
  chunk: Chunk;
  document: IndexedDocumentInfo;
}

export interface PersistedDocument {
  id: string;
  sourceUrl: string;
  title?: string;
  corpus: Corpus;
  fetchedAt: Date;
  contentHash: string;
  metadata: DocumentMetadata;
}

export interface PersistedEntry {
  chunk: Chunk;
  vector: number[];
}

export interface PersistedIndexContent {
  dimension: number | null;
  documents: PersistedDocument[];
  entries: PersistedEntry[];
}

export interface PersistedIndex extends PersistedIndexContent {
  generation: number;
}

export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Immutable view of the index. Readers hold a reference to one snapshot for the
 * whole of a search; writers build a new one and swap it in.
 */
export class IndexSnapshot {
  private constructor(
    readonly generation: number,
    readonly dimension: number | null,
    readonly documents: ReadonlyMap<string, IndexedDocument>,
    readonly entries: ReadonlyMap<string, IndexEntry>
  ) {}

  static empty(generation: number = 0): IndexSnapshot {
    return new IndexSnapshot(generation, null, new Map(), new Map());
  }

  static create(
    generation: number,
    dimension: number | null,
    documents: Map<string, IndexedDocument>,
    entries: Map<string, IndexEntry>
  ): IndexSnapshot {
    return new IndexSnapshot(generation, entries.size === 0 ? null : dimension, documents, entries);
  }

  /** Rebuilds a snapshot from storage, rejecting anything internally inconsistent. */
  static fromPersisted(persisted: PersistedIndex): IndexSnapshot {
    const { generation, dimension } = persisted;
    const documents = new Map<string, IndexedDocument>();
    const entries = new Map<string, IndexEntry>();
    const chunkIdsByDocument = new Map<string, string[]>();

    for (const document of persisted.documents) {
      if (documents.has(document.id)) {
        throw new IndexCorruptionError(`duplicate document ${document.id}`, generation);
      }
      documents.set(document.id, { ...document, chunkIds: [] });
      chunkIdsByDocument.set(document.id, []);
    }

    for (const { chunk, vector } of persisted.entries) {
      const chunkIds = chunkIdsByDocument.get(chunk.documentId);
      if (!chunkIds) {
        throw new IndexCorruptionError(`chunk ${chunk.id} references missing document ${chunk.documentId}`, generation);
      }
      if (entries.has(chunk.id)) {
        throw new IndexCorruptionError(`duplicate chunk ${chunk.id}`, generation);
      }
      if (dimension === null || vector.length !== dimension) {
        throw new IndexCorruptionError(
          `chunk ${chunk.id} has ${vector.length} dimensions, expected ${String(dimension)}`,
          generation
        );
      }
      if (!vector.every(Number.isFinite)) {
        throw new IndexCorruptionError(`chunk ${chunk.id} has a non-finite vector component`, generation);
      }
      entries.set(chunk.id, { chunk, vector, norm: vectorNorm(vector), documentId: chunk.documentId });
      chunkIds.push(chunk.id);
    }

    for (const [documentId, chunkIds] of chunkIdsByDocument) {
      const document = documents.get(documentId);
      if (!document || chunkIds.length === 0) {
        throw new IndexCorruptionError(`document ${documentId} has no chunks`, generation);
      }
      documents.set(documentId, { ...document, chunkIds });
    }

    return new IndexSnapshot(generation, entries.size === 0 ? null : dimension, documents, entries);
  }

  get size(): number {
    return this.entries.size;
  }

  toPersisted(): PersistedIndexContent {
    const documents: PersistedDocument[] = [];
    for (const document of this.documents.values()) {
      const { chunkIds: _chunkIds, ...info } = document;
      documents.push(info);
    }

    return {
      dimension: this.dimension,
      documents,
      entries: [...this.entries.values()].map(entry => ({ chunk: entry.chunk, vector: [...entry.vector] }))
    };
  }
}

/**
 * Mutable working copy of a snapshot. Nothing here is visible to readers until the
 * owning index commits it.
 */
export class IndexWriteBatch {
  private readonly documents: Map<string, IndexedDocument>;
  private readonly entries: Map<string, IndexEntry>;
  private dimension: number | null;
  private changed = false;

  constructor(
    base: IndexSnapshot,
    readonly rebuild: boolean = false
  ) {
    this.documents = rebuild ? new Map() : new Map(base.documents);
    this.entries = rebuild ? new Map() : new Map(base.entries);
    this.dimension = rebuild ? null : base.dimension;
    this.changed = rebuild;
  }

  get hasChanges(): boolean {
    return this.changed;
  }

  getDocument(documentId: string): IndexedDocument | undefined {
    return this.documents.get(documentId);
  }

  /** Inserts or overwrites entries by chunk id. */
  upsert(records: readonly IndexRecord[]): void {
    for (const record of records) {
      this.validateRecord(record);

      const existing = this.documents.get(record.document.id);
      const chunkIds = existing?.chunkIds.includes(record.chunkId)
        ? existing.chunkIds
        : [...(existing?.chunkIds ?? []), record.chunkId];

      this.documents.set(record.document.id, { ...record.document, chunkIds });
      this.entries.set(record.chunkId, {
        chunk: record.chunk,
        vector: [...record.vector],
        norm: vectorNorm(record.vector),
        documentId: record.document.id
      });
      this.changed = true;
    }
  }

  /** Removes a document together with all of its chunks. */
  delete(documentId: string): boolean {
    const document = this.documents.get(documentId);
    if (!document) {
      return false;
    }

    for (const chunkId of document.chunkIds) {
      this.entries.delete(chunkId);
    }
    this.documents.delete(documentId);
    this.changed = true;
    return true;
  }

  replaceDocument(document: IndexedDocumentInfo, chunks: readonly Chunk[], vectors: readonly number[][]): void {
    if (chunks.length !== vectors.length) {
      throw new Error(`Expected ${chunks.length} vectors for ${document.sourceUrl}, got ${vectors.length}`);
    }

    this.delete(document.id);
    this.upsert(
      chunks.map((chunk, i) => ({
        chunkId: chunk.id,
        vector: vectors[i],
        corpus: chunk.corpus,
        chunk,
        document
      }))
    );
  }

  toSnapshot(generation: number): IndexSnapshot {
    return IndexSnapshot.create(generation, this.dimension, this.documents, this.entries);
  }

  private validateRecord(record: IndexRecord): void {
    if (record.chunkId !== record.chunk.id || record.chunk.documentId !== record.document.id) {
      throw new Error(`Index record ${record.chunkId} does not match its chunk or document`);
    }
    if (record.corpus !== record.chunk.corpus || record.corpus !== record.document.corpus) {
      throw new Error(`Index record ${record.chunkId} has inconsistent corpus tags`);
    }
    if (record.vector.length === 0) {
      throw new Error(`Index record ${record.chunkId} has an empty vector`);
    }

    if (this.dimension === null) {
      this.dimension = record.vector.length;
    } else if (record.vector.length !== this.dimension) {
      throw new EmbeddingDimensionMismatchError(this.dimension, record.vector.length);
    }
  }
}
