import mongoose from 'mongoose';
import IndexGeneration, { IIndexGeneration } from '../../../models/IndexGeneration';
import IndexedChunk, { IIndexedChunk } from '../../../models/IndexedChunk';
import { IndexConflictError, IndexCorruptionError } from '../../../errors/PipelineErrors';
import type { PersistedDocument, PersistedEntry, PersistedIndex, PersistedIndexContent } from '../IndexSnapshot';
import type { IndexStore } from './IndexStore';

const INSERT_BATCH_SIZE = 500;
/** A generation left `building` this long is taken to belong to a writer that died. */
const ABANDONED_BUILD_MS = 30 * 60 * 1000;

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000;
}

/**
 * Stores every committed index as a generation of `indexed_chunks` rows. A
 * generation becomes visible only when its manifest flips to `committed`, so a
 * crash mid-write leaves the previous generation as the one that loads.
 */
export class MongoIndexStore implements IndexStore {
  async load(): Promise<PersistedIndex | null> {
    const manifest = await IndexGeneration.findOne({ status: 'committed' })
      .sort({ generation: -1 })
      .lean();

    if (!manifest) {
      return null;
    }

    const { generation } = manifest;
    const rows = await IndexedChunk.find({ generation })
      .sort({ documentId: 1, startOffset: 1 })
      .lean();

    if (rows.length !== manifest.chunkCount) {
      throw new IndexCorruptionError(`expected ${manifest.chunkCount} chunks, found ${rows.length}`, generation);
    }

    const documents = new Map<string, PersistedDocument>();
    const entries: PersistedEntry[] = [];

    for (const row of rows) {
      if (!documents.has(row.documentId)) {
        documents.set(row.documentId, {
          id: row.documentId,
          sourceUrl: row.sourceUrl,
          title: row.title ?? undefined,
          corpus: row.corpus,
          fetchedAt: row.fetchedAt,
          contentHash: row.contentHash,
          metadata: row.metadata ?? {}
        });
      }
      entries.push({
        chunk: {
          id: row.chunkId,
          documentId: row.documentId,
          text: row.text,
          startOffset: row.startOffset,
          endOffset: row.endOffset,
          corpus: row.corpus
        },
        vector: row.embedding
      });
    }

    if (documents.size !== manifest.documentCount) {
      throw new IndexCorruptionError(
        `expected ${manifest.documentCount} documents, found ${documents.size}`,
        generation
      );
    }

    console.log(`Loaded index generation ${generation}: ${documents.size} documents, ${entries.length} chunks`);

    return {
      generation,
      dimension: manifest.dimension ?? null,
      documents: [...documents.values()],
      entries
    };
  }

  async commit(content: PersistedIndexContent, baseGeneration: number): Promise<number> {
    const latest = await IndexGeneration.findOne({ status: 'committed' })
      .sort({ generation: -1 })
      .select('generation')
      .lean();
    const latestGeneration = latest?.generation ?? 0;
    if (latestGeneration !== baseGeneration) {
      throw new IndexConflictError(baseGeneration, latestGeneration);
    }

    const generation = baseGeneration + 1;
    await this.claim(generation, content);

    try {
      const rows = this.toRows(generation, content);
      for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
        await IndexedChunk.insertMany(rows.slice(i, i + INSERT_BATCH_SIZE), { ordered: true });
      }

      await IndexGeneration.updateOne(
        { generation },
        { $set: { status: 'committed', committedAt: new Date() } }
      );
    } catch (error) {
      console.error(`Failed to write index generation ${generation}:`, error);
      await this.discard(generation);
      throw error;
    }

    await this.prune(generation);
    console.log(`Committed index generation ${generation} (${content.entries.length} chunks)`);
    return generation;
  }

  describe(): string {
    return 'mongodb';
  }

  /**
   * Inserts the `building` manifest for `generation`. The unique index on
   * `generation` makes this the point where concurrent writers are ordered:
   * whoever inserts second gets a conflict.
   */
  private async claim(generation: number, content: PersistedIndexContent): Promise<void> {
    const manifest: IIndexGeneration = {
      generation,
      status: 'building',
      dimension: content.dimension,
      documentCount: content.documents.length,
      chunkCount: content.entries.length
    };

    try {
      await IndexGeneration.create(manifest);
      return;
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
    }

    const holder = await IndexGeneration.findOne({ generation }).lean();
    if (holder && !this.isAbandoned(holder)) {
      throw new IndexConflictError(generation - 1, generation);
    }

    if (holder) {
      const { deletedCount } = await IndexGeneration.deleteOne({ _id: holder._id, status: holder.status });
      if (deletedCount === 0) {
        throw new IndexConflictError(generation - 1, generation);
      }
      console.warn(`Reclaimed ${holder.status} index generation ${generation}`);
      await IndexedChunk.deleteMany({ generation });
    }

    try {
      await IndexGeneration.create(manifest);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new IndexConflictError(generation - 1, generation);
      }
      throw error;
    }
  }

  private isAbandoned(manifest: IIndexGeneration): boolean {
    if (manifest.status === 'failed') {
      return true;
    }
    if (manifest.status === 'committed' || !manifest.updatedAt) {
      return false;
    }
    return Date.now() - manifest.updatedAt.getTime() > ABANDONED_BUILD_MS;
  }

  private toRows(generation: number, content: PersistedIndexContent): IIndexedChunk[] {
    const documents = new Map(content.documents.map(document => [document.id, document]));

    return content.entries.map(({ chunk, vector }) => {
      const document = documents.get(chunk.documentId);
      if (!document) {
        throw new Error(`Chunk ${chunk.id} has no document in the committed index`);
      }
      return {
        generation,
        chunkId: chunk.id,
        documentId: chunk.documentId,
        sourceUrl: document.sourceUrl,
        title: document.title,
        corpus: chunk.corpus,
        fetchedAt: document.fetchedAt,
        contentHash: document.contentHash,
        metadata: document.metadata,
        text: chunk.text,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        embedding: vector
      };
    });
  }

  private async discard(generation: number): Promise<void> {
    try {
      await IndexGeneration.updateOne({ generation }, { $set: { status: 'failed' } });
      await IndexedChunk.deleteMany({ generation });
    } catch (error) {
      console.error(`Failed to clean up index generation ${generation}:`, error);
    }
  }

  /** Keeps the new generation and the one before it. */
  private async prune(generation: number): Promise<void> {
    try {
      const previous = await IndexGeneration.findOne({ status: 'committed', generation: { $lt: generation } })
        .sort({ generation: -1 })
        .select('generation')
        .lean();
      const keepFrom = previous?.generation ?? generation;

      const removed = await IndexedChunk.deleteMany({ generation: { $lt: keepFrom } });
      await IndexGeneration.deleteMany({ generation: { $lt: keepFrom } });

      if (removed.deletedCount > 0) {
        console.log(`Pruned ${removed.deletedCount} chunks from generations before ${keepFrom}`);
      }
    } catch (error) {
      console.error('Failed to prune old index generations:', error);
    }
  }
}
