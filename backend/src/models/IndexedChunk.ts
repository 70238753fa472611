import mongoose, { Schema } from 'mongoose';
import type { Corpus, DocumentMetadata } from '../types/Pipeline';

export interface IIndexedChunk {
  _id?: string;
  generation: number;
  chunkId: string;
  documentId: string;
  sourceUrl: string;
  title?: string;
  corpus: Corpus;
  fetchedAt: Date;
  contentHash: string;
  metadata: DocumentMetadata;
  text: string;
  startOffset: number;
  endOffset: number;
  embedding: number[];
  createdAt?: Date;
  updatedAt?: Date;
}

const IndexedChunkSchema = new Schema<IIndexedChunk>({
  generation: {
    type: Number,
    required: true
  },
  chunkId: {
    type: String,
    required: true
  },
  documentId: {
    type: String,
    required: true
  },
  sourceUrl: {
    type: String,
    required: true,
    trim: true
  },
  title: {
    type: String,
    required: false
  },
  corpus: {
    type: String,
    required: true,
    enum: ['course', 'forum']
  },
  fetchedAt: {
    type: Date,
    required: true
  },
  contentHash: {
    type: String,
    required: true
  },
  metadata: {
    type: Schema.Types.Mixed,
    default: {}
  },
  text: {
    type: String,
    required: true
  },
  startOffset: {
    type: Number,
    required: true,
    min: 0
  },
  endOffset: {
    type: Number,
    required: true,
    min: 0
  },
  embedding: {
    type: [Number],
    required: true,
    validate: {
      validator: function(arr: number[]) {
        return arr.length > 0;
      },
      message: 'Embedding must not be empty'
    }
  }
}, {
  timestamps: true,
  collection: 'indexed_chunks'
});

IndexedChunkSchema.index({ generation: 1, chunkId: 1 }, { unique: true });
IndexedChunkSchema.index({ generation: 1, documentId: 1, startOffset: 1 });

export const IndexedChunk = mongoose.model<IIndexedChunk>('IndexedChunk', IndexedChunkSchema);
export default IndexedChunk;
