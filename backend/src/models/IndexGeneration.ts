import mongoose, { Schema } from 'mongoose';

export type GenerationStatus = 'building' | 'committed' | 'failed';

/** Manifest row for one persisted generation of the embedding index. */
export interface IIndexGeneration {
  _id?: string;
  generation: number;
  status: GenerationStatus;
  dimension: number | null;
  documentCount: number;
  chunkCount: number;
  committedAt?: Date;
  createdAt?: Date;
  updatedAt?: Date;
}

const IndexGenerationSchema = new Schema<IIndexGeneration>({
  generation: {
    type: Number,
    required: true,
    unique: true
  },
  status: {
    type: String,
    required: true,
    enum: ['building', 'committed', 'failed'],
    default: 'building'
  },
  dimension: {
    type: Number,
    required: false,
    default: null
  },
  documentCount: {
    type: Number,
    required: true,
    min: 0
  },
  chunkCount: {
    type: Number,
    required: true,
    min: 0
  },
  committedAt: {
    type: Date,
    required: false
  }
}, {
  timestamps: true,
  collection: 'index_generations'
});

IndexGenerationSchema.index({ status: 1, generation: -1 });

export const IndexGeneration = mongoose.model<IIndexGeneration>('IndexGeneration', IndexGenerationSchema);
export default IndexGeneration;
