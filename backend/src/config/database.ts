import mongoose from 'mongoose';
import { ConfigurationError, errorMessage } from '../errors/PipelineErrors';
import IndexGeneration from '../models/IndexGeneration';

export interface DatabaseHealth {
  status: 'healthy' | 'disconnected' | 'error';
  readyState: number;
  database?: string;
  /** newest index generation committed by any process sharing this database */
  committedGeneration?: number;
  error?: string;
}

/**
 * The MongoDB connection shared by the index store and the chat history. The
 * server and the ingest script each open one.
 */
export class MongoConnection {
  private connected = false;

  constructor(private readonly uri: string | undefined) {}

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    if (!this.uri) {
      throw new ConfigurationError('MONGODB_URI must be set when INDEX_STORE is mongo');
    }

    await mongoose.connect(this.uri);
    this.connected = true;
    console.log(`Connected to MongoDB database ${mongoose.connection.name}`);

    mongoose.connection.on('error', error => {
      console.error('MongoDB connection error:', error);
    });
    mongoose.connection.on('disconnected', () => {
      console.warn('MongoDB disconnected; index commits and chat history writes will fail until it reconnects');
    });
    mongoose.connection.on('reconnected', () => {
      console.log('MongoDB reconnected');
    });
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    await mongoose.disconnect();
    this.connected = false;
    console.log('Disconnected from MongoDB');
  }

  async healthCheck(): Promise<DatabaseHealth> {
    const { readyState, db } = mongoose.connection;
    if (!this.connected || !db) {
      return { status: 'disconnected', readyState };
    }

    try {
      await db.admin().ping();
      const latest = await IndexGeneration.findOne({ status: 'committed' })
        .sort({ generation: -1 })
        .select('generation')
        .lean();

      return {
        status: 'healthy',
        readyState,
        database: mongoose.connection.name,
        committedGeneration: latest?.generation ?? 0
      };
    } catch (error) {
      return { status: 'error', readyState, error: errorMessage(error) };
    }
  }
}
