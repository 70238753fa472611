import { MongoConnection } from './config/database';
import { loadConfig } from './config/environment';
import { createApp } from './app';
import { LLMService } from './services/llm/LLMService';
import { createPipeline } from './services/pipeline/createPipeline';
import { InMemoryChatHistoryStore } from './services/history/ChatHistoryStore';
import { MongoChatHistoryStore } from './services/history/MongoChatHistoryStore';
import { InMemoryIndexStore } from './services/vector/stores/InMemoryIndexStore';
import { MongoIndexStore } from './services/vector/stores/MongoIndexStore';

let mongo: MongoConnection | undefined;

async function startServer() {
  try {
    const config = loadConfig();
    if (config.indexStore === 'mongo') {
      mongo = new MongoConnection(config.mongoUri);
      await mongo.connect();
    }

    const llm = new LLMService(config.llm);
    console.log('LLM configured:', llm.getProviderInfo());

    const orchestrator = await createPipeline(
      config,
      { embeddings: llm, completion: llm, captioner: llm },
      mongo
        ? { indexStore: new MongoIndexStore(), history: new MongoChatHistoryStore() }
        : { indexStore: new InMemoryIndexStore(), history: new InMemoryChatHistoryStore() }
    );

    const stats = orchestrator.getIndexStats();
    console.log(`Index ${stats.status}: generation ${stats.generation}, ${stats.documents} documents, ${stats.chunks} chunks`);

    const connection = mongo;
    const app = createApp(orchestrator, {
      databaseHealth: connection ? () => connection.healthCheck() : undefined
    });

    app.listen(config.port, () => {
      console.log(`Course Q&A Backend running on port ${config.port}`);
      console.log(`Health check: http://localhost:${config.port}/api/health`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

process.on('SIGINT', async () => {
  console.log('\nShutting down gracefully...');
  try {
    await mongo?.disconnect();
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
});

startServer();
