import { MongoConnection } from '../config/database';
import { loadConfig } from '../config/environment';
import { JsonFileDocumentSource } from '../services/ingestion/DocumentSource';
import { LLMService } from '../services/llm/LLMService';
import { createPipeline } from '../services/pipeline/createPipeline';
import { MongoIndexStore } from '../services/vector/stores/MongoIndexStore';

const USAGE = 'Usage: ingest <documents.json> [--rebuild] [--forum-from=<date>] [--forum-to=<date>]';

function dateFlag(args: string[], name: string): Date | undefined {
  const prefix = `--${name}=`;
  const value = args.find(arg => arg.startsWith(prefix))?.slice(prefix.length);
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--${name} is not a date: ${value}`);
  }
  return date;
}

async function main() {
  const args = process.argv.slice(2);
  const rebuild = args.includes('--rebuild');
  const filePath = args.find(arg => !arg.startsWith('--'));

  if (!filePath) {
    console.error(USAGE);
    process.exit(1);
  }
  const forumWindow = { from: dateFlag(args, 'forum-from'), to: dateFlag(args, 'forum-to') };

  const config = loadConfig();
  if (config.indexStore !== 'mongo') {
    console.warn('INDEX_STORE is not mongo; ingesting into MongoDB anyway so the index outlives this process');
  }

  const mongo = new MongoConnection(config.mongoUri);
  await mongo.connect();

  try {
    const llm = new LLMService(config.llm);
    const orchestrator = await createPipeline(
      config,
      { embeddings: llm, completion: llm, captioner: llm },
      { indexStore: new MongoIndexStore() }
    );

    const report = await orchestrator.ingestFrom(new JsonFileDocumentSource(filePath), { rebuild, forumWindow });
    console.log('Ingestion finished:', report);
  } finally {
    await mongo.disconnect();
  }
}

main().catch(error => {
  console.error('Ingestion failed:', error);
  process.exit(1);
});
