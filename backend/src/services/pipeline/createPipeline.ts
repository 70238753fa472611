import type { AppConfig } from '../../config/environment';
import type { CompletionCapability, EmbeddingCapability, ImageCaptioner } from '../../types/LLM';
import { CourseTextChunker } from '../chunking/CourseTextChunker';
import type { ChatHistoryStore } from '../history/ChatHistoryStore';
import { DocumentNormalizer } from '../ingestion/DocumentNormalizer';
import { QueryNormalizer } from '../query/QueryNormalizer';
import { Retriever } from '../retrieval/Retriever';
import { AnswerSynthesizer } from '../synthesis/AnswerSynthesizer';
import { EmbeddingIndex } from '../vector/EmbeddingIndex';
import type { IndexStore } from '../vector/stores/IndexStore';
import { PipelineOrchestrator } from './PipelineOrchestrator';

export type PipelineSettings = Pick<AppConfig, 'chunking' | 'retrieval' | 'synthesis' | 'captionMaxChars' | 'retry'>;

export interface PipelineCapabilities {
  embeddings: EmbeddingCapability;
  completion: CompletionCapability;
  captioner: ImageCaptioner;
}

export interface PipelineStores {
  indexStore: IndexStore;
  history?: ChatHistoryStore;
  now?: () => Date;
}

/** Opens the persisted index and assembles the pipeline around it. */
export async function createPipeline(
  settings: PipelineSettings,
  capabilities: PipelineCapabilities,
  stores: PipelineStores
): Promise<PipelineOrchestrator> {
  const index = await EmbeddingIndex.open(stores.indexStore);
  const { retry } = settings;

  return new PipelineOrchestrator({
    documentNormalizer: new DocumentNormalizer({ now: stores.now }),
    chunker: new CourseTextChunker(settings.chunking),
    index,
    embeddings: capabilities.embeddings,
    queryNormalizer: new QueryNormalizer(capabilities.captioner, {
      captionMaxChars: settings.captionMaxChars,
      retry
    }),
    retriever: new Retriever(capabilities.embeddings, index, { ...settings.retrieval, retry }),
    synthesizer: new AnswerSynthesizer(capabilities.completion, { ...settings.synthesis, retry }),
    history: stores.history,
    retry
  });
}
