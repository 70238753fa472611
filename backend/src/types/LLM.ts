export type SupportedProvider = 'ollama' | 'openai';

export interface LLMConfig {
  provider: SupportedProvider;
  model: string;
  embeddingModel: string;
  visionModel: string;
  apiKey: string;
  baseUrl: string;
}

export interface ChunkingConfig {
  maxTokens: number;
  overlapTokens: number;
}

export interface CapabilityCallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingCapability {
  embed(text: string, options?: CapabilityCallOptions): Promise<number[]>;
}

export interface CompletionCapability {
  complete(prompt: string, options?: CapabilityCallOptions): Promise<string>;
}

export interface ImageCaptioner {
  describeImage(image: Buffer, mimeType: string, options?: CapabilityCallOptions): Promise<string>;
}
