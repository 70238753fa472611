import { LLMProvider } from './base/LLMProvider';
import { OllamaProvider } from './providers/OllamaProvider';
import { OpenAIProvider } from './providers/OpenAIProvider';
import type {
  CapabilityCallOptions,
  CompletionCapability,
  EmbeddingCapability,
  ImageCaptioner,
  LLMConfig
} from '../../types/LLM';

const IMAGE_DESCRIPTION_PROMPT =
  'Describe this image in detail, focusing on technical content relevant to a student question. ' +
  'Transcribe any error messages, commands or code exactly as they appear.';

/**
 * Exposes the configured provider as the three model capabilities the pipeline
 * consumes: embeddings, completions and image descriptions.
 */
export class LLMService implements EmbeddingCapability, CompletionCapability, ImageCaptioner {
  private provider: LLMProvider;

  constructor(config: LLMConfig);
  constructor(provider: LLMProvider);
  constructor(source: LLMConfig | LLMProvider) {
    this.provider = source instanceof LLMProvider ? source : this.createProvider(source);
  }

  private createProvider(config: LLMConfig): LLMProvider {
    switch (config.provider) {
      case 'ollama':
        return new OllamaProvider(
          'not-needed',
          config.model || 'mistral',
          config.embeddingModel || 'nomic-embed-text',
          config.visionModel || 'llava',
          config.baseUrl || 'http://localhost:11434'
        );

      case 'openai':
        return new OpenAIProvider(
          config.apiKey,
          config.model,
          config.embeddingModel,
          config.visionModel,
          config.baseUrl
        );

      default:
        throw new Error(`Unsupported LLM provider: ${String(config.provider)}`);
    }
  }

  async embed(text: string, options: CapabilityCallOptions = {}): Promise<number[]> {
    const result = await this.provider.generateEmbedding(text, { signal: options.signal });
    return result.embedding;
  }

  async complete(prompt: string, options: CapabilityCallOptions = {}): Promise<string> {
    const result = await this.provider.generateResponse(
      [{ role: 'user', content: prompt }],
      undefined,
      { signal: options.signal, temperature: 0.2 }
    );
    return result.content;
  }

  async describeImage(image: Buffer, mimeType: string, options: CapabilityCallOptions = {}): Promise<string> {
    const result = await this.provider.generateResponse(
      [
        {
          role: 'user',
          content: IMAGE_DESCRIPTION_PROMPT,
          images: [{ mimeType, base64: image.toString('base64') }]
        }
      ],
      undefined,
      { signal: options.signal, model: this.provider.getVisionModel(), temperature: 0 }
    );
    return result.content;
  }

  getProviderInfo() {
    return {
      provider: this.provider.getProviderName(),
      ...this.provider.getModelInfo()
    };
  }
}
