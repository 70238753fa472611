import { z } from 'zod';
import {
  LLMProvider,
  EmbeddingResponse,
  ChatResponse,
  ChatMessage,
  ProviderRequestOptions
} from '../base/LLMProvider';

interface OllamaEmbeddingRequest {
  model: string;
  prompt: string;
}

const ollamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).optional()
});

interface OllamaChatRequest {
  model: string;
  messages: Array<{
    role: string;
    content: string;
    images?: string[];
  }>;
  stream: boolean;
  options?: {
    temperature?: number;
    num_predict?: number;
  };
}

const ollamaChatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z.string()
    })
    .optional(),
  done: z.boolean(),
  total_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

export class OllamaProvider extends LLMProvider {
  private readonly baseUrl: string;
  private readonly defaultMaxTokens = 4000;
  private readonly defaultTemperature = 0.7;

  constructor(
    apiKey: string = 'not-needed',
    model: string = 'mistral',
    embeddingModel: string = 'nomic-embed-text',
    visionModel: string = 'llava',
    baseUrl: string = 'http://localhost:11434'
  ) {
    super(apiKey, model, embeddingModel, visionModel);
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async generateEmbedding(text: string, options: ProviderRequestOptions = {}): Promise<EmbeddingResponse> {
    this.validateText(text);

    try {
      const requestBody: OllamaEmbeddingRequest = {
        model: this.embeddingModel,
        prompt: text
      };

      const response = await fetch(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(requestBody),
        signal: options.signal
      });

      if (!response.ok) {
        throw await this.requestError(response);
      }

      const data = ollamaEmbeddingResponseSchema.parse(await response.json());

      if (!data.embedding || data.embedding.length === 0) {
        throw new Error('No embedding data received from Ollama API');
      }

      return {
        embedding: data.embedding,
        model: this.embeddingModel,
        usage: {
          promptTokens: Math.ceil(text.split(' ').length * 1.3),
          totalTokens: Math.ceil(text.split(' ').length * 1.3)
        }
      };

    } catch (error) {
      throw this.describeFailure('embedding generation', error);
    }
  }

  async generateResponse(
    messages: ChatMessage[],
    systemPrompt?: string,
    options: ProviderRequestOptions = {}
  ): Promise<ChatResponse> {
    this.validateMessages(messages);

    try {
      const chatMessages = [...messages];

      if (systemPrompt) {
        chatMessages.unshift({
          role: 'system',
          content: systemPrompt
        });
      }

      const requestBody: OllamaChatRequest = {
        model: options.model || this.model,
        messages: chatMessages.map(msg => ({
          role: msg.role,
          content: msg.content,
          ...(msg.images?.length ? { images: msg.images.map(image => image.base64) } : {})
        })),
        stream: false,
        options: {
          temperature: options.temperature ?? this.defaultTemperature,
          num_predict: this.defaultMaxTokens
        }
      };

      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(requestBody),
        signal: options.signal
      });

      if (!response.ok) {
        throw await this.requestError(response);
      }

      const data = ollamaChatResponseSchema.parse(await response.json());

      if (!data.message || !data.message.content) {
        throw new Error('No response message received from Ollama API');
      }

      return {
        content: data.message.content,
        model: data.model,
        usage: {
          promptTokens: data.prompt_eval_count || 0,
          completionTokens: data.eval_count || 0,
          totalTokens: (data.prompt_eval_count || 0) + (data.eval_count || 0)
        },
        finishReason: data.done ? 'stop' : 'length'
      };

    } catch (error) {
      throw this.describeFailure('chat generation', error);
    }
  }

  getProviderName(): string {
    return 'Ollama';
  }

  getModelInfo() {
    return {
      chatModel: this.model,
      embeddingModel: this.embeddingModel,
      visionModel: this.visionModel,
      maxTokens: this.defaultMaxTokens,
      contextWindow: 32000
    };
  }
}
