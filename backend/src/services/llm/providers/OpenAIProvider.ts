import { z } from 'zod';
import {
  LLMProvider,
  EmbeddingResponse,
  ChatResponse,
  ChatMessage,
  ProviderRequestOptions
} from '../base/LLMProvider';

type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

interface OpenAIChatRequest {
  model: string;
  messages: Array<{
    role: string;
    content: string | OpenAIContentPart[];
  }>;
  temperature: number;
  max_tokens: number;
}

const openAIChatResponseSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({ role: z.string(), content: z.string().nullable() }).optional(),
        finish_reason: z.string().nullish()
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

const openAIEmbeddingResponseSchema = z.object({
  model: z.string().optional(),
  data: z.array(z.object({ embedding: z.array(z.number()) })).optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

/**
 * Talks to any OpenAI-compatible gateway (`/embeddings`, `/chat/completions`).
 */
export class OpenAIProvider extends LLMProvider {
  private readonly baseUrl: string;
  private readonly defaultMaxTokens = 1024;
  private readonly defaultTemperature = 0.7;

  constructor(
    apiKey: string,
    model: string = 'gpt-4o-mini',
    embeddingModel: string = 'text-embedding-3-small',
    visionModel: string = 'gpt-4o-mini',
    baseUrl: string = 'https://api.openai.com/v1'
  ) {
    super(apiKey, model, embeddingModel, visionModel);
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async generateEmbedding(text: string, options: ProviderRequestOptions = {}): Promise<EmbeddingResponse> {
    this.validateApiKey();
    this.validateText(text);

    try {
      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ model: this.embeddingModel, input: text }),
        signal: options.signal
      });

      if (!response.ok) {
        throw await this.requestError(response);
      }

      const data = openAIEmbeddingResponseSchema.parse(await response.json());
      const embedding = data.data?.[0]?.embedding;

      if (!embedding || embedding.length === 0) {
        throw new Error('No embedding data received from OpenAI API');
      }

      return {
        embedding,
        model: data.model || this.embeddingModel,
        usage: data.usage
          ? { promptTokens: data.usage.prompt_tokens, totalTokens: data.usage.total_tokens }
          : undefined
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
    this.validateApiKey();
    this.validateMessages(messages);

    try {
      const chatMessages = [...messages];
      if (systemPrompt) {
        chatMessages.unshift({ role: 'system', content: systemPrompt });
      }

      const requestBody: OpenAIChatRequest = {
        model: options.model || this.model,
        messages: chatMessages.map(msg => ({
          role: msg.role,
          content: msg.images?.length ? this.toContentParts(msg) : msg.content
        })),
        temperature: options.temperature ?? this.defaultTemperature,
        max_tokens: this.defaultMaxTokens
      };

      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(requestBody),
        signal: options.signal
      });

      if (!response.ok) {
        throw await this.requestError(response);
      }

      const data = openAIChatResponseSchema.parse(await response.json());
      const choice = data.choices?.[0];
      const content = choice?.message?.content;

      if (!content) {
        throw new Error('No response message received from OpenAI API');
      }

      return {
        content,
        model: data.model,
        usage: data.usage
          ? {
              promptTokens: data.usage.prompt_tokens,
              completionTokens: data.usage.completion_tokens,
              totalTokens: data.usage.total_tokens
            }
          : undefined,
        finishReason: choice?.finish_reason ?? undefined
      };
    } catch (error) {
      throw this.describeFailure('chat generation', error);
    }
  }

  getProviderName(): string {
    return 'OpenAI-compatible';
  }

  getModelInfo() {
    return {
      chatModel: this.model,
      embeddingModel: this.embeddingModel,
      visionModel: this.visionModel,
      maxTokens: this.defaultMaxTokens,
      contextWindow: 128000
    };
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`
    };
  }

  private toContentParts(message: ChatMessage): OpenAIContentPart[] {
    const parts: OpenAIContentPart[] = [];
    if (message.content) {
      parts.push({ type: 'text', text: message.content });
    }
    for (const image of message.images ?? []) {
      parts.push({ type: 'image_url', image_url: { url: `data:${image.mimeType};base64,${image.base64}` } });
    }
    return parts;
  }
}
