import { ZodError } from 'zod';
import { ProviderRequestError, isTransientStatus } from '../../../errors/PipelineErrors';

export interface EmbeddingResponse {
  embedding: number[];
  model: string;
  usage?: {
    promptTokens: number;
    totalTokens: number;
  };
}

export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  /** base64-encoded images attached to this message */
  images?: Array<{ mimeType: string; base64: string }>;
}

export interface ProviderRequestOptions {
  signal?: AbortSignal;
  model?: string;
  temperature?: number;
}

export abstract class LLMProvider {
  protected apiKey: string;
  protected model: string;
  protected embeddingModel: string;
  protected visionModel: string;

  constructor(apiKey: string, model: string, embeddingModel: string, visionModel: string) {
    this.apiKey = apiKey;
    this.model = model;
    this.embeddingModel = embeddingModel;
    this.visionModel = visionModel;
  }

  abstract generateEmbedding(text: string, options?: ProviderRequestOptions): Promise<EmbeddingResponse>;

  abstract generateResponse(
    messages: ChatMessage[],
    systemPrompt?: string,
    options?: ProviderRequestOptions
  ): Promise<ChatResponse>;

  abstract getProviderName(): string;

  abstract getModelInfo(): {
    chatModel: string;
    embeddingModel: string;
    visionModel: string;
    maxTokens: number;
    contextWindow: number;
  };

  getVisionModel(): string {
    return this.visionModel;
  }

  protected validateApiKey(): void {
    if (!this.apiKey || this.apiKey.trim() === '') {
      throw new ProviderRequestError(`${this.getProviderName()}: API key is required`, false);
    }
  }

  protected validateText(text: string): void {
    if (!text || text.trim() === '') {
      throw new ProviderRequestError('Text cannot be empty', false);
    }
  }

  protected validateMessages(messages: ChatMessage[]): void {
    if (!messages || messages.length === 0) {
      throw new ProviderRequestError('Messages array cannot be empty', false);
    }

    for (const message of messages) {
      if (!message.role || (!message.content && !message.images?.length)) {
        throw new ProviderRequestError('Each message must have role and content', false);
      }
    }
  }

  protected async requestError(response: Response): Promise<ProviderRequestError> {
    const body = await response.text().catch(() => 'Unknown error');
    return new ProviderRequestError(
      `${this.getProviderName()} API error: ${response.status} ${response.statusText} - ${body}`,
      isTransientStatus(response.status),
      response.status
    );
  }

  /** Prefixes `error` with what was being attempted, keeping whether it is worth retrying. */
  protected describeFailure(action: string, error: unknown): Error {
    const prefix = `${this.getProviderName()} ${action} failed`;
    if (error instanceof ProviderRequestError) {
      return new ProviderRequestError(`${prefix}: ${error.message}`, error.retryable, error.status);
    }
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
      return new ProviderRequestError(`${prefix}: unexpected response${where}: ${issue?.message ?? error.message}`, false);
    }
    if (error instanceof Error) {
      return new Error(`${prefix}: ${error.message}`);
    }
    return new Error(`${prefix}: unknown error`);
  }
}
