import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors/PipelineErrors';
import type { ChunkingConfig, LLMConfig } from '../types/LLM';

dotenv.config();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3001),
  MONGODB_URI: z.string().optional(),
  INDEX_STORE: z.enum(['mongo', 'memory']).default('mongo'),

  LLM_PROVIDER: z.enum(['ollama', 'openai']).default('ollama'),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('mistral'),
  OLLAMA_EMBEDDING_MODEL: z.string().default('nomic-embed-text'),
  OLLAMA_VISION_MODEL: z.string().default('llava'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_VISION_MODEL: z.string().default('gpt-4o-mini'),

  CHUNK_MAX_TOKENS: positiveInt(300),
  CHUNK_OVERLAP_TOKENS: z.coerce.number().int().min(0).default(50),
  RETRIEVAL_K: positiveInt(5),
  RETRIEVAL_MAX_CANDIDATES: z.coerce.number().int().positive().optional(),
  SIMILARITY_FLOOR: z.coerce.number().min(-1).max(1).default(0.2),
  MAX_LINKS: positiveInt(5),
  EXCERPT_LENGTH: positiveInt(200),
  CAPTION_MAX_CHARS: positiveInt(1500),
  CAPABILITY_TIMEOUT_MS: positiveInt(30000),
  CAPABILITY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  CAPABILITY_BACKOFF_MS: z.coerce.number().int().min(0).default(250)
});

export type Environment = z.infer<typeof envSchema>;

export interface RetryConfig {
  maxRetries: number;
  backoffMs: number;
  timeoutMs: number;
}

export interface RetrievalConfig {
  k: number;
  maxCandidates: number;
  similarityFloor: number;
}

export interface SynthesisConfig {
  maxLinks: number;
  excerptLength: number;
}

export interface AppConfig {
  port: number;
  mongoUri?: string;
  indexStore: 'mongo' | 'memory';
  llm: LLMConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  synthesis: SynthesisConfig;
  captionMaxChars: number;
  retry: RetryConfig;
}

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const lines = result.error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(
      `Missing or invalid environment variables:\n${lines.join('\n')}\n\nPlease check your .env file.`
    );
  }

  return result.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = parseEnvironment(source);

  if (env.CHUNK_OVERLAP_TOKENS >= env.CHUNK_MAX_TOKENS) {
    throw new ConfigurationError('CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_MAX_TOKENS');
  }

  const maxCandidates = Math.min(env.RETRIEVAL_MAX_CANDIDATES ?? env.RETRIEVAL_K * 2, env.RETRIEVAL_K * 2);

  const llm: LLMConfig =
    env.LLM_PROVIDER === 'openai'
      ? {
          provider: 'openai',
          model: env.OPENAI_MODEL,
          embeddingModel: env.OPENAI_EMBEDDING_MODEL,
          visionModel: env.OPENAI_VISION_MODEL,
          apiKey: env.OPENAI_API_KEY,
          baseUrl: env.OPENAI_BASE_URL
        }
      : {
          provider: 'ollama',
          model: env.OLLAMA_MODEL,
          embeddingModel: env.OLLAMA_EMBEDDING_MODEL,
          visionModel: env.OLLAMA_VISION_MODEL,
          apiKey: 'not-needed',
          baseUrl: env.OLLAMA_BASE_URL
        };

  return {
    port: env.PORT,
    mongoUri: env.MONGODB_URI,
    indexStore: env.INDEX_STORE,
    llm,
    chunking: {
      maxTokens: env.CHUNK_MAX_TOKENS,
      overlapTokens: env.CHUNK_OVERLAP_TOKENS
    },
    retrieval: {
      k: env.RETRIEVAL_K,
      maxCandidates,
      similarityFloor: env.SIMILARITY_FLOOR
    },
    synthesis: {
      maxLinks: env.MAX_LINKS,
      excerptLength: env.EXCERPT_LENGTH
    },
    captionMaxChars: env.CAPTION_MAX_CHARS,
    retry: {
      maxRetries: env.CAPABILITY_MAX_RETRIES,
      backoffMs: env.CAPABILITY_BACKOFF_MS,
      timeoutMs: env.CAPABILITY_TIMEOUT_MS
    }
  };
}
