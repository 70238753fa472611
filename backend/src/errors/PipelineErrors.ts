export class IngestionError extends Error {
  constructor(
    public readonly sourceUrl: string,
    reason: string
  ) {
    super(`Cannot ingest ${sourceUrl || '<missing url>'}: ${reason}`);
    this.name = 'IngestionError';
  }
}

export class EmbeddingCapabilityError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'EmbeddingCapabilityError';
  }
}

export class CompletionCapabilityError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CompletionCapabilityError';
  }
}

export class CaptioningCapabilityError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CaptioningCapabilityError';
  }
}

export class AttachmentProcessingError extends Error {
  constructor(
    public readonly attachmentIndex: number,
    reason: string
  ) {
    super(`Attachment ${attachmentIndex + 1} could not be processed: ${reason}`);
    this.name = 'AttachmentProcessingError';
  }
}

export class IndexCorruptionError extends Error {
  constructor(
    reason: string,
    public readonly generation?: number
  ) {
    super(
      generation === undefined
        ? `Persisted index is unreadable: ${reason}`
        : `Persisted index generation ${generation} is unreadable: ${reason}`
    );
    this.name = 'IndexCorruptionError';
  }
}

export class IndexConflictError extends Error {
  constructor(
    public readonly baseGeneration: number,
    public readonly conflictingGeneration: number
  ) {
    super(
      `Cannot commit on top of index generation ${baseGeneration}: generation ${conflictingGeneration} belongs to another writer`
    );
    this.name = 'IndexConflictError';
  }
}

export class EmbeddingDimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Embedding dimension ${actual} does not match index dimension ${expected}; rebuild the index to change embedding models`
    );
    this.name = 'EmbeddingDimensionMismatchError';
  }
}

export class QueryAbortedError extends Error {
  constructor(public readonly stage: string) {
    super(`Query abandoned by caller during ${stage}`);
    this.name = 'QueryAbortedError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type CapabilityError =
  | EmbeddingCapabilityError
  | CompletionCapabilityError
  | CaptioningCapabilityError;

export function isCapabilityError(error: unknown): error is CapabilityError {
  return (
    error instanceof EmbeddingCapabilityError ||
    error instanceof CompletionCapabilityError ||
    error instanceof CaptioningCapabilityError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/** A provider request that failed; `retryable` is false when sending it again cannot succeed. */
export class ProviderRequestError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderRequestError';
  }
}

/** Request timeouts, rate limits and server errors; every other 4xx is permanent. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class CapabilityTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CapabilityTimeoutError';
  }
}
