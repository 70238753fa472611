import type { Response } from 'express';
import {
  CapabilityTimeoutError,
  EmbeddingDimensionMismatchError,
  IndexConflictError,
  IndexCorruptionError,
  QueryAbortedError,
  ValidationError,
  isCapabilityError
} from '../errors/PipelineErrors';

/** Status set by Express middleware on its own client errors, such as a body that is not JSON. */
function middlewareClientStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof EmbeddingDimensionMismatchError || error instanceof IndexConflictError) return 409;
  if (error instanceof QueryAbortedError) return 499;
  if (isCapabilityError(error) || error instanceof CapabilityTimeoutError) return 502;
  if (error instanceof IndexCorruptionError) return 503;
  return middlewareClientStatus(error) ?? 500;
}

export function sendError(res: Response, error: unknown): void {
  const status = statusFor(error);
  if (status >= 500) {
    console.error('Request failed:', error);
  }
  if (res.headersSent || res.writableEnded) {
    return;
  }

  res.status(status).json({
    error: error instanceof Error ? error.name : 'Error',
    message: error instanceof Error ? error.message : 'Unknown error'
  });
}
