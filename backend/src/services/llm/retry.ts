import { ZodError } from 'zod';
import {
  CapabilityTimeoutError,
  ProviderRequestError,
  QueryAbortedError,
  errorMessage
} from '../../errors/PipelineErrors';

export interface RetryOptions {
  /** attempts after the first one */
  maxRetries: number;
  backoffMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  operation: string;
}

const sleep = (ms: number, signal: AbortSignal | undefined, operation: string): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new QueryAbortedError(operation));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new QueryAbortedError(operation));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs one attempt bounded by `timeoutMs`. The attempt's own signal is aborted on
 * timeout or caller abort, and the returned promise settles even if the operation
 * ignores its signal.
 */
function runAttempt<T>(run: (signal: AbortSignal) => Promise<T>, options: RetryOptions): Promise<T> {
  const controller = new AbortController();
  const { signal: callerSignal, operation, timeoutMs } = options;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
      fn();
    };

    const onCallerAbort = () => {
      controller.abort();
      settle(() => reject(new QueryAbortedError(operation)));
    };
    const timer = setTimeout(() => {
      const timeoutError = new CapabilityTimeoutError(operation, timeoutMs);
      controller.abort(timeoutError);
      settle(() => reject(timeoutError));
    }, timeoutMs);

    if (callerSignal?.aborted) {
      onCallerAbort();
      return;
    }
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    run(controller.signal).then(
      value => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}

function isPermanent(error: unknown): boolean {
  return (error instanceof ProviderRequestError && !error.retryable) || error instanceof ZodError;
}

/**
 * Calls `run` until it succeeds, with exponential backoff between attempts.
 * Caller aborts are never retried, and permanent failures end the loop at once.
 * Otherwise `onExhausted` turns the last error into the error that is thrown.
 */
export async function withRetry<T>(
  run: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
  onExhausted: (lastError: unknown, attempts: number) => Error
): Promise<T> {
  const totalAttempts = options.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      return await runAttempt(run, options);
    } catch (error) {
      if (error instanceof QueryAbortedError) {
        throw error;
      }
      lastError = error;

      if (isPermanent(error)) {
        console.warn(`${options.operation} failed permanently, not retrying: ${errorMessage(error)}`);
        throw onExhausted(error, attempt);
      }

      if (attempt < totalAttempts) {
        const delay = options.backoffMs * 2 ** (attempt - 1);
        console.warn(
          `${options.operation} failed (attempt ${attempt}/${totalAttempts}), retrying in ${delay}ms:`,
          error instanceof Error ? error.message : error
        );
        await sleep(delay, options.signal, options.operation);
      }
    }
  }

  throw onExhausted(lastError, totalAttempts);
}
