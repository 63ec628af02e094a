import { HttpError, abortReason } from '../http/client.js';
import { publishLogger } from '../logging/index.js';
import {
  PermanentProviderError,
  RetryExhaustedError,
  TimeoutError,
  TransientProviderError,
} from '../shared/errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
}

/** 5 attempts, waiting 2s, 3s, 4.5s, 6.75s between them. */
export const PUBLISH_BACKOFF: BackoffPolicy = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  multiplier: 1.5,
};

export interface RetryOptions {
  policy?: BackoffPolicy;
  shouldRetry: (error: unknown) => boolean;
  sleep: Sleep;
  /** Once aborted, no further attempt starts and no backoff is waited out */
  signal?: AbortSignal;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * policy's attempts are spent. Exhaustion surfaces as RetryExhaustedError
 * carrying the last underlying error.
 */
export async function retryWithBackoff<T>(
  operation: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const policy = options.policy ?? PUBLISH_BACKOFF;
  let delayMs = policy.initialDelayMs;

  const { signal } = options;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      throwIfAborted(signal);
      if (!options.shouldRetry(error)) {
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(operation, attempt, error);
      }
      publishLogger.retry(operation, attempt, policy.maxAttempts, delayMs, error instanceof Error ? error.message : String(error));
      await options.sleep(delayMs, signal);
      delayMs *= policy.multiplier;
    }
  }
}

/**
 * Run `work` with a deadline. When `timeoutMs` passes first, the signal
 * handed to `work` is aborted with a TimeoutError and the same error is
 * thrown without waiting for `work` to notice.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Provider messages that mean "try the same request again shortly". */
export const TRANSIENT_MESSAGE_PATTERNS = [
  'media not ready',
  'media not found',
  'temporarily unavailable',
  'please retry',
  'try again later',
  'unexpected error has occurred',
];

/**
 * Whether a failure of the whole post step deserves another go: transport
 * failures, provider errors classified as transient, and a narrow set of
 * known transient messages. Everything else fails fast.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof RetryExhaustedError || error instanceof PermanentProviderError) {
    return false;
  }
  if (error instanceof TransientProviderError) {
    return true;
  }
  if (error instanceof HttpError) {
    return error.isNetworkError || error.status === 429 || error.status >= 500;
  }
  if (error instanceof TimeoutError) {
    return false;
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return true;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return TRANSIENT_MESSAGE_PATTERNS.some(pattern => message.includes(pattern));
  }
  return false;
}
