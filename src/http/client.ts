import type { z } from 'zod';
import { logger } from '../logging/index.js';

const httpLogger = logger.child({ component: 'HTTP' });

export type HttpContext = Record<string, unknown>;

function formatUrlForLog(rawUrl: string): string {
  try {
    const parsed = new URL(rawUrl);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return rawUrl.split('?')[0];
  }
}

function formatHttpTarget(url: string, method: string, context: HttpContext): string {
  const operation = typeof context.operation === 'string' && context.operation.trim()
    ? ` (${context.operation})`
    : '';
  return `${method.toUpperCase()} ${formatUrlForLog(url)}${operation}`;
}

function formatAttemptSuffix(attempt: number, maxAttempts: number): string {
  if (maxAttempts <= 1) return '';
  return ` (attempt ${attempt}/${maxAttempts})`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HttpError extends Error {
  constructor(
    message: string,
    public status: number,
    public body: string,
    public context: HttpContext
  ) {
    super(message);
    this.name = 'HttpError';
  }

  /** True when no HTTP response was received (DNS, reset, timeout). */
  get isNetworkError(): boolean {
    return this.status === 0;
  }
}

export interface FetchOptions {
  timeoutMs?: number;
  maxRetries?: number;
  headers?: Record<string, string>;
  context?: HttpContext; // For structured logging (operation, filename, etc.)
  /** Cancels the request in flight and any retry still to come */
  signal?: AbortSignal;
}

/**
 * The error an aborted signal carries, or a generic one when it was aborted
 * without a reason.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * Core HTTP fetch with timeout and retry logic.
 *
 * Client errors (4xx) are thrown on the first attempt. Server errors and
 * transport failures are retried with exponential backoff.
 *
 * @throws HttpError on failure after all retries (status 0 when no response arrived)
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: FetchOptions = {}
): Promise<Response> {
  const {
    timeoutMs = 10000,
    maxRetries = 1,
    headers = {},
    context = {},
    signal
  } = options;

  const mergedHeaders = new Headers(init.headers);
  for (const [name, value] of Object.entries(headers)) {
    mergedHeaders.set(name, value);
  }

  const method = (init.method || 'GET').toUpperCase();
  const maxAttempts = maxRetries + 1;
  const target = formatHttpTarget(url, method, context);

  let lastError: unknown;
  const startTime = Date.now();

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const attemptStart = Date.now();
    const attemptSuffix = formatAttemptSuffix(attempt + 1, maxAttempts);

    try {
      httpLogger.debug({
        method,
        attempt: attempt + 1,
        maxAttempts,
        ...context
      }, `${target}${attemptSuffix}`);

      const response = await fetch(url, {
        ...init,
        headers: mergedHeaders,
        signal: controller.signal
      });

      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);

      const duration = Date.now() - attemptStart;

      if (!response.ok) {
        const body = await response.text().catch(() => '');

        httpLogger.debug({
          method,
          status: response.status,
          statusText: response.statusText,
          attempt: attempt + 1,
          duration,
          ...context
        }, `${target} -> ${response.status} ${response.statusText} in ${duration}ms${attemptSuffix}`);

        const httpError = new HttpError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          body,
          { url: formatUrlForLog(url), method, ...context }
        );

        // Don't retry on client errors (4xx), only server errors (5xx) and network issues
        if (response.status >= 400 && response.status < 500) {
          throw httpError;
        }
        lastError = httpError;
      } else {
        httpLogger.debug({
          method,
          status: response.status,
          attempt: attempt + 1,
          duration,
          totalDuration: Date.now() - startTime,
          ...context
        }, `${target} -> ${response.status} in ${duration}ms${attemptSuffix}`);

        return response;
      }
    } catch (err: unknown) {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);

      if (err instanceof HttpError && err.status >= 400 && err.status < 500) {
        throw err;
      }
      if (signal?.aborted) {
        httpLogger.debug({ method, attempt: attempt + 1, ...context }, `${target} cancelled${attemptSuffix}`);
        throw abortReason(signal);
      }

      const duration = Date.now() - attemptStart;
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);

      httpLogger.debug({
        method,
        error: reason,
        attempt: attempt + 1,
        duration,
        ...context
      }, `${target} exception after ${duration}ms${attemptSuffix}: ${reason}`);

      lastError = controller.signal.aborted ? new Error(reason) : err;
    }

    if (attempt < maxRetries) {
      const backoffMs = Math.pow(2, attempt) * 500;
      httpLogger.debug({
        backoffMs,
        nextAttempt: attempt + 2,
        ...context
      }, `${target} retrying in ${backoffMs}ms (next attempt ${attempt + 2}/${maxAttempts})`);

      await new Promise(resolve => setTimeout(resolve, backoffMs));
    }
  }

  const totalDuration = Date.now() - startTime;

  httpLogger.warn({
    method,
    attempts: maxAttempts,
    totalDuration,
    error: errorMessage(lastError),
    ...context
  }, `${target} failed after ${maxAttempts} attempt(s) in ${totalDuration}ms: ${errorMessage(lastError)}`);

  if (lastError instanceof HttpError) {
    throw lastError;
  }

  throw new HttpError(
    `Request failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    0,
    '',
    { url: formatUrlForLog(url), method, attempts: maxAttempts, ...context }
  );
}

async function parseJsonResponse<T>(
  response: Response,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: HttpContext
): Promise<T> {
  const text = await response.text();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new HttpError(
      'Failed to parse JSON response',
      response.status,
      text,
      { url: formatUrlForLog(url), parseError: errorMessage(err), ...context }
    );
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(
      `Unexpected response shape: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`,
      response.status,
      text,
      { url: formatUrlForLog(url), ...context }
    );
  }
  return parsed.data;
}

/**
 * POST a JSON body and parse the JSON response through `schema`.
 */
export async function postJson<T>(
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchOptions = {}
): Promise<T> {
  const response = await fetchWithRetry(url, {
    method: 'POST',
    body: JSON.stringify(body)
  }, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers
    }
  });

  return parseJsonResponse(response, url, schema, options.context ?? {});
}

/**
 * POST an application/x-www-form-urlencoded body and parse the JSON response.
 */
export async function postForm<T>(
  url: string,
  form: Record<string, string>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchOptions = {}
): Promise<T> {
  const response = await fetchWithRetry(url, {
    method: 'POST',
    body: new URLSearchParams(form).toString()
  }, {
    ...options,
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      ...options.headers
    }
  });

  return parseJsonResponse(response, url, schema, options.context ?? {});
}

/**
 * GET a URL and parse the JSON response through `schema`.
 */
export async function getJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchOptions = {}
): Promise<T> {
  const response = await fetchWithRetry(url, { method: 'GET' }, options);
  return parseJsonResponse(response, url, schema, options.context ?? {});
}

/**
 * Send raw bytes and parse the JSON response (content uploads).
 */
export async function postBytes<T>(
  url: string,
  bytes: Uint8Array,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchOptions = {}
): Promise<T> {
  const response = await fetchWithRetry(url, {
    method: 'POST',
    body: bytes
  }, {
    ...options,
    headers: {
      'Content-Type': 'application/octet-stream',
      ...options.headers
    }
  });

  return parseJsonResponse(response, url, schema, options.context ?? {});
}
