/**
 * HTTP helpers shared by the source clients.
 *
 * Retries on 429 (rate limit), 5xx and network errors with exponential
 * backoff. Respects Retry-After headers. Supports abort signals.
 */

import type { z } from 'zod';

export interface FetchRetryConfig {
  /** Maximum retry attempts (default: 2). */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Maximum delay cap in ms (default: 15000). */
  maxDelayMs?: number;
}

const DEFAULT_CONFIG: Required<FetchRetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
};

const ERROR_BODY_LIMIT = 300;

/** Non-retryable HTTP failure; `body` holds the start of the response text. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText}${status === 429 ? ' (rate limited)' : ''} for ${url}${body ? `: ${body}` : ''}`);
    this.name = 'HttpError';
  }
}

function backoff(attempt: number, config: Required<FetchRetryConfig>): number {
  const base = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const jitter = base * 0.1 * Math.random();
  return Math.min(base + jitter, config.maxDelayMs);
}

function isNetworkError(error: Error): boolean {
  return (
    error.message.includes('fetch failed') ||
    error.message.includes('ECONNRESET') ||
    error.message.includes('ETIMEDOUT') ||
    error.message.includes('timeout')
  );
}

async function errorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.replace(/\s+/g, ' ').trim().slice(0, ERROR_BODY_LIMIT);
  } catch {
    return '';
  }
}

/**
 * Fetch with automatic retry on rate limits, server errors and network
 * failures. Returns the successful Response or throws after the last attempt.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: FetchRetryConfig = {},
): Promise<Response> {
  const settings: Required<FetchRetryConfig> = { ...DEFAULT_CONFIG, ...config };
  const signal = init.signal ?? undefined;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= settings.maxRetries; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      lastError = err instanceof Error ? err : new Error(String(err));
      if (!isNetworkError(lastError) || attempt >= settings.maxRetries) throw lastError;
      await sleep(backoff(attempt, settings), signal);
      continue;
    }

    if (response.ok) return response;

    const status = response.status;
    const retryable = status === 429 || (status >= 500 && status <= 599);
    if (!retryable || attempt >= settings.maxRetries) {
      throw new HttpError(status, url, await errorBody(response), response.statusText);
    }

    let delay = backoff(attempt, settings);
    const retryAfter = response.headers?.get?.('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) delay = Math.max(delay, seconds * 1000);
    }

    lastError = new HttpError(status, url, '', response.statusText);
    await sleep(delay, signal);
  }

  throw lastError ?? new Error('Fetch retry failed');
}

export interface JsonRequest<T> {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  /** Shape the response must have. */
  schema: z.ZodType<T>;
  signal?: AbortSignal;
  retry?: FetchRetryConfig;
}

/** POST a JSON body and validate the JSON response. */
export async function postJson<T>(request: JsonRequest<T>): Promise<T> {
  const response = await fetchWithRetry(
    request.url,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...request.headers },
      body: JSON.stringify(request.body),
      signal: request.signal,
    },
    request.retry,
  );

  const json: unknown = await response.json();
  const parsed = request.schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Unexpected response from ${request.url}: ${issues}`);
  }
  return parsed.data;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
