/**
 * Timeout and error classification for external model calls.
 *
 * Calls are never retried here: a failed generation fails the run, and the
 * caller decides whether to start a new one.
 */

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

export type ErrorCategory =
  | 'rate_limit'       // 429 or quota
  | 'server_error'     // 5xx
  | 'timeout'
  | 'aborted'
  | 'budget_exceeded'
  | 'auth_error'       // 401/403, bad or missing key
  | 'not_found'        // unknown model
  | 'network'
  | 'unknown';

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof AbortError) return 'aborted';
  if (error instanceof Error && error.name === 'BudgetExceededError') return 'budget_exceeded';

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  if (/\b429\b/.test(message) || lower.includes('rate limit') || lower.includes('quota') || lower.includes('too many requests')) {
    return 'rate_limit';
  }
  if (/\b(500|502|503|504)\b/.test(message) || lower.includes('internal server error') || lower.includes('service unavailable')) {
    return 'server_error';
  }
  if (/\b(401|403)\b/.test(message) || lower.includes('unauthorized') || lower.includes('forbidden') || lower.includes('api key')) {
    return 'auth_error';
  }
  if (/\b404\b/.test(message) || lower.includes('not found')) {
    return 'not_found';
  }
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 'timeout';
  }
  if (lower.includes('aborted')) {
    return 'aborted';
  }
  if (lower.includes('econnreset') || lower.includes('enotfound') || lower.includes('fetch failed') || lower.includes('network')) {
    return 'network';
  }
  return 'unknown';
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Reject with TimeoutError if `promise` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<T> {
  if (abortSignal?.aborted) throw new AbortError('Operation aborted');
  if (timeoutMs <= 0 || timeoutMs === Infinity) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}
