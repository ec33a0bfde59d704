import fetch, { RequestInit, Response } from 'node-fetch';
import { FetchError, errorMessage } from './errors';
import { abortReason, sleep } from './sleep';
import { logger } from './logger';

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface RetryPolicy {
  maxAttempts: number;
  timeoutMs: number;
  /**
   * Wait before the next attempt, given the 1-based attempt that just failed
   */
  backoffMs: (attempt: number) => number;
}

export interface RetryContext {
  source: string;
  fetchFn?: HttpFetch;
  signal?: AbortSignal;
  onRetry?: (attempt: number, reason: string) => void;
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Performs a request with a per-attempt timeout and reads its body with `read`
 * Retries network errors, timeouts, 429 and 5xx; any other non-2xx fails at once
 * The body is read inside the attempt, so a download cut short is retried as well
 */
export async function fetchWithRetry<T>(
  url: string,
  init: RequestInit,
  policy: RetryPolicy,
  context: RetryContext,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const fetchFn = context.fetchFn ?? fetch;
  let lastReason = 'no attempt made';
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (context.signal?.aborted) {
      throw abortReason(context.signal);
    }

    const timeout = AbortSignal.timeout(policy.timeoutMs);
    const signal = context.signal ? AbortSignal.any([context.signal, timeout]) : timeout;

    try {
      const response = await fetchFn(url, { ...init, signal });
      if (response.ok) {
        return await read(response);
      }

      const body = await response.text().catch(() => '');
      if (!isTransientStatus(response.status)) {
        throw new FetchError(
          `HTTP ${response.status} from ${context.source}: ${body.slice(0, 200)}`,
          context.source,
          false,
          response.status
        );
      }
      lastReason = `HTTP ${response.status}`;
      lastStatus = response.status;
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (context.signal?.aborted) throw abortReason(context.signal);
      lastReason = timeout.aborted
        ? `timed out after ${policy.timeoutMs}ms`
        : errorMessage(error);
      lastStatus = undefined;
    }

    if (attempt < policy.maxAttempts) {
      const wait = policy.backoffMs(attempt);
      logger.warn(`${context.source}: ${lastReason}, retrying in ${wait}ms`, {
        attempt,
        maxAttempts: policy.maxAttempts,
      });
      context.onRetry?.(attempt, lastReason);
      await sleep(wait, context.signal);
    }
  }

  throw new FetchError(
    `${context.source}: ${lastReason} after ${policy.maxAttempts} attempts`,
    context.source,
    true,
    lastStatus
  );
}
