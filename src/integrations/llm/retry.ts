/**
 * Retry policy for model requests.
 */

import { EnrichmentError } from "../../errors";
import { logger, errorMessage } from "../../logger";

export interface RetryPolicy {
  /** Extra attempts after the first */
  maxRetries: number;
  /** Delay before the first retry; doubles each time */
  baseDelayMs: number;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);
const CONNECTION_ERRORS = new Set(["APIConnectionError", "APIConnectionTimeoutError"]);

/**
 * HTTP status carried by an API error, if any.
 */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Rate limits, conflicts, request timeouts, 5xx responses and dropped
 * connections are retried. Everything else fails at once.
 */
export function isTransientError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }
  return error instanceof Error && CONNECTION_ERRORS.has(error.name);
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** attempt;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a model request under `policy`. Final failures surface as
 * EnrichmentError carrying the attempt count and status.
 */
export async function withRetry<T>(request: () => Promise<T>, policy: RetryPolicy, issueId?: string): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await request();
    } catch (err) {
      if (err instanceof EnrichmentError) {
        throw err;
      }
      const attempts = attempt + 1;
      const status = errorStatus(err);
      if (!isTransientError(err) || attempt >= policy.maxRetries) {
        throw new EnrichmentError(`Model request failed after ${attempts} attempt(s): ${errorMessage(err)}`, {
          issueId,
          attempts,
          status,
        });
      }

      const delayMs = backoffDelay(policy, attempt);
      logger.warn("Transient model error, retrying", { issueId, attempt: attempts, status, delayMs });
      await sleep(delayMs);
    }
  }
}
