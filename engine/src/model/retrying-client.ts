import type { ChatMessage } from '../context/store.js';
import { sleep } from '../utils/concurrency.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import type { ModelCallOptions, ModelClient, ModelResult } from './client.js';

export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: config.retry.maxRetries,
  baseDelayMs: config.retry.baseDelayMs,
  maxDelayMs: config.retry.maxDelayMs,
};

export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
}

/**
 * Retries transient failures (Timeout, RateLimited, TransportError) with
 * exponential backoff. Unauthorized and MalformedResponse come back at once.
 */
export class RetryingModelClient implements ModelClient {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly inner: ModelClient,
    policy: Partial<RetryPolicy> = {},
    private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
  }

  async complete(
    systemPrompt: string,
    conversation: ChatMessage[],
    options: ModelCallOptions,
    signal?: AbortSignal,
  ): Promise<ModelResult> {
    let attempt = 0;

    while (true) {
      attempt++;
      const result = await this.inner.complete(systemPrompt, conversation, options, signal);

      if (result.success || !result.error.transient || signal?.aborted) {
        return result;
      }

      if (attempt > this.policy.maxRetries) {
        logger.error('Model call failed after retries', {
          kind: result.error.kind,
          attempts: attempt,
        });
        return result;
      }

      const delay = backoffDelay(this.policy, attempt, result.error.retryAfterMs);
      logger.warn(`Model call failed, retrying (${attempt}/${this.policy.maxRetries})`, {
        kind: result.error.kind,
        delayMs: delay,
      });
      await this.wait(delay, signal);
      if (signal?.aborted) {
        return result;
      }
    }
  }
}
