import { z } from 'zod';

import type { ChatMessage } from '../context/store.js';
import { config } from '../utils/config.js';
import { ModelError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ModelCallOptions, ModelClient, ModelResult } from './client.js';
import { ProviderRegistry, type ProviderConfig } from './providers.js';

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

interface RawResponse {
  ok: boolean;
  status: number;
  retryAfter: string | null;
  body: string;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

function errorForStatus(status: number, body: string, retryAfter: string | null): ModelError {
  const detail = `HTTP ${status}: ${body.slice(0, 200)}`;
  if (status === 401 || status === 403) {
    return new ModelError('Unauthorized', detail, status);
  }
  if (status === 408) {
    return new ModelError('Timeout', detail, status);
  }
  if (status === 429) {
    return new ModelError('RateLimited', detail, status, parseRetryAfter(retryAfter));
  }
  if (status >= 500) {
    return new ModelError('TransportError', detail, status);
  }
  return new ModelError('MalformedResponse', `Request rejected by backend, ${detail}`, status);
}

/**
 * Chat-completions client for any backend that speaks the OpenAI wire format.
 */
export class OpenAiCompatibleClient implements ModelClient {
  private providers: ProviderRegistry;
  private fetchImpl: FetchLike;

  constructor(providers: ProviderRegistry = new ProviderRegistry(), fetchImpl: FetchLike = fetch) {
    this.providers = providers;
    this.fetchImpl = fetchImpl;
  }

  private headers(provider: ProviderConfig): Record<string, string> {
    const apiKey = provider.apiKey || config.model.apiKey;
    return {
      'Content-Type': 'application/json',
      ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
    };
  }

  /**
   * Sends one request and reads its whole body under the same deadline and
   * abort signal. Anything that goes wrong on the wire becomes a ModelError.
   */
  private async exchange(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }

    // A stub or a stalled stream may ignore the signal, so race it as well.
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
    });

    try {
      const response = await Promise.race([this.fetchImpl(url, { ...init, signal: controller.signal }), aborted]);
      const body = await Promise.race([response.text(), aborted]);
      return {
        ok: response.ok,
        status: response.status,
        retryAfter: response.headers.get('retry-after'),
        body,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      if (timedOut) {
        throw new ModelError('Timeout', `No complete response within ${timeoutMs}ms`);
      }
      throw new ModelError('TransportError', `Request failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async complete(
    systemPrompt: string,
    conversation: ChatMessage[],
    options: ModelCallOptions,
    signal?: AbortSignal,
  ): Promise<ModelResult> {
    try {
      const provider = this.providers.resolve(options.provider);
      const model = options.model ?? provider.defaultModel;
      const messages: ChatMessage[] = systemPrompt
        ? [{ role: 'system', content: systemPrompt }, ...conversation]
        : conversation;

      logger.debug('Requesting completion', { provider: provider.name, model, turns: messages.length });

      const response = await this.exchange(
        `${provider.baseUrl.replace(/\/+$/, '')}/chat/completions`,
        {
          method: 'POST',
          headers: this.headers(provider),
          body: JSON.stringify({
            ...provider.params,
            model,
            messages,
            ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
            ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
          }),
        },
        options.timeoutMs,
        signal,
      );

      if (!response.ok) {
        const error = errorForStatus(response.status, response.body, response.retryAfter);
        logger.error(`Completion failed with HTTP ${response.status}`, { kind: error.kind });
        return { success: false, error };
      }

      let payload: unknown;
      try {
        payload = JSON.parse(response.body);
      } catch {
        return { success: false, error: new ModelError('MalformedResponse', 'Response body is not JSON') };
      }

      const parsed = completionSchema.safeParse(payload);
      if (!parsed.success) {
        return {
          success: false,
          error: new ModelError('MalformedResponse', 'Response has no choices[0].message.content'),
        };
      }

      return { success: true, text: parsed.data.choices[0].message.content.trim() };
    } catch (err) {
      if (err instanceof ModelError) {
        return { success: false, error: err };
      }
      throw err;
    }
  }

  async listModels(providerName?: string): Promise<string[]> {
    const provider = this.providers.resolve(providerName);
    const response = await this.exchange(
      `${provider.baseUrl.replace(/\/+$/, '')}/models`,
      { method: 'GET', headers: this.headers(provider) },
      config.model.timeoutMs,
    );

    if (!response.ok) {
      throw errorForStatus(response.status, response.body, response.retryAfter);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch {
      throw new ModelError('MalformedResponse', 'Model list is not JSON');
    }
    const parsed = modelListSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelError('MalformedResponse', 'Model list has no data[].id');
    }

    return parsed.data.data.map(model => model.id).sort();
  }
}
