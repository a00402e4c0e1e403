import type { ChatMessage } from '../context/store.js';
import type { ModelError } from '../utils/errors.js';

export interface ModelCallOptions {
  /** Backend model id; the provider's default when omitted. */
  model?: string;
  /** Opaque provider name, resolved by the client's configuration. */
  provider?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs: number;
}

export type ModelResult =
  | { success: true; text: string }
  | { success: false; error: ModelError };

/**
 * The engine's only view of the model backend. Implementations never touch
 * session state; callers append whatever they keep.
 */
export interface ModelClient {
  complete(
    systemPrompt: string,
    conversation: ChatMessage[],
    options: ModelCallOptions,
    signal?: AbortSignal,
  ): Promise<ModelResult>;
}
