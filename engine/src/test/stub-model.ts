import type { ChatMessage } from '../context/store.js';
import type { ModelCallOptions, ModelClient, ModelResult } from '../model/client.js';
import { ModelError, type ModelErrorKind } from '../utils/errors.js';
import { JUDGE_INSTRUCTIONS } from '../workflow/judge.js';

export interface RecordedCall {
  systemPrompt: string;
  conversation: ChatMessage[];
  options: ModelCallOptions;
  judgment: boolean;
}

export type Responder = (call: RecordedCall, signal?: AbortSignal) => ModelResult | Promise<ModelResult>;

export const ok = (text: string): ModelResult => ({ success: true, text });

export const fail = (kind: ModelErrorKind, retryAfterMs?: number): ModelResult => ({
  success: false,
  error: new ModelError(kind, `stub ${kind}`, undefined, retryAfterMs),
});

/**
 * Records every call and answers through `respond`.
 */
export class StubModelClient implements ModelClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(
    systemPrompt: string,
    conversation: ChatMessage[],
    options: ModelCallOptions,
    signal?: AbortSignal,
  ): Promise<ModelResult> {
    const call: RecordedCall = {
      systemPrompt,
      conversation: conversation.map(message => ({ ...message })),
      options: { ...options },
      judgment: systemPrompt.startsWith(JUDGE_INSTRUCTIONS),
    };
    this.calls.push(call);
    return this.respond(call, signal);
  }

  get contentCalls(): RecordedCall[] {
    return this.calls.filter(call => !call.judgment);
  }

  get judgmentCalls(): RecordedCall[] {
    return this.calls.filter(call => call.judgment);
  }
}

/**
 * Narration replies and judge verdicts are taken in order from two queues.
 * An exhausted narration queue answers "..." and an exhausted verdict queue
 * answers "YES".
 */
export function scripted(narration: string[], verdicts: string[] = []): StubModelClient {
  const replies = [...narration];
  const judgments = [...verdicts];
  return new StubModelClient(call => ok((call.judgment ? judgments.shift() ?? 'YES' : replies.shift()) ?? '...'));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Resolves once the promise queue has drained a few times. */
export async function flush(times: number = 5): Promise<void> {
  for (let i = 0; i < times; i += 1) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}
