import type { ContextStore } from '../context/store.js';
import type { ModelCallOptions } from '../model/client.js';
import type { EventPayload, RunState } from './types.js';

export type StepOutcome = 'completed' | 'suspended';

export type ModelDefaults = Omit<ModelCallOptions, 'timeoutMs'> & { timeoutMs: number };

/**
 * What the runner lends its executors for one session. Executors mutate
 * `state` and `store` only through synchronous commits between awaits.
 */
export interface SessionHandle {
  state: RunState;
  store: ContextStore;
  signal: AbortSignal;
  emit(event: EventPayload): void;
  /** Marks a commit boundary. */
  commit(): void;
  shouldSuspend(): boolean;
  progress(): number;
  /** Waits for player input; rejects with CancelledError once `signal` aborts. */
  takeInput(nodeId: string, stepId: string, prompt: string, signal: AbortSignal): Promise<string>;
  returnInput(text: string): void;
}
