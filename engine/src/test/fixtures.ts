import { ContextStore } from '../context/store.js';
import { CancelledError } from '../utils/errors.js';
import type { SessionHandle } from '../workflow/session.js';
import { parseWorkflow } from '../workflow/schema.js';
import {
  RUN_STATE_VERSION,
  type EventPayload,
  type RunState,
  type WorkflowDefinition,
} from '../workflow/types.js';

/** Builds a workflow through the schema so defaults apply. */
export function workflow(nodes: unknown[], extra: Record<string, unknown> = {}): WorkflowDefinition {
  return parseWorkflow({ id: 'wf-test', name: 'Test workflow', nodes, ...extra });
}

export function freshState(workflowId: string = 'wf-test'): RunState {
  const now = '2026-01-01T00:00:00.000Z';
  return {
    version: RUN_STATE_VERSION,
    sessionId: 'session-test',
    workflowId,
    status: 'running',
    cursor: { nodeIndex: 0, stepIndex: 0, completedStepIds: [] },
    nodeIterations: {},
    stepIterations: {},
    context: [],
    world: {},
    pendingInput: [],
    createdAt: now,
    updatedAt: now,
  };
}

export interface TestSession {
  session: SessionHandle;
  events: EventPayload[];
  controller: AbortController;
  commits: () => number;
}

export function testSession(state: RunState = freshState(), suspendAfterCommits?: number): TestSession {
  const events: EventPayload[] = [];
  const controller = new AbortController();
  let commits = 0;

  const session: SessionHandle = {
    state,
    store: new ContextStore(state.context, state.world),
    signal: controller.signal,
    emit: event => events.push(event),
    commit: () => {
      commits += 1;
    },
    shouldSuspend: () => suspendAfterCommits !== undefined && commits >= suspendAfterCommits,
    progress: () => 0,
    // With nothing queued the wait lasts until its signal aborts.
    takeInput: (nodeId, stepId, prompt, waitSignal) => {
      const queued = state.pendingInput.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      events.push({ type: 'input_requested', nodeId, stepId, prompt });
      return new Promise<string>((_resolve, reject) => {
        const cancel = () => reject(new CancelledError('Input wait cancelled'));
        if (waitSignal.aborted) {
          cancel();
        } else {
          waitSignal.addEventListener('abort', cancel, { once: true });
        }
      });
    },
    returnInput: text => {
      state.pendingInput.unshift(text);
    },
  };

  return { session, events, controller, commits: () => commits };
}
