import { v4 as uuidv4 } from 'uuid';

import { ContextStore } from '../context/store.js';
import type { ModelClient } from '../model/client.js';
import { RetryingModelClient, type RetryPolicy } from '../model/retrying-client.js';
import type { PromptLibrary } from '../prompts/library.js';
import { PromptResolver } from '../prompts/resolver.js';
import { config } from '../utils/config.js';
import { CancelledError, StateError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { LoopJudge } from './judge.js';
import { NodeExecutor } from './node-executor.js';
import { WorkflowFiles } from './files.js';
import type { RunStore } from './run-store.js';
import type { ModelDefaults, SessionHandle } from './session.js';
import { StepExecutor } from './step-executor.js';
import {
  RUN_STATE_VERSION,
  type EngineEvent,
  type EventCallback,
  type EventPayload,
  type RunState,
  type RunStatus,
  type WorkflowDefinition,
  type WorldState,
  type WorldValue,
} from './types.js';

export const AUTOSAVE_SLOT = 'autosave';

export interface RunnerOptions {
  model: ModelClient;
  prompts: PromptLibrary;
  runStore?: RunStore;
  /** Where `readFromFile` and `saveToFile` resolve; defaults to `config.paths.filesDir`. */
  files?: WorkflowFiles;
  /** Slot written after each node and on suspension; null disables autosave. */
  autosaveSlot?: string | null;
  retry?: Partial<RetryPolicy>;
  modelDefaults?: Partial<ModelDefaults>;
  maxParallelism?: number;
}

interface InputWaiter {
  resolve: (text: string) => void;
  reject: (error: Error) => void;
}

/**
 * Drives one workflow session at a time through its nodes, committing the
 * RunState after every step result so it can be suspended and resumed.
 */
export class WorkflowRunner {
  private status: RunStatus = 'idle';
  private state: RunState | null = null;
  private store: ContextStore | null = null;
  private eventCallbacks: EventCallback[] = [];
  private abortController: AbortController | null = null;
  private suspendRequested = false;
  private execution: Promise<void> = Promise.resolve();
  private inputWaiters: InputWaiter[] = [];
  private readonly nodeExecutor: NodeExecutor;
  private readonly runStore?: RunStore;
  private readonly autosaveSlot: string | null;

  constructor(
    private readonly workflow: WorkflowDefinition,
    options: RunnerOptions,
  ) {
    const model = new RetryingModelClient(options.model, options.retry);
    const defaults: ModelDefaults = {
      temperature: config.model.temperature,
      maxTokens: config.model.maxTokens,
      timeoutMs: config.model.timeoutMs,
      ...options.modelDefaults,
    };
    const judge = new LoopJudge(model);
    const steps = new StepExecutor(
      model,
      new PromptResolver(options.prompts),
      judge,
      defaults,
      options.files ?? new WorkflowFiles(),
    );

    this.nodeExecutor = new NodeExecutor(
      steps,
      judge,
      defaults,
      options.maxParallelism ?? config.execution.maxParallelism,
    );
    this.runStore = options.runStore;
    this.autosaveSlot = options.runStore ? (options.autosaveSlot === undefined ? AUTOSAVE_SLOT : options.autosaveSlot) : null;
  }

  onEvent(callback: EventCallback): () => void {
    this.eventCallbacks.push(callback);
    return () => {
      this.eventCallbacks = this.eventCallbacks.filter(existing => existing !== callback);
    };
  }

  private emit(payload: EventPayload): void {
    const event: EngineEvent = { ...payload, timestamp: new Date().toISOString() };
    for (const callback of this.eventCallbacks) {
      callback(event);
    }
  }

  getStatus(): RunStatus {
    return this.status;
  }

  getState(): RunState | null {
    return this.state ? structuredClone(this.state) : null;
  }

  /** Resolves with the final status once the current run stops. */
  async whenSettled(): Promise<RunStatus> {
    await this.execution;
    return this.status;
  }

  start(initialWorld: WorldState = {}): void {
    this.assertNotRunning();

    const entryIndex = this.workflow.entryNodeId
      ? this.workflow.nodes.findIndex(node => node.id === this.workflow.entryNodeId)
      : 0;
    const now = new Date().toISOString();

    this.launch(
      {
        version: RUN_STATE_VERSION,
        sessionId: uuidv4(),
        workflowId: this.workflow.id,
        status: 'idle',
        cursor: { nodeIndex: Math.max(0, entryIndex), stepIndex: 0, completedStepIds: [] },
        nodeIterations: {},
        stepIterations: {},
        context: [],
        world: structuredClone(initialWorld),
        pendingInput: [],
        createdAt: now,
        updatedAt: now,
      },
      false,
    );
  }

  resume(snapshot: RunState): void {
    this.assertNotRunning();

    let state: RunState;
    try {
      state = this.validateResumable(snapshot);
    } catch (error) {
      this.failBeforeStart(snapshot.sessionId, error);
      return;
    }
    this.launch(state, true);
  }

  /**
   * Resumes from a saved slot. Returns false, without touching the runner,
   * when the slot does not exist.
   */
  async resumeSlot(slot: string = AUTOSAVE_SLOT): Promise<boolean> {
    const runStore = this.requireRunStore();
    this.assertNotRunning();

    let snapshot: RunState | null;
    try {
      snapshot = await runStore.load(this.workflow.id, slot);
    } catch (error) {
      this.failBeforeStart('', error);
      return true;
    }

    if (!snapshot) {
      return false;
    }
    this.resume(snapshot);
    return true;
  }

  /** Stops at the next commit boundary. */
  requestSuspend(): void {
    if (this.status !== 'running') {
      return;
    }
    this.suspendRequested = true;
    if (this.inputWaiters.length > 0) {
      this.cancel();
    }
  }

  async suspend(): Promise<RunState | null> {
    this.requestSuspend();
    await this.execution;
    return this.getState();
  }

  /** Aborts in-flight calls; the session is suspended at its last commit. */
  cancel(): void {
    if (this.status !== 'running') {
      return;
    }
    this.abortController?.abort();
    const waiters = this.inputWaiters;
    this.inputWaiters = [];
    for (const waiter of waiters) {
      waiter.reject(new CancelledError('Input wait cancelled'));
    }
  }

  async save(slot: string = AUTOSAVE_SLOT): Promise<string> {
    const runStore = this.requireRunStore();
    if (this.status === 'running') {
      await this.suspend();
    }

    const state = this.requireState();
    if (state.status !== 'suspended') {
      throw new Error(`Only a suspended session can be saved (status: ${state.status})`);
    }
    return runStore.save(slot, state);
  }

  submitInput(text: string): void {
    const waiter = this.inputWaiters.shift();
    if (waiter) {
      waiter.resolve(text);
      return;
    }
    this.requireState().pendingInput.push(text);
  }

  setWorldAttribute(key: string, value: WorldValue): void {
    const state = this.requireState();
    if (!this.store) {
      throw new Error('No session has been started');
    }
    this.store.setWorldAttribute(key, value);
    state.updatedAt = new Date().toISOString();
  }

  /** Ends the session: cancels it if running and archives its autosave. */
  async end(): Promise<void> {
    if (this.status === 'running') {
      this.cancel();
      await this.execution;
    }
    if (this.runStore && this.autosaveSlot) {
      await this.runStore.archive(this.workflow.id, this.autosaveSlot);
    }
    logger.info('Session ended', { sessionId: this.state?.sessionId, status: this.status });
  }

  private assertNotRunning(): void {
    if (this.status === 'running') {
      throw new Error('A session is already running');
    }
  }

  private requireState(): RunState {
    if (!this.state) {
      throw new Error('No session has been started');
    }
    return this.state;
  }

  private requireRunStore(): RunStore {
    if (!this.runStore) {
      throw new Error('No run store configured');
    }
    return this.runStore;
  }

  private validateResumable(snapshot: RunState): RunState {
    if (snapshot.version !== RUN_STATE_VERSION) {
      throw new StateError('version_mismatch', `Unsupported RunState version ${String(snapshot.version)}`);
    }
    if (snapshot.workflowId !== this.workflow.id) {
      throw new StateError(
        'workflow_mismatch',
        `Session belongs to workflow '${snapshot.workflowId}', not '${this.workflow.id}'`,
      );
    }
    if (snapshot.status !== 'suspended') {
      throw new StateError('not_resumable', `Session is ${snapshot.status}, only suspended sessions resume`);
    }

    const { nodeIndex, stepIndex, completedStepIds } = snapshot.cursor;
    const node = this.workflow.nodes[nodeIndex];
    if (nodeIndex > this.workflow.nodes.length || (node === undefined && stepIndex !== 0)) {
      throw new StateError('corrupt', `Cursor points past the workflow (node ${nodeIndex})`);
    }
    if (node) {
      const stepIds = new Set(node.steps.map(step => step.id));
      if (stepIndex > node.steps.length) {
        throw new StateError('corrupt', `Cursor points past node '${node.id}' (step ${stepIndex})`);
      }
      const unknown = [...completedStepIds, ...Object.keys(snapshot.stepIterations)].find(id => !stepIds.has(id));
      if (unknown !== undefined) {
        throw new StateError('corrupt', `Step '${unknown}' is not part of node '${node.id}'`);
      }
    }

    return structuredClone(snapshot);
  }

  private failBeforeStart(sessionId: string, error: unknown): void {
    const reason = describeError(error);
    logger.error('Session could not be resumed', { sessionId, error: reason });
    this.status = 'failed';
    this.emit({ type: 'failed', sessionId, reason });
  }

  private launch(state: RunState, resumed: boolean): void {
    state.status = 'running';
    delete state.failureReason;

    this.state = state;
    this.store = new ContextStore(state.context, state.world);
    this.status = 'running';
    this.suspendRequested = false;
    this.abortController = new AbortController();
    this.execution = this.drive(state, this.abortController.signal, resumed);
  }

  private createSession(state: RunState, store: ContextStore, signal: AbortSignal): SessionHandle {
    const nodeCount = this.workflow.nodes.length;

    return {
      state,
      store,
      signal,
      emit: payload => this.emit(payload),
      commit: () => {
        state.updatedAt = new Date().toISOString();
      },
      shouldSuspend: () => this.suspendRequested,
      progress: () => (nodeCount === 0 ? 100 : Math.round((state.cursor.nodeIndex / nodeCount) * 100)),
      takeInput: (nodeId, stepId, prompt, waitSignal) => {
        const queued = state.pendingInput.shift();
        if (queued !== undefined) {
          return Promise.resolve(queued);
        }
        if (waitSignal.aborted) {
          return Promise.reject(new CancelledError('Input wait cancelled'));
        }
        return new Promise<string>((resolve, reject) => {
          const onAbort = () => {
            this.inputWaiters = this.inputWaiters.filter(existing => existing !== waiter);
            reject(new CancelledError('Input wait cancelled'));
          };
          const waiter: InputWaiter = {
            resolve: text => {
              waitSignal.removeEventListener('abort', onAbort);
              resolve(text);
            },
            reject: error => {
              waitSignal.removeEventListener('abort', onAbort);
              reject(error);
            },
          };
          waitSignal.addEventListener('abort', onAbort, { once: true });
          this.inputWaiters.push(waiter);
          this.emit({ type: 'input_requested', nodeId, stepId, prompt });
        });
      },
      returnInput: text => {
        state.pendingInput.unshift(text);
      },
    };
  }

  private async drive(state: RunState, signal: AbortSignal, resumed: boolean): Promise<void> {
    // Let the caller subscribe before the first event.
    await new Promise<void>(resolve => setImmediate(resolve));

    const store = this.store ?? new ContextStore(state.context, state.world);
    const session = this.createSession(state, store, signal);
    const { nodes } = this.workflow;

    if (!resumed) {
      await this.retirePreviousAutosave(state);
    }

    logger.info('Session started', { sessionId: state.sessionId, workflowId: state.workflowId, resumed });
    this.emit({ type: 'session_started', sessionId: state.sessionId, workflowId: state.workflowId, resumed });

    try {
      while (state.cursor.nodeIndex < nodes.length) {
        if (this.suspendRequested) {
          await this.settle(state, 'suspended');
          return;
        }

        const node = nodes[state.cursor.nodeIndex];
        const outcome = await this.nodeExecutor.execute(node, session);
        if (outcome === 'suspended') {
          await this.settle(state, 'suspended');
          return;
        }

        delete state.nodeIterations[node.id];
        state.cursor = { nodeIndex: state.cursor.nodeIndex + 1, stepIndex: 0, completedStepIds: [] };
        session.commit();
        logger.debug('Node completed', { sessionId: state.sessionId, nodeId: node.id });

        if (state.cursor.nodeIndex < nodes.length) {
          await this.autosave(state, 'suspended');
        }
      }

      await this.settle(state, 'completed');
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.info('Session cancelled, suspending at last commit', { sessionId: state.sessionId });
        await this.settle(state, 'suspended');
        return;
      }
      await this.settle(state, 'failed', error);
    }
  }

  /** A new session replaces whatever the autosave slot held. */
  private async retirePreviousAutosave(state: RunState): Promise<void> {
    if (!this.runStore || !this.autosaveSlot) {
      return;
    }
    try {
      await this.runStore.archive(this.workflow.id, this.autosaveSlot);
    } catch (error) {
      logger.error('Could not archive the previous autosave', { sessionId: state.sessionId, error: describeError(error) });
    }
  }

  /**
   * Writes the state to the autosave slot as a resumable snapshot. A write
   * error is logged and the run goes on.
   */
  private async autosave(state: RunState, status: RunStatus): Promise<void> {
    if (!this.runStore || !this.autosaveSlot) {
      return;
    }
    try {
      await this.runStore.save(this.autosaveSlot, { ...state, status });
    } catch (error) {
      logger.error('Autosave failed', { sessionId: state.sessionId, error: describeError(error) });
    }
  }

  private async settle(state: RunState, status: 'suspended' | 'completed' | 'failed', error?: unknown): Promise<void> {
    state.status = status;
    this.status = status;
    this.abortController = null;
    this.inputWaiters = [];

    if (status === 'suspended') {
      await this.autosave(state, 'suspended');
      logger.info('Session suspended', { sessionId: state.sessionId, cursor: state.cursor });
      this.emit({ type: 'suspended', sessionId: state.sessionId });
      return;
    }

    if (status === 'failed') {
      const reason = describeError(error);
      state.failureReason = reason;
      logger.error('Session failed', { sessionId: state.sessionId, error: reason });
      this.emit({ type: 'failed', sessionId: state.sessionId, reason });
      return;
    }

    logger.info('Session completed', { sessionId: state.sessionId, entries: state.context.length });
    this.emit({ type: 'completed', sessionId: state.sessionId });
  }
}
