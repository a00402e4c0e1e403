import type { ModelCallOptions } from '../model/client.js';
import { settleWithConcurrency } from '../utils/concurrency.js';
import { CancelledError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { LoopJudge } from './judge.js';
import type { SessionHandle, StepOutcome } from './session.js';
import type { StepExecutor } from './step-executor.js';
import type { NodeDefinition, StepDefinition } from './types.js';

export interface StepBatch {
  /** Index of the first step in the node. */
  start: number;
  /** One past the last step. */
  end: number;
  parallel: boolean;
  steps: StepDefinition[];
}

/**
 * Splits a node's steps into batches: each maximal run of adjacent parallel
 * steps is one batch, every sequential step is a batch of its own.
 */
export function partitionBatches(steps: readonly StepDefinition[]): StepBatch[] {
  const batches: StepBatch[] = [];
  let index = 0;

  while (index < steps.length) {
    if (steps[index].executionMode === 'parallel') {
      let end = index;
      while (end < steps.length && steps[end].executionMode === 'parallel') {
        end++;
      }
      batches.push({ start: index, end, parallel: true, steps: steps.slice(index, end) });
      index = end;
    } else {
      batches.push({ start: index, end: index + 1, parallel: false, steps: [steps[index]] });
      index++;
    }
  }

  return batches;
}

export class NodeExecutor {
  constructor(
    private readonly steps: StepExecutor,
    private readonly judge: LoopJudge,
    private readonly judgeOptions: ModelCallOptions,
    private readonly maxParallelism: number,
  ) {}

  async execute(node: NodeDefinition, session: SessionHandle): Promise<StepOutcome> {
    const { state } = session;
    const batches = partitionBatches(node.steps);

    while (true) {
      if (this.atFreshPass(node, session)) {
        session.emit({
          type: 'node_entered',
          nodeId: node.id,
          iteration: (state.nodeIterations[node.id] ?? 0) + 1,
          progress: session.progress(),
        });
      }

      for (const batch of batches) {
        if (batch.end <= state.cursor.stepIndex) {
          continue;
        }

        const pending = batch.steps.filter(step => !state.cursor.completedStepIds.includes(step.id));
        const outcome =
          batch.parallel && pending.length > 1
            ? await this.runGroup(pending, node, session)
            : await this.runSequence(pending, node, session);
        if (outcome === 'suspended') {
          return 'suspended';
        }

        state.cursor.stepIndex = batch.end;
        state.cursor.completedStepIds = [];
        session.commit();
        if (session.shouldSuspend()) {
          return 'suspended';
        }
      }

      if (node.loopPolicy === 'none') {
        return 'completed';
      }

      const passes = (state.nodeIterations[node.id] ?? 0) + 1;
      if (passes >= node.maxIterations) {
        logger.warn('LoopBoundExceeded: node loop stopped at its iteration bound', {
          nodeId: node.id,
          maxIterations: node.maxIterations,
        });
        session.emit({ type: 'loop_bound_exceeded', scope: 'node', id: node.id, maxIterations: node.maxIterations });
        return 'completed';
      }

      const proceed = await this.judge.shouldContinue({
        scope: 'node',
        id: node.id,
        loopPrompt: node.loopPrompt,
        store: session.store,
        options: this.judgeOptions,
        signal: session.signal,
      });
      if (!proceed) {
        return 'completed';
      }

      state.nodeIterations[node.id] = passes;
      state.cursor.stepIndex = 0;
      state.cursor.completedStepIds = [];
      session.commit();
      session.emit({ type: 'loop_iterated', scope: 'node', id: node.id, iteration: passes + 1 });
      if (session.shouldSuspend()) {
        return 'suspended';
      }
    }
  }

  private atFreshPass(node: NodeDefinition, session: SessionHandle): boolean {
    const { cursor, stepIterations } = session.state;
    return (
      cursor.stepIndex === 0 &&
      cursor.completedStepIds.length === 0 &&
      !node.steps.some(step => step.id in stepIterations)
    );
  }

  private async runSequence(
    steps: readonly StepDefinition[],
    node: NodeDefinition,
    session: SessionHandle,
  ): Promise<StepOutcome> {
    for (const step of steps) {
      if ((await this.steps.execute(step, node, session)) === 'suspended') {
        return 'suspended';
      }
    }
    return 'completed';
  }

  /**
   * Runs a parallel batch under the parallelism bound. The first failure
   * aborts the siblings still in flight and is rethrown once all settle.
   */
  private async runGroup(
    steps: readonly StepDefinition[],
    node: NodeDefinition,
    session: SessionHandle,
  ): Promise<StepOutcome> {
    const group = new AbortController();
    const forward = () => group.abort();
    session.signal.addEventListener('abort', forward, { once: true });
    if (session.signal.aborted) {
      group.abort();
    }

    const member: SessionHandle = { ...session, signal: group.signal };
    const failures: unknown[] = [];

    try {
      const results = await settleWithConcurrency(steps, this.maxParallelism, async step => {
        try {
          return await this.steps.execute(step, node, member);
        } catch (error) {
          const cancelledBySession = error instanceof CancelledError && session.signal.aborted;
          if (failures.length === 0 && !cancelledBySession) {
            failures.push(error);
            logger.error('Parallel step failed, cancelling siblings', {
              nodeId: node.id,
              stepId: step.id,
              error: describeError(error),
            });
            group.abort();
          }
          throw error;
        }
      });

      if (failures.length > 0) {
        throw failures[0];
      }
      const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) {
        throw rejected.reason;
      }
      return results.some(result => result.status === 'fulfilled' && result.value === 'suspended')
        ? 'suspended'
        : 'completed';
    } finally {
      session.signal.removeEventListener('abort', forward);
    }
  }
}
