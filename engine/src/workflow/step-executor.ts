import { toConversation, type ContextStore } from '../context/store.js';
import type { ModelCallOptions, ModelClient } from '../model/client.js';
import { FRAGMENT_SEPARATOR, PromptResolver, renderTemplate, type TemplateVariables } from '../prompts/resolver.js';
import { CancelledError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { WorkflowFiles } from './files.js';
import type { LoopJudge } from './judge.js';
import type { ModelDefaults, SessionHandle, StepOutcome } from './session.js';
import type { NodeDefinition, StepDefinition } from './types.js';

interface StepReply {
  text: string;
  input?: string;
}

export const DEFAULT_INPUT_PROMPT = 'What do you do?';

export class StepExecutor {
  constructor(
    private readonly model: ModelClient,
    private readonly resolver: PromptResolver,
    private readonly judge: LoopJudge,
    private readonly defaults: ModelDefaults,
    private readonly files: WorkflowFiles = new WorkflowFiles(),
  ) {}

  callOptions(step: StepDefinition): ModelCallOptions {
    return {
      model: step.model ?? this.defaults.model,
      provider: step.provider ?? this.defaults.provider,
      temperature: step.temperature ?? this.defaults.temperature,
      maxTokens: step.maxTokens ?? this.defaults.maxTokens,
      timeoutMs: step.timeoutMs ?? this.defaults.timeoutMs,
    };
  }

  variables(store: ContextStore, input?: string): TemplateVariables {
    const { entries, world } = store.snapshot();
    const lastReply = [...entries].reverse().find(entry => entry.role === 'ai');
    return {
      ...world,
      input,
      lastReply: lastReply?.text,
    };
  }

  systemPrompt(step: StepDefinition, variables: TemplateVariables, reference?: string | null): string {
    const parts: string[] = [];

    if (step.fragments.length > 0) {
      parts.push(
        step.fragmentLayout === 'sectioned'
          ? this.resolver.compose(step.fragments, variables)
          : this.resolver.resolve(step.fragments, variables),
      );
    }
    parts.push(renderTemplate(step.prompt, variables));
    if (step.readFromFile && reference) {
      parts.push(`--- Reference: ${step.readFromFile} ---\n${reference.trim()}`);
    }

    return parts
      .map(part => part.trim())
      .filter(part => part.length > 0)
      .join(FRAGMENT_SEPARATOR);
  }

  /**
   * Runs one step to completion, loop included. A step resumed with a
   * recorded iteration count goes straight to its pending loop judgment.
   */
  async execute(step: StepDefinition, node: NodeDefinition, session: SessionHandle): Promise<StepOutcome> {
    const { state } = session;
    let iterations = state.stepIterations[step.id] ?? 0;
    let awaitingJudgment = iterations > 0;

    while (true) {
      if (!awaitingJudgment) {
        session.emit({ type: 'step_started', nodeId: node.id, stepId: step.id, iteration: iterations + 1 });
        const reply = await this.dispatch(step, node, session);
        iterations++;
        this.commit(step, node, session, reply, iterations);
      }
      awaitingJudgment = false;

      if (step.loopPolicy === 'none') {
        break;
      }
      if (session.shouldSuspend()) {
        return 'suspended';
      }

      if (iterations >= step.maxIterations) {
        logger.warn('LoopBoundExceeded: step loop stopped at its iteration bound', {
          stepId: step.id,
          maxIterations: step.maxIterations,
        });
        session.emit({ type: 'loop_bound_exceeded', scope: 'step', id: step.id, maxIterations: step.maxIterations });
        break;
      }

      const proceed = await this.judge.shouldContinue({
        scope: 'step',
        id: step.id,
        loopPrompt: step.loopPrompt,
        store: session.store,
        options: this.callOptions(step),
        signal: session.signal,
      });
      if (!proceed) {
        break;
      }
      session.emit({ type: 'loop_iterated', scope: 'step', id: step.id, iteration: iterations + 1 });
    }

    delete state.stepIterations[step.id];
    state.cursor.completedStepIds.push(step.id);
    session.commit();
    return 'completed';
  }

  private async dispatch(step: StepDefinition, node: NodeDefinition, session: SessionHandle): Promise<StepReply> {
    if (session.signal.aborted) {
      throw new CancelledError();
    }

    const input = step.awaitPlayerInput
      ? await session.takeInput(node.id, step.id, step.inputPrompt ?? DEFAULT_INPUT_PROMPT, session.signal)
      : undefined;

    try {
      const reference = step.readFromFile
        ? await this.files.read(session.state.workflowId, step.readFromFile)
        : null;
      const variables = this.variables(session.store, input);
      const systemPrompt = this.systemPrompt(step, variables, reference);
      const conversation = step.useContext ? toConversation(session.store.snapshot().entries) : [];
      conversation.push({ role: 'user', content: input ?? renderTemplate(step.placeholder, variables) });

      logger.debug('Dispatching step', { nodeId: node.id, stepId: step.id, turns: conversation.length });
      const result = await this.model.complete(systemPrompt, conversation, this.callOptions(step), session.signal);

      if (session.signal.aborted) {
        throw new CancelledError();
      }
      if (!result.success) {
        throw result.error;
      }
      if (step.saveToFile) {
        await this.files.write(session.state.workflowId, step.saveToFile, result.text);
      }
      return { text: result.text, input };
    } catch (error) {
      if (input !== undefined) {
        session.returnInput(input);
      }
      throw error;
    }
  }

  private commit(
    step: StepDefinition,
    node: NodeDefinition,
    session: SessionHandle,
    reply: StepReply,
    iteration: number,
  ): void {
    const { store, state } = session;

    if (step.saveToContext) {
      if (reply.input !== undefined) {
        store.append({ role: 'player', text: reply.input, nodeId: node.id, stepId: step.id });
      }
      store.append({ role: 'ai', text: reply.text, nodeId: node.id, stepId: step.id });
    }
    if (step.captureAs) {
      store.setWorldAttribute(step.captureAs, reply.text);
    }

    state.stepIterations[step.id] = iteration;
    session.commit();
    session.emit({ type: 'step_completed', nodeId: node.id, stepId: step.id, iteration, text: reply.text });
  }
}
