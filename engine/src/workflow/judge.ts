import { toConversation, type ContextStore } from '../context/store.js';
import type { ModelCallOptions, ModelClient } from '../model/client.js';
import { config } from '../utils/config.js';
import { CancelledError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { LoopScope } from './types.js';

export type JudgmentVerdict = 'met' | 'not_met' | 'invalid';

const VERDICT = /^(YES|NO)(?![A-Za-z])/i;

/**
 * The only grammar the engine accepts from a loop judgment: the trimmed reply
 * starts with YES or NO, not followed by another letter.
 */
export function parseJudgment(reply: string): JudgmentVerdict {
  const match = VERDICT.exec(reply.trim());
  if (!match) {
    return 'invalid';
  }
  return match[1].toUpperCase() === 'YES' ? 'met' : 'not_met';
}

export const JUDGE_INSTRUCTIONS =
  'You are the referee of an interactive story. Read the conversation and decide whether the ' +
  'condition below is now true. Start your reply with YES or NO.';

export interface JudgmentRequest {
  scope: LoopScope;
  id: string;
  loopPrompt: string;
  store: ContextStore;
  options: ModelCallOptions;
  signal: AbortSignal;
}

/**
 * Asks the model whether a loop's exit condition holds. The loop continues only
 * on a clear NO; YES ends it, and an unparsable reply ends it as a policy
 * violation.
 */
export class LoopJudge {
  constructor(private readonly model: ModelClient) {}

  async shouldContinue(request: JudgmentRequest): Promise<boolean> {
    const { scope, id, loopPrompt, store, signal } = request;
    const conversation = toConversation(store.snapshot().entries);
    conversation.push({
      role: 'user',
      content: `${loopPrompt}\nAnswer with YES or NO.`,
    });

    const result = await this.model.complete(
      `${JUDGE_INSTRUCTIONS}\n\nCondition: ${loopPrompt}`,
      conversation,
      {
        ...request.options,
        temperature: config.judge.temperature,
        maxTokens: config.judge.maxTokens,
      },
      signal,
    );

    if (signal.aborted) {
      throw new CancelledError();
    }
    if (!result.success) {
      throw result.error;
    }

    const verdict = parseJudgment(result.text);
    if (verdict === 'invalid') {
      logger.warn('PolicyViolation: loop judgment reply is not YES/NO, ending loop', {
        scope,
        id,
        reply: result.text.slice(0, 120),
      });
      return false;
    }

    logger.debug('Loop judgment', { scope, id, verdict });
    return verdict === 'not_met';
  }
}
