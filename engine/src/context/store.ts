import type { ContextEntry, ContextRole, WorldState, WorldValue } from '../workflow/types.js';

export interface NewContextEntry {
  role: ContextRole;
  text: string;
  nodeId?: string;
  stepId?: string;
}

export interface ContextSnapshot {
  readonly entries: readonly ContextEntry[];
  readonly world: Readonly<WorldState>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Append-only conversation log plus the mutable world attributes of one
 * session. The store works on the arrays it is given, so the RunState that
 * owns them always reflects the last append.
 */
export class ContextStore {
  private readonly log: ContextEntry[];
  private readonly attributes: WorldState;

  constructor(entries: ContextEntry[] = [], world: WorldState = {}) {
    this.log = entries;
    this.attributes = world;
  }

  get size(): number {
    return this.log.length;
  }

  append(entry: NewContextEntry): ContextEntry {
    const last = this.log[this.log.length - 1];
    const stored: ContextEntry = Object.freeze({
      seq: last ? last.seq + 1 : 1,
      role: entry.role,
      text: entry.text,
      timestamp: new Date().toISOString(),
      ...(entry.nodeId !== undefined ? { nodeId: entry.nodeId } : {}),
      ...(entry.stepId !== undefined ? { stepId: entry.stepId } : {}),
    });
    this.log.push(stored);
    return stored;
  }

  setWorldAttribute(key: string, value: WorldValue): void {
    this.attributes[key] = value;
  }

  getWorldAttribute(key: string): WorldValue | undefined {
    return this.attributes[key];
  }

  entries(): readonly ContextEntry[] {
    return this.log.slice();
  }

  tail(count: number): readonly ContextEntry[] {
    return count > 0 ? this.log.slice(-count) : [];
  }

  snapshot(): ContextSnapshot {
    return Object.freeze({
      entries: Object.freeze(this.log.slice()),
      world: deepFreeze(structuredClone(this.attributes)),
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

const CHAT_ROLE: Record<ContextRole, ChatMessage['role']> = {
  system: 'system',
  player: 'user',
  ai: 'assistant',
};

/**
 * Maps context entries to chat turns. Consecutive AI entries become one
 * assistant turn so multi-step narration reads as a single reply.
 */
export function toConversation(entries: readonly ContextEntry[]): ChatMessage[] {
  const messages: ChatMessage[] = [];

  for (const entry of entries) {
    const role = CHAT_ROLE[entry.role];
    const previous = messages[messages.length - 1];
    if (role === 'assistant' && previous?.role === 'assistant') {
      previous.content = `${previous.content}\n\n${entry.text}`;
      continue;
    }
    messages.push({ role, content: entry.text });
  }

  return messages;
}
