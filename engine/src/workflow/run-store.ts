import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';

import { config } from '../utils/config.js';
import { StateError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatIssues } from './schema.js';
import { RUN_STATE_VERSION, type ContextEntry, type RunState, type WorldValue } from './types.js';

const worldValueSchema: z.ZodType<WorldValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(worldValueSchema), z.record(worldValueSchema)]),
);

const contextEntrySchema = z.object({
  seq: z.number().int().positive(),
  role: z.enum(['system', 'player', 'ai']),
  text: z.string(),
  timestamp: z.string(),
  nodeId: z.string().optional(),
  stepId: z.string().optional(),
});

const runStateSchema = z.object({
  version: z.literal(RUN_STATE_VERSION),
  sessionId: z.string().min(1),
  workflowId: z.string().min(1),
  status: z.enum(['idle', 'running', 'suspended', 'completed', 'failed']),
  cursor: z.object({
    nodeIndex: z.number().int().nonnegative(),
    stepIndex: z.number().int().nonnegative(),
    completedStepIds: z.array(z.string()),
  }),
  nodeIterations: z.record(z.number().int().nonnegative()),
  stepIterations: z.record(z.number().int().nonnegative()),
  context: z.array(contextEntrySchema),
  world: z.record(worldValueSchema),
  pendingInput: z.array(z.string()),
  failureReason: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

function orderedEntry(entry: ContextEntry): ContextEntry {
  return {
    seq: entry.seq,
    role: entry.role,
    text: entry.text,
    timestamp: entry.timestamp,
    ...(entry.nodeId !== undefined ? { nodeId: entry.nodeId } : {}),
    ...(entry.stepId !== undefined ? { stepId: entry.stepId } : {}),
  };
}

/**
 * Same state in, same bytes out: keys are written in a fixed order.
 */
export function serializeRunState(state: RunState): string {
  const ordered: RunState = {
    version: state.version,
    sessionId: state.sessionId,
    workflowId: state.workflowId,
    status: state.status,
    cursor: {
      nodeIndex: state.cursor.nodeIndex,
      stepIndex: state.cursor.stepIndex,
      completedStepIds: [...state.cursor.completedStepIds],
    },
    nodeIterations: state.nodeIterations,
    stepIterations: state.stepIterations,
    context: state.context.map(orderedEntry),
    world: state.world,
    pendingInput: state.pendingInput,
    ...(state.failureReason !== undefined ? { failureReason: state.failureReason } : {}),
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

export function deserializeRunState(text: string): RunState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StateError('corrupt', `Saved session is not valid JSON: ${describeError(error)}`);
  }

  const version = z.object({ version: z.unknown() }).safeParse(raw);
  if (version.success && version.data.version !== RUN_STATE_VERSION) {
    throw new StateError(
      'version_mismatch',
      `Saved session has version ${String(version.data.version)}, expected ${RUN_STATE_VERSION}`,
    );
  }

  const parsed = runStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateError('corrupt', `Saved session is malformed: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

export interface SavedSlot {
  slot: string;
  sessionId: string;
  status: RunState['status'];
  updatedAt: string;
}

const SLOT_NAME = /^[\w-]+$/;

/**
 * One JSON file per save slot, grouped by workflow id.
 */
export class RunStore {
  private readonly baseDir: string;

  constructor(baseDir: string = config.paths.savesDir) {
    this.baseDir = baseDir;
  }

  private workflowDir(workflowId: string): string {
    return join(this.baseDir, workflowId);
  }

  private slotPath(workflowId: string, slot: string): string {
    if (!SLOT_NAME.test(slot)) {
      throw new Error(`Invalid save slot name: '${slot}'`);
    }
    return join(this.workflowDir(workflowId), `${slot}.json`);
  }

  async save(slot: string, state: RunState): Promise<string> {
    const filePath = this.slotPath(state.workflowId, slot);
    await mkdir(this.workflowDir(state.workflowId), { recursive: true });
    await writeFile(filePath, serializeRunState(state), 'utf8');
    logger.debug('Saved session', { slot, sessionId: state.sessionId, filePath });
    return filePath;
  }

  async load(workflowId: string, slot: string): Promise<RunState | null> {
    let content: string;
    try {
      content = await readFile(this.slotPath(workflowId, slot), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return deserializeRunState(content);
  }

  async list(workflowId: string): Promise<SavedSlot[]> {
    let files: string[];
    try {
      files = await readdir(this.workflowDir(workflowId));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const slots: SavedSlot[] = [];
    for (const file of files) {
      if (!file.endsWith('.json')) {
        continue;
      }
      const slot = file.slice(0, -'.json'.length);
      try {
        const state = deserializeRunState(await readFile(join(this.workflowDir(workflowId), file), 'utf8'));
        slots.push({ slot, sessionId: state.sessionId, status: state.status, updatedAt: state.updatedAt });
      } catch (error) {
        logger.warn('Skipping unreadable save slot', { workflowId, slot, error: describeError(error) });
      }
    }

    return slots.sort((a, b) => (a.updatedAt > b.updatedAt ? -1 : a.updatedAt < b.updatedAt ? 1 : 0));
  }

  /**
   * Moves a slot out of the way into `archive/`. Returns false when the slot
   * does not exist.
   */
  async archive(workflowId: string, slot: string): Promise<boolean> {
    const source = this.slotPath(workflowId, slot);
    const archiveDir = join(this.workflowDir(workflowId), 'archive');
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');

    await mkdir(archiveDir, { recursive: true });
    try {
      await rename(source, join(archiveDir, `${slot}-${stamp}.json`));
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
    logger.info('Archived save slot', { workflowId, slot });
    return true;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
