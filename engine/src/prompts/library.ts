import { readFile } from 'fs/promises';
import { z } from 'zod';

import { WorkflowValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatIssues } from '../workflow/schema.js';

export type FragmentType = 'goal' | 'core_content' | 'prohibitions' | 'response_structure';

export const FRAGMENT_TYPES: readonly FragmentType[] = [
  'goal',
  'core_content',
  'prohibitions',
  'response_structure',
];

export interface PromptFragment {
  id: string;
  type: FragmentType;
  content: string;
  description?: string;
}

/**
 * Read-only lookup into the prompt library maintained by the authoring tool.
 */
export interface PromptLibrary {
  resolveFragment(id: string): PromptFragment | null;
}

export class InMemoryPromptLibrary implements PromptLibrary {
  private fragments: Map<string, PromptFragment>;

  constructor(fragments: PromptFragment[] = []) {
    this.fragments = new Map(fragments.map(fragment => [fragment.id, fragment]));
  }

  resolveFragment(id: string): PromptFragment | null {
    return this.fragments.get(id) ?? null;
  }

  list(): string[] {
    return Array.from(this.fragments.keys());
  }
}

const libraryFileSchema = z.record(
  z.string().min(1),
  z.object({
    type: z.enum(['goal', 'core_content', 'prohibitions', 'response_structure']),
    content: z.string(),
    description: z.string().optional(),
  }),
);

export async function loadPromptLibrary(filePath: string): Promise<InMemoryPromptLibrary> {
  const content = await readFile(filePath, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new WorkflowValidationError(`Prompt library is not valid JSON: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = libraryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowValidationError('Invalid prompt library', formatIssues(parsed.error));
  }

  const fragments = Object.entries(parsed.data).map(([id, fragment]) => ({ id, ...fragment }));
  logger.debug('Loaded prompt library', { filePath, fragments: fragments.length });
  return new InMemoryPromptLibrary(fragments);
}
