import { PromptError } from '../utils/errors.js';
import type { WorldValue } from '../workflow/types.js';
import type { FragmentType, PromptFragment, PromptLibrary } from './library.js';

export type TemplateVariables = Record<string, WorldValue | undefined>;

export const FRAGMENT_SEPARATOR = '\n\n';

export const SECTION_HEADERS: Record<FragmentType, string> = {
  goal: '### Core Rules ###',
  core_content: '### Core Content & Worldview ###',
  prohibitions: '### Prohibitions ###',
  response_structure: '### Response Structure ###',
};

export const DEFAULT_SECTION_ORDER: readonly FragmentType[] = [
  'goal',
  'core_content',
  'prohibitions',
  'response_structure',
];

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w-]*(?:\.[\w-]+)*)\s*\}\}/g;

function lookup(variables: TemplateVariables, path: string): WorldValue | undefined {
  const [head, ...rest] = path.split('.');
  let current: WorldValue | undefined = variables[head];

  for (const key of rest) {
    if (current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    current = Array.isArray(current) ? current[Number(key)] : current[key];
  }

  return current;
}

/**
 * Replaces `{{name}}` and `{{name.path}}` placeholders. Strings are inserted
 * as-is, other values as JSON; unknown placeholders stay in the text.
 */
export function renderTemplate(text: string, variables: TemplateVariables): string {
  return text.replace(PLACEHOLDER, (match, path: string) => {
    const value = lookup(variables, path);
    if (value === undefined) {
      return match;
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}

export class PromptResolver {
  constructor(private readonly library: PromptLibrary) {}

  private fetch(ids: readonly string[]): PromptFragment[] {
    return ids.map(id => {
      const fragment = this.library.resolveFragment(id);
      if (!fragment) {
        throw new PromptError(id);
      }
      return fragment;
    });
  }

  /**
   * Joins the fragments in the order given, each rendered against `variables`.
   */
  resolve(ids: readonly string[], variables: TemplateVariables = {}): string {
    return this.fetch(ids)
      .map(fragment => renderTemplate(fragment.content, variables))
      .join(FRAGMENT_SEPARATOR);
  }

  /**
   * Groups fragments by type under section headers, sections in `order`.
   * Types missing from `order` are left out.
   */
  compose(
    ids: readonly string[],
    variables: TemplateVariables = {},
    order: readonly FragmentType[] = DEFAULT_SECTION_ORDER,
  ): string {
    const fragments = this.fetch(ids);
    const sections: string[] = [];

    for (const type of order) {
      const items = fragments
        .filter(fragment => fragment.type === type)
        .map(fragment => `- ${renderTemplate(fragment.content, variables)}`);

      if (items.length > 0) {
        sections.push(`${SECTION_HEADERS[type]}${FRAGMENT_SEPARATOR}${items.join('\n')}`);
      }
    }

    return sections.join(FRAGMENT_SEPARATOR);
  }
}
