import { describe, expect, it } from 'vitest';

import { PromptError } from '../utils/errors.js';
import { InMemoryPromptLibrary } from './library.js';
import { PromptResolver, renderTemplate } from './resolver.js';

const library = new InMemoryPromptLibrary([
  { id: 'rules', type: 'goal', content: 'Stay in character.' },
  { id: 'world', type: 'core_content', content: 'The town of {{town}} is at war.' },
  { id: 'no-modern', type: 'prohibitions', content: 'No modern technology.' },
  { id: 'short', type: 'response_structure', content: 'Answer in two paragraphs.' },
  { id: 'tone', type: 'goal', content: 'Keep it grim.' },
]);

describe('renderTemplate', () => {
  it('should substitute plain and nested placeholders', () => {
    const text = renderTemplate('{{ hero }} carries {{inventory.0}} and {{stats.hp}} hp', {
      hero: 'Mara',
      inventory: ['a lantern'],
      stats: { hp: 12 },
    });

    expect(text).toBe('Mara carries a lantern and 12 hp');
  });

  it('should leave unknown placeholders alone', () => {
    expect(renderTemplate('Hello {{missing}}', {})).toBe('Hello {{missing}}');
  });

  it('should write non-string values as JSON', () => {
    expect(renderTemplate('{{flags}}', { flags: { lit: true } })).toBe('{"lit":true}');
  });
});

describe('PromptResolver', () => {
  const resolver = new PromptResolver(library);

  it('should join fragments in the given order', () => {
    expect(resolver.resolve(['no-modern', 'rules'])).toBe('No modern technology.\n\nStay in character.');
  });

  it('should render variables inside fragments', () => {
    expect(resolver.resolve(['world'], { town: 'Vell' })).toBe('The town of Vell is at war.');
  });

  it('should group fragments into sections', () => {
    expect(resolver.compose(['short', 'rules', 'tone', 'no-modern'])).toBe(
      [
        '### Core Rules ###\n\n- Stay in character.\n- Keep it grim.',
        '### Prohibitions ###\n\n- No modern technology.',
        '### Response Structure ###\n\n- Answer in two paragraphs.',
      ].join('\n\n'),
    );
  });

  it('should throw PromptError for an unknown fragment', () => {
    expect(() => resolver.resolve(['rules', 'ghost'])).toThrow(PromptError);
    try {
      resolver.resolve(['ghost']);
    } catch (error) {
      expect(error).toBeInstanceOf(PromptError);
      expect(error instanceof PromptError ? error.fragmentId : null).toBe('ghost');
    }
  });
});
