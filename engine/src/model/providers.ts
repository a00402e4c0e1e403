import { readFile } from 'fs/promises';
import { z } from 'zod';

import { config } from '../utils/config.js';
import { ModelError, WorkflowValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatIssues } from '../workflow/schema.js';

export type ProviderParams = Record<string, string | number | boolean>;

export interface ProviderConfig {
  name: string;
  baseUrl: string;
  apiKey?: string;
  defaultModel: string;
  params?: ProviderParams;
}

const providersFileSchema = z.object({
  providers: z.array(
    z.object({
      name: z.string().min(1),
      baseUrl: z.string().url(),
      apiKey: z.string().optional(),
      defaultModel: z.string().min(1),
      params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
    }),
  ),
});

export function environmentProvider(): ProviderConfig {
  return {
    name: 'default',
    baseUrl: config.model.baseUrl,
    apiKey: config.model.apiKey,
    defaultModel: config.model.name,
  };
}

/**
 * Read-only provider settings. The engine passes provider names through
 * without looking inside; only the model client resolves them.
 */
export class ProviderRegistry {
  private providers: Map<string, ProviderConfig>;
  private fallback: ProviderConfig;

  constructor(providers: ProviderConfig[] = [], fallback: ProviderConfig = environmentProvider()) {
    this.providers = new Map(providers.map(provider => [provider.name, provider]));
    this.fallback = fallback;
  }

  get(name: string): ProviderConfig | null {
    return this.providers.get(name) ?? null;
  }

  list(): string[] {
    return Array.from(this.providers.keys());
  }

  resolve(name?: string): ProviderConfig {
    if (!name || name === 'default') {
      return this.providers.get('default') ?? this.fallback;
    }

    const provider = this.providers.get(name);
    if (!provider) {
      throw new ModelError('Unauthorized', `No credentials configured for provider '${name}'`);
    }
    return provider;
  }
}

export async function loadProviders(filePath: string): Promise<ProviderRegistry> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    logger.warn('Provider file not readable, using environment defaults', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return new ProviderRegistry();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new WorkflowValidationError(`Provider file is not valid JSON: ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = providersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowValidationError('Invalid provider file', formatIssues(parsed.error));
  }

  return new ProviderRegistry(parsed.data.providers);
}
