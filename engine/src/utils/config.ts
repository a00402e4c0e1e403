import 'dotenv/config';

export const config = {
  model: {
    baseUrl: process.env.MODEL_BASE_URL || 'https://api.openai.com/v1',
    apiKey: process.env.MODEL_API_KEY || '',
    name: process.env.MODEL_NAME || 'gpt-4o-mini',
    temperature: Number(process.env.MODEL_TEMPERATURE || 0.8),
    maxTokens: Number(process.env.MODEL_MAX_TOKENS || 1024),
    timeoutMs: Number(process.env.MODEL_TIMEOUT_MS || 60000),
  },
  retry: {
    maxRetries: Number(process.env.MODEL_MAX_RETRIES || 3),
    baseDelayMs: 500,
    maxDelayMs: 8000,
  },
  judge: {
    temperature: 0,
    maxTokens: 16,
  },
  execution: {
    // Unset means every member of a parallel group is dispatched at once.
    maxParallelism: Number(process.env.MAX_PARALLELISM || Infinity),
    defaultMaxIterations: Number(process.env.DEFAULT_MAX_ITERATIONS || 10),
  },
  paths: {
    workflowsFile: process.env.STORY_WORKFLOWS_FILE || './data/workflows.json',
    promptsFile: process.env.STORY_PROMPTS_FILE || './data/prompts.json',
    providersFile: process.env.STORY_PROVIDERS_FILE || './data/providers.json',
    savesDir: process.env.STORY_SAVES_DIR || './saves',
    filesDir: process.env.STORY_FILES_DIR || './files',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info', // 'debug' | 'info' | 'warn' | 'error' | 'silent'
  },
};
