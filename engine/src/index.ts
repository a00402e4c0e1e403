export { ContextStore, toConversation } from './context/store.js';
export type { ChatMessage, ContextSnapshot, NewContextEntry } from './context/store.js';

export { InMemoryPromptLibrary, loadPromptLibrary, FRAGMENT_TYPES } from './prompts/library.js';
export type { FragmentType, PromptFragment, PromptLibrary } from './prompts/library.js';
export { PromptResolver, renderTemplate, SECTION_HEADERS, DEFAULT_SECTION_ORDER } from './prompts/resolver.js';
export type { TemplateVariables } from './prompts/resolver.js';

export type { ModelCallOptions, ModelClient, ModelResult } from './model/client.js';
export { OpenAiCompatibleClient } from './model/openai-compatible.js';
export { ProviderRegistry, loadProviders, environmentProvider } from './model/providers.js';
export type { ProviderConfig } from './model/providers.js';
export { RetryingModelClient, backoffDelay, DEFAULT_RETRY_POLICY } from './model/retrying-client.js';
export type { RetryPolicy } from './model/retrying-client.js';

export { LoopJudge, parseJudgment } from './workflow/judge.js';
export { partitionBatches } from './workflow/node-executor.js';
export type { StepBatch } from './workflow/node-executor.js';
export { WorkflowRunner, AUTOSAVE_SLOT } from './workflow/runner.js';
export type { RunnerOptions } from './workflow/runner.js';
export { RunStore, serializeRunState, deserializeRunState } from './workflow/run-store.js';
export type { SavedSlot } from './workflow/run-store.js';
export { WorkflowFiles, isContainedPath } from './workflow/files.js';
export { parseWorkflowDocument, parseWorkflow } from './workflow/schema.js';
export { loadWorkflowDocument, findWorkflow } from './workflow/loader.js';
export { SessionMonitor } from './workflow/monitor.js';
export type { SessionSummary, NodeMetrics } from './workflow/monitor.js';
export * from './workflow/types.js';

export {
  ModelError,
  PromptError,
  StateError,
  WorkflowValidationError,
  CancelledError,
  describeError,
} from './utils/errors.js';
export type { ModelErrorKind, StateErrorReason } from './utils/errors.js';
