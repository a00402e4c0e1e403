export type LoopPolicy = 'none' | 'conditional';

export type ExecutionMode = 'sequential' | 'parallel';

export type FragmentLayout = 'ordered' | 'sectioned';

export interface LoopSettings {
  loopPolicy: LoopPolicy;
  loopPrompt: string;
  maxIterations: number;
}

export interface StepDefinition extends LoopSettings {
  id: string;
  name?: string;
  prompt: string;
  executionMode: ExecutionMode;
  fragments: string[];
  fragmentLayout: FragmentLayout;
  useContext: boolean;
  awaitPlayerInput: boolean;
  inputPrompt?: string;
  placeholder: string;
  saveToContext: boolean;
  captureAs?: string;
  /** Workflow file appended to the system prompt as reference material. */
  readFromFile?: string;
  /** Workflow file overwritten with each reply. */
  saveToFile?: string;
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface NodeDefinition extends LoopSettings {
  id: string;
  name?: string;
  steps: StepDefinition[];
}

export interface WorkflowDefinition {
  id: string;
  name: string;
  description?: string;
  entryNodeId?: string;
  nodes: NodeDefinition[];
}

export interface WorkflowDocument {
  workflows: WorkflowDefinition[];
}

export type ContextRole = 'system' | 'player' | 'ai';

export interface ContextEntry {
  seq: number;
  role: ContextRole;
  text: string;
  timestamp: string;
  nodeId?: string;
  stepId?: string;
}

export type WorldValue =
  | string
  | number
  | boolean
  | null
  | WorldValue[]
  | { [key: string]: WorldValue };

export type WorldState = Record<string, WorldValue>;

export type RunStatus = 'idle' | 'running' | 'suspended' | 'completed' | 'failed';

export const RUN_STATE_VERSION = 1;

export interface RunCursor {
  nodeIndex: number;
  /** Index of the first step of the batch in progress (or next to run). */
  stepIndex: number;
  completedStepIds: string[];
}

export interface RunState {
  version: typeof RUN_STATE_VERSION;
  sessionId: string;
  workflowId: string;
  status: RunStatus;
  cursor: RunCursor;
  nodeIterations: Record<string, number>;
  stepIterations: Record<string, number>;
  context: ContextEntry[];
  world: WorldState;
  pendingInput: string[];
  failureReason?: string;
  createdAt: string;
  updatedAt: string;
}

export type LoopScope = 'node' | 'step';

interface EventBase {
  timestamp: string;
}

export type EngineEvent =
  | (EventBase & { type: 'session_started'; sessionId: string; workflowId: string; resumed: boolean })
  | (EventBase & { type: 'node_entered'; nodeId: string; iteration: number; progress: number })
  | (EventBase & { type: 'step_started'; nodeId: string; stepId: string; iteration: number })
  | (EventBase & { type: 'step_completed'; nodeId: string; stepId: string; iteration: number; text: string })
  | (EventBase & { type: 'loop_iterated'; scope: LoopScope; id: string; iteration: number })
  | (EventBase & { type: 'loop_bound_exceeded'; scope: LoopScope; id: string; maxIterations: number })
  | (EventBase & { type: 'input_requested'; nodeId: string; stepId: string; prompt: string })
  | (EventBase & { type: 'suspended'; sessionId: string })
  | (EventBase & { type: 'completed'; sessionId: string })
  | (EventBase & { type: 'failed'; sessionId: string; reason: string });

export type EngineEventType = EngineEvent['type'];

export type EventCallback = (event: EngineEvent) => void;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type EventPayload = DistributiveOmit<EngineEvent, 'timestamp'>;
