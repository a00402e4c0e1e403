export type ModelErrorKind =
  | 'Timeout'
  | 'Unauthorized'
  | 'RateLimited'
  | 'TransportError'
  | 'MalformedResponse';

const TRANSIENT_KINDS: ReadonlySet<ModelErrorKind> = new Set<ModelErrorKind>([
  'Timeout',
  'RateLimited',
  'TransportError',
]);

export function isTransientKind(kind: ModelErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

export class ModelError extends Error {
  constructor(
    readonly kind: ModelErrorKind,
    message: string,
    readonly status?: number,
    readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'ModelError';
  }

  get transient(): boolean {
    return isTransientKind(this.kind);
  }
}

export class PromptError extends Error {
  readonly kind = 'UnresolvedFragment';

  constructor(readonly fragmentId: string) {
    super(`Prompt fragment not found: ${fragmentId}`);
    this.name = 'PromptError';
  }
}

export type StateErrorReason = 'corrupt' | 'version_mismatch' | 'workflow_mismatch' | 'not_resumable';

/**
 * A persisted RunState that cannot be resumed. Fatal for the session: the
 * caller has to restart or repair the snapshot by hand.
 */
export class StateError extends Error {
  constructor(
    readonly reason: StateErrorReason,
    message: string,
  ) {
    super(message);
    this.name = 'StateError';
  }
}

export class WorkflowValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'WorkflowValidationError';
  }
}

/** Raised inside the engine when an in-flight call or input wait was aborted. */
export class CancelledError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ModelError) {
    const status = error.status !== undefined ? ` (HTTP ${error.status})` : '';
    return `Model call failed [${error.kind}]${status}: ${error.message}`;
  }
  if (error instanceof PromptError) {
    return `Prompt could not be built [${error.kind}]: ${error.message}`;
  }
  if (error instanceof StateError) {
    return `Saved session cannot be resumed [${error.reason}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
