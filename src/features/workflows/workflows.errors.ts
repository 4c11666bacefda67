export type WorkflowErrorKind =
  | 'ValidationError'
  | 'ToolError'
  | 'TimeoutError'
  | 'StepLimitExceeded'
  | 'UnknownToolReference'
  | 'MalformedToolCallMarker'
  | 'ProviderError'
  | 'ConditionError'
  | 'DefinitionError'
  | 'ExecutionError';

export type ToolErrorReason = 'UpstreamStatus' | 'FetchFailed' | 'DeliveryFailed' | 'UnsupportedOperation';

// Definition bugs and runaway loops; never retried, never absorbed by continue_on_error.
const FATAL_KINDS: ReadonlySet<WorkflowErrorKind> = new Set<WorkflowErrorKind>([
  'StepLimitExceeded',
  'UnknownToolReference',
  'DefinitionError',
]);

export class WorkflowError extends Error {
  readonly kind: WorkflowErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: WorkflowErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }

  get fatal(): boolean {
    return FATAL_KINDS.has(this.kind);
  }

  toJSON(): { kind: WorkflowErrorKind; message: string; details?: Record<string, unknown> } {
    return { kind: this.kind, message: this.message, details: this.details };
  }
}

export class ValidationError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ValidationError', message, details);
  }
}

export class ToolError extends WorkflowError {
  readonly reason: ToolErrorReason;

  constructor(reason: ToolErrorReason, message: string, details?: Record<string, unknown>) {
    super('ToolError', message, { reason, ...details });
    this.reason = reason;
  }
}

export class TimeoutError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TimeoutError', message, details);
  }
}

export class StepLimitExceededError extends WorkflowError {
  constructor(maxSteps: number) {
    super('StepLimitExceeded', `Workflow exceeded the limit of ${maxSteps} node executions`, { maxSteps });
  }
}

export class UnknownToolReferenceError extends WorkflowError {
  constructor(toolId: string, nodeId?: string) {
    super('UnknownToolReference', `Tool "${toolId}" is not defined for this agent`, { toolId, nodeId });
  }
}

export class MalformedToolCallMarkerError extends WorkflowError {
  constructor(message: string, raw: string) {
    super('MalformedToolCallMarker', message, { raw });
  }
}

export class ProviderError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ProviderError', message, details);
  }
}

export class ConditionError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ConditionError', message, details);
  }
}

export class DefinitionError extends WorkflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DefinitionError', message, details);
  }
}

export const toWorkflowError = (error: unknown): WorkflowError => {
  if (error instanceof WorkflowError) {
    return error;
  }
  if (error instanceof Error) {
    return new WorkflowError('ExecutionError', error.message, { name: error.name });
  }
  return new WorkflowError('ExecutionError', String(error));
};
