import type { AgentDefinition, NodeType, WorkflowSpec } from '@/features/agents/agents.types';
import type { Logger } from '@/utils/logger';
import type { WorkflowError, WorkflowErrorKind } from './workflows.errors';

export type VariableContext = Record<string, unknown>;

export type RunStatus = 'pending' | 'running' | 'completed' | 'halted' | 'failed';

export type NodeDirective =
  | { type: 'continue' }
  | { type: 'jump'; nodeId: string }
  | { type: 'halt'; reason: string }
  | { type: 'complete' }
  | { type: 'fail'; error: WorkflowError };

export interface NodeResult {
  output: unknown;
  directive: NodeDirective;
}

/** Stored under `output_variable` when a failing node has `continue_on_error`. */
export interface ErrorMarker {
  error: true;
  kind: WorkflowErrorKind;
  message: string;
}

export type AttemptOutcome = 'success' | 'retried' | 'error';

export interface ExecutionRecord {
  nodeId: string;
  type: NodeType;
  attempt: number;
  startedAt: Date;
  endedAt: Date;
  outcome: AttemptOutcome;
  output?: string;
  error?: { kind: WorkflowErrorKind; message: string };
  note?: string;
}

export type Responder = (message: string) => Promise<void>;

export interface ExecutionScope {
  runId: string;
  agent: AgentDefinition;
  workflow: WorkflowSpec;
  context: VariableContext;
  respond: Responder;
  record: (entry: ExecutionRecord) => void;
  logger: Logger;
}

export interface RunOptions {
  runId?: string;
  maxSteps?: number;
  /** Checked between nodes only; a node in flight finishes first. */
  signal?: AbortSignal;
  respond?: Responder;
}

export interface RunResult {
  runId: string;
  agentId: string;
  workflowId: string;
  status: Exclude<RunStatus, 'pending' | 'running'>;
  context: VariableContext;
  records: ExecutionRecord[];
  /** Messages the responder accepted, in delivery order. */
  responses: string[];
  steps: number;
  haltReason?: string;
  error?: { kind: WorkflowErrorKind; message: string; details?: Record<string, unknown> };
  startedAt: Date;
  endedAt: Date;
}
