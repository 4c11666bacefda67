import type { Responder, RunResult, VariableContext } from '@/features/workflows/workflows.types';

export type RunSource = 'chat' | 'api' | 'schedule';

export interface ExecuteRunInput {
  agentId: string;
  workflowId: string;
  initialContext: VariableContext;
  owner: string;
  source: RunSource;
  respond?: Responder;
}

export interface RunRepository {
  save(result: RunResult, meta: { owner: string; source: RunSource }): Promise<void>;
}
