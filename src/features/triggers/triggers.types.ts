import type { VariableContext } from '@/features/workflows/workflows.types';

export type ParsedTrigger =
  | { kind: 'schedule'; scheduleId: string }
  | { kind: 'any-message' }
  | { kind: 'pattern'; pattern: RegExp }
  | { kind: 'keyword'; keyword: string };

/** What a trigger source hands to the engine. */
export interface ResolvedTrigger {
  agentId: string;
  workflowId: string;
  initialContext: VariableContext;
}
