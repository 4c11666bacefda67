import type { z } from 'zod';
import type {
  agentDefinitionSchema,
  llmConfigSchema,
  scheduleSpecSchema,
  workflowNodeSchema,
  workflowSpecSchema,
} from './agents.schema';
import type { toolSpecSchema } from '@/features/tools/tools.registry';

export type AgentDefinition = z.infer<typeof agentDefinitionSchema>;
export type AgentInput = z.input<typeof agentDefinitionSchema>;
export type LlmConfig = z.infer<typeof llmConfigSchema>;
export type ToolSpec = z.infer<typeof toolSpecSchema>;
export type WorkflowSpec = z.infer<typeof workflowSpecSchema>;
export type ScheduleSpec = z.infer<typeof scheduleSpecSchema>;
export type WorkflowNode = z.infer<typeof workflowNodeSchema>;
export type NodeType = WorkflowNode['type'];
export type NodeOfType<T extends NodeType> = Extract<WorkflowNode, { type: T }>;
export type ToolOfType<T extends ToolSpec['type']> = Extract<ToolSpec, { type: T }>;

/** Read-only source of agent definitions; the engine loads one per run. */
export interface AgentStore {
  getAgent(agentId: string): Promise<AgentDefinition | null>;
}

export interface DefinitionIssue {
  kind: 'UnknownToolReference' | 'DefinitionError';
  path: string;
  message: string;
}
