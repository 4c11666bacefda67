import { z } from 'zod';
import { toolSpecSchema } from '@/features/tools/tools.registry';

const identifier = z.string().regex(/^[A-Za-z0-9_-]+$/, 'Use letters, digits, "_" or "-"');
const variableName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Use a valid variable name');
const documentSchema = z.record(z.string(), z.unknown());

const nodePolicy = {
  nodeId: identifier,
  output_variable: variableName.optional(),
  continue_on_error: z.boolean().optional(),
  max_retries: z.number().int().min(0).optional(),
  retry_delay: z.number().min(0).optional(),
  timeout: z.number().positive().optional(),
  validate_input: z.boolean().optional(),
  sanitize_output: z.boolean().optional(),
};

export const workflowNodeSchema = z.discriminatedUnion('type', [
  z.object({ ...nodePolicy, type: z.literal('llm_prompt'), prompt: z.string() }),
  z.object({
    ...nodePolicy,
    type: z.literal('tool_call'),
    toolId: z.string().min(1),
    params: documentSchema.optional(),
  }),
  z.object({
    ...nodePolicy,
    type: z.literal('data_store'),
    action: z.enum(['insert', 'update', 'append', 'find', 'aggregate', 'delete', 'count']),
    collection: z.string().optional(),
    data: z.unknown().optional(),
    query: documentSchema.optional(),
    pipeline: z.array(documentSchema).optional(),
    sort: z.record(z.string(), z.union([z.literal(1), z.literal(-1)])).optional(),
    limit: z.number().int().positive().optional(),
  }),
  z.object({
    ...nodePolicy,
    type: z.literal('conditional_logic'),
    condition: z.string().min(1),
    true_branch: identifier.optional(),
    false_branch: identifier.optional(),
  }),
  z.object({ ...nodePolicy, type: z.literal('send_response'), message: z.string() }),
]);

export const workflowSpecSchema = z.object({
  workflowId: identifier,
  description: z.string().default(''),
  trigger: z.string().min(1),
  nodes: z.array(workflowNodeSchema).min(1),
});

export const scheduleSpecSchema = z.object({
  scheduleId: identifier,
  cron: z.string().min(1),
  description: z.string().default(''),
  workflowId: identifier,
});

export const llmConfigSchema = z.object({
  provider: z.enum(['openai', 'deepseek', 'gemini']).default('openai'),
  model: z.string().min(1).default('gpt-3.5-turbo'),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
});

export const dataSchemaSchema = z.object({
  collectionName: z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'Use a valid collection name'),
  schema: documentSchema.default({}),
});

export const agentDefinitionSchema = z.object({
  agentId: identifier,
  agentName: z.string().min(1),
  version: z.string().default('1.0'),
  owner: z.string().min(1),
  systemPrompt: z.string().default(''),
  llmConfig: llmConfigSchema.default({}),
  dataSchema: dataSchemaSchema,
  tools: z.array(toolSpecSchema).default([]),
  workflows: z.array(workflowSpecSchema).default([]),
  schedules: z.array(scheduleSpecSchema).default([]),
});

const agentBodySchema = agentDefinitionSchema.omit({ owner: true });

export const createAgentSchema = z.object({
  body: agentBodySchema,
});

export const updateAgentSchema = z.object({
  params: z.object({ agentId: identifier }),
  body: agentBodySchema.omit({ agentId: true }),
});

export const agentParamsSchema = z.object({
  params: z.object({ agentId: identifier }),
});
