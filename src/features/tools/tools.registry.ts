import { z } from 'zod';

const toolIdSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'Use letters, digits, "_" or "-"');

const apiConfigSchema = z.object({
  endpoint: z.string().url(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).default('GET'),
  timeout: z.number().positive().default(30),
  headers: z.record(z.string(), z.string()).optional(),
  auth: z
    .object({
      type: z.enum(['apiKey', 'bearer']),
      key: z.string().min(1),
      header: z.string().optional(),
    })
    .optional(),
});

const databaseOperationSchema = z.enum([
  'find_documents',
  'insert_document',
  'update_document',
  'delete_document',
  'count_documents',
  'aggregate',
]);

const databaseConfigSchema = z.object({
  operation: z.string().optional(),
  operations: z.array(databaseOperationSchema).optional(),
});

const rssConfigSchema = z.object({
  url: z.string().url(),
  refreshInterval: z.number().nonnegative().optional(),
  limit: z.number().int().positive().optional(),
});

const telegramConfigSchema = z.object({
  parseMode: z.enum(['Markdown', 'MarkdownV2', 'HTML', 'None']).default('Markdown'),
  chatId: z.union([z.string(), z.number()]).optional(),
});

const functionConfigSchema = z.object({
  functionName: z.string().min(1),
});

const toolBase = {
  toolId: toolIdSchema,
  name: z.string().min(1),
  description: z.string().default(''),
};

export const toolSpecSchema = z.discriminatedUnion('type', [
  z.object({ ...toolBase, type: z.literal('API'), config: apiConfigSchema }),
  z.object({ ...toolBase, type: z.literal('DATABASE'), config: databaseConfigSchema.default({}) }),
  z.object({ ...toolBase, type: z.literal('RSS'), config: rssConfigSchema }),
  z.object({ ...toolBase, type: z.literal('TELEGRAM'), config: telegramConfigSchema.default({}) }),
  z.object({ ...toolBase, type: z.literal('FUNCTION'), config: functionConfigSchema }),
]);

export const DATABASE_OPERATIONS = databaseOperationSchema.options;

export type DatabaseOperation = z.infer<typeof databaseOperationSchema>;

export interface ToolDefinition {
  type: ToolType;
  name: string;
  description: string;
  configSchema: z.ZodTypeAny;
  secureFields?: string[];
}

export type ToolType = z.infer<typeof toolSpecSchema>['type'];

export const toolRegistry: ToolDefinition[] = [
  {
    type: 'API',
    name: 'HTTP API',
    description: 'Call a REST endpoint; parameters become the query string or JSON body',
    configSchema: apiConfigSchema,
    secureFields: ['auth.key'],
  },
  {
    type: 'DATABASE',
    name: 'Agent database',
    description: "Find, insert, update, delete, count or aggregate documents in the agent's collection",
    configSchema: databaseConfigSchema,
  },
  {
    type: 'RSS',
    name: 'RSS feed',
    description: 'Fetch and normalize the entries of an RSS or Atom feed',
    configSchema: rssConfigSchema,
  },
  {
    type: 'TELEGRAM',
    name: 'Telegram message',
    description: 'Send a formatted message to a Telegram chat',
    configSchema: telegramConfigSchema,
  },
  {
    type: 'FUNCTION',
    name: 'Built-in function',
    description: 'Call a function registered by the host process',
    configSchema: functionConfigSchema,
  },
];

export const getToolDefinition = (type: string): ToolDefinition | undefined =>
  toolRegistry.find((def) => def.type === type);
