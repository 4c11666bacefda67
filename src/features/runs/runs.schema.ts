import { z } from 'zod';

const identifier = z.string().regex(/^[A-Za-z0-9_-]+$/);

export const startRunSchema = z.object({
  params: z.object({ agentId: identifier, workflowId: identifier }),
  body: z
    .object({
      context: z.record(z.string(), z.unknown()).default({}),
    })
    .default({}),
});

export const listRunsSchema = z.object({
  query: z.object({
    agentId: identifier.optional(),
  }),
});
