import { z } from 'zod';

const agentIdParam = z.string().regex(/^[A-Za-z0-9_-]+$/);

export const chatSchema = z.object({
  params: z.object({ agentId: agentIdParam }),
  body: z.object({
    message: z.string().trim().min(1).max(4000),
  }),
});
