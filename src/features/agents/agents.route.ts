import { Router } from 'express';
import { authenticate } from '@/shared/middlewares/auth.middleware';
import { validate } from '@/shared/middlewares/validation.middleware';
import { chatHandler, clearChatHandler } from '@/features/triggers/triggers.controller';
import { chatSchema } from '@/features/triggers/triggers.schema';
import { startRunHandler } from '@/features/runs/runs.controller';
import { startRunSchema } from '@/features/runs/runs.schema';
import { agentParamsSchema, createAgentSchema, updateAgentSchema } from './agents.schema';
import {
  createAgentHandler,
  deleteAgentHandler,
  getAgentHandler,
  listAgentsHandler,
  listToolDefinitions,
  updateAgentHandler,
} from './agents.controller';

const router = Router();

router.get('/tools', authenticate, listToolDefinitions);
router.get('/', authenticate, listAgentsHandler);
router.post('/', authenticate, validate(createAgentSchema), createAgentHandler);
router.get('/:agentId', authenticate, validate(agentParamsSchema), getAgentHandler);
router.put('/:agentId', authenticate, validate(updateAgentSchema), updateAgentHandler);
router.delete('/:agentId', authenticate, validate(agentParamsSchema), deleteAgentHandler);
router.post('/:agentId/chat', authenticate, validate(chatSchema), chatHandler);
router.delete('/:agentId/chat', authenticate, validate(agentParamsSchema), clearChatHandler);
router.post('/:agentId/workflows/:workflowId/runs', authenticate, validate(startRunSchema), startRunHandler);

export default router;
