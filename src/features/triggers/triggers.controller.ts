import { Response } from 'express';
import { AuthenticatedRequest, requireUser } from '@/shared/middlewares/auth.middleware';
import { agentParamsSchema } from '@/features/agents/agents.schema';
import { getAgentForExecution } from '@/features/agents/agents.service';
import { clearHistory } from '@/features/sessions/sessions.service';
import { HttpStatus } from '@/utils/http-status';
import { chatSchema } from './triggers.schema';
import { handleChatMessage } from './triggers.service';

export const chatHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params, body } = chatSchema.parse({ params: req.params, body: req.body });
  const agent = await getAgentForExecution(params.agentId, user.id);
  const reply = await handleChatMessage(agent, user.id, body.message);
  res.json(reply);
};

export const clearChatHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params } = agentParamsSchema.parse({ params: req.params });
  const agent = await getAgentForExecution(params.agentId, user.id);
  await clearHistory(user.id, agent.agentId);
  res.status(HttpStatus.NO_CONTENT).send();
};
