import { Response } from 'express';
import { AuthenticatedRequest, requireUser } from '@/shared/middlewares/auth.middleware';
import { HttpStatus } from '@/utils/http-status';
import { toolRegistry } from '@/features/tools/tools.registry';
import { agentParamsSchema, createAgentSchema, updateAgentSchema } from './agents.schema';
import { createAgent, deleteAgent, getAgent, listAgents, updateAgent } from './agents.service';

export const listAgentsHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const agents = await listAgents(user.id);
  res.json({ agents });
};

export const getAgentHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params } = agentParamsSchema.parse({ params: req.params });
  const agent = await getAgent(params.agentId, user.id);
  res.json({ agent });
};

export const createAgentHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { body } = createAgentSchema.parse({ body: req.body });
  const agent = await createAgent(user.id, body);
  res.status(HttpStatus.CREATED).json({ agent });
};

export const updateAgentHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params, body } = updateAgentSchema.parse({ params: req.params, body: req.body });
  const agent = await updateAgent(params.agentId, user.id, body);
  res.json({ agent });
};

export const deleteAgentHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params } = agentParamsSchema.parse({ params: req.params });
  await deleteAgent(params.agentId, user.id);
  res.status(HttpStatus.NO_CONTENT).send();
};

export const listToolDefinitions = (_req: AuthenticatedRequest, res: Response): void => {
  res.json({
    tools: toolRegistry.map(({ type, name, description }) => ({ type, name, description })),
  });
};
