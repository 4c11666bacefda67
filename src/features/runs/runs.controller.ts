import { Response } from 'express';
import { AuthenticatedRequest, requireUser } from '@/shared/middlewares/auth.middleware';
import { HttpStatus } from '@/utils/http-status';
import { getAgentForExecution } from '@/features/agents/agents.service';
import { listRunsSchema, startRunSchema } from './runs.schema';
import { executeRun, listRuns } from './runs.service';

export const startRunHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { params, body } = startRunSchema.parse({ params: req.params, body: req.body });
  const agent = await getAgentForExecution(params.agentId, user.id);

  const run = await executeRun({
    agentId: agent.agentId,
    workflowId: params.workflowId,
    initialContext: { ...body.context, user_id: user.id },
    owner: agent.owner,
    source: 'api',
  });
  res.status(HttpStatus.CREATED).json({ run });
};

export const listRunsHandler = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
  const user = requireUser(req);
  const { query } = listRunsSchema.parse({ query: req.query });
  const runs = await listRuns(user.id, query.agentId);
  res.json({ runs });
};
