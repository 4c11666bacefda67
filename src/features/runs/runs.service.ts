import { logger } from '@/utils/logger';
import { KeyedMutex } from '@/utils/keyed-mutex';
import type { WorkflowEngine } from '@/features/workflows/workflows.engine';
import type { RunResult } from '@/features/workflows/workflows.types';
import { workflowEngine } from '@/features/workflows/workflows.runtime';
import { RunModel } from './runs.model';
import type { ExecuteRunInput, RunRepository } from './runs.types';

const RUN_LIST_LIMIT = 50;

export const mongoRunRepository: RunRepository = {
  async save(result, meta) {
    const userId = result.context.user_id;
    await RunModel.create({
      runId: result.runId,
      agentId: result.agentId,
      workflowId: result.workflowId,
      owner: meta.owner,
      userId: typeof userId === 'string' ? userId : undefined,
      source: meta.source,
      status: result.status,
      steps: result.steps,
      context: result.context,
      records: result.records,
      responses: result.responses,
      haltReason: result.haltReason,
      error: result.error,
      startedAt: result.startedAt,
      endedAt: result.endedAt,
    });
  },
};

/**
 * Runs for the same agent and user are serialized; everything else runs
 * concurrently. The engine itself holds no locks.
 */
export class RunService {
  constructor(
    private readonly engine: Pick<WorkflowEngine, 'runWorkflow'>,
    private readonly repository: RunRepository,
    private readonly mutex = new KeyedMutex(),
  ) {}

  async execute(input: ExecuteRunInput): Promise<RunResult> {
    const userId = String(input.initialContext.user_id ?? 'anonymous');
    const key = `${input.agentId}:${userId}`;
    if (this.mutex.isLocked(key)) {
      logger.debug({ agentId: input.agentId, userId, workflowId: input.workflowId }, 'Run queued behind an active run');
    }

    const result = await this.mutex.runExclusive(key, () =>
      this.engine.runWorkflow(input.agentId, input.workflowId, input.initialContext, { respond: input.respond }),
    );

    try {
      await this.repository.save(result, { owner: input.owner, source: input.source });
    } catch (error) {
      logger.error({ err: error, runId: result.runId }, 'Failed to persist run');
    }
    return result;
  }
}

export const runService = new RunService(workflowEngine, mongoRunRepository);

export const executeRun = (input: ExecuteRunInput): Promise<RunResult> => runService.execute(input);

export const listRuns = (owner: string, agentId?: string) => {
  const filter: Record<string, string> = { owner };
  if (agentId) {
    filter.agentId = agentId;
  }
  return RunModel.find(filter).sort({ createdAt: -1 }).limit(RUN_LIST_LIMIT).lean();
};
