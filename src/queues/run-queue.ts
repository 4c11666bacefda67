import { Queue, Worker, QueueEvents, JobsOptions } from 'bullmq';
import { envConfig } from '@/config/env';
import { getRedis } from '@/config/redis';
import { logger } from '@/utils/logger';
import { agentStore } from '@/features/agents/agents.store';
import { resolveScheduleTrigger } from '@/features/triggers/triggers.resolver';
import { executeRun } from '@/features/runs/runs.service';

export const RUN_QUEUE_NAME = 'scheduled-runs';

export interface ScheduledRunJob {
  agentId: string;
  scheduleId: string;
  executionTime: string;
}

let runQueue: Queue<ScheduledRunJob> | null = null;

const getRunQueue = (): Queue<ScheduledRunJob> => {
  if (!runQueue) {
    runQueue = new Queue<ScheduledRunJob>(RUN_QUEUE_NAME, {
      connection: getRedis(),
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 500,
      },
    });
  }
  return runQueue;
};

export const enqueueScheduledRun = async (data: ScheduledRunJob, options: JobsOptions = {}): Promise<void> => {
  await getRunQueue().add('scheduled-run', data, options);
};

export const processScheduledRun = async (data: ScheduledRunJob) => {
  const agent = await agentStore.getAgent(data.agentId);
  if (!agent) {
    throw new Error(`Agent ${data.agentId} not found`);
  }

  const trigger = resolveScheduleTrigger(agent, data.scheduleId, new Date(data.executionTime));
  if (!trigger) {
    throw new Error(`Schedule ${data.scheduleId} of agent ${data.agentId} has no workflow`);
  }

  logger.info({ agentId: agent.agentId, workflowId: trigger.workflowId, scheduleId: data.scheduleId }, 'Running scheduled workflow');
  return executeRun({ ...trigger, owner: agent.owner, source: 'schedule' });
};

export const startRunWorker = (): Worker<ScheduledRunJob> => {
  const connection = getRedis();

  const queueEvents = new QueueEvents(RUN_QUEUE_NAME, { connection: connection.duplicate() });
  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error({ jobId, failedReason }, 'Scheduled run job failed');
  });

  const worker = new Worker<ScheduledRunJob>(
    RUN_QUEUE_NAME,
    async (job) => {
      const result = await processScheduledRun(job.data);
      return { runId: result.runId, status: result.status };
    },
    {
      connection,
      concurrency: envConfig.RUN_WORKER_CONCURRENCY,
    },
  );

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Run worker failure');
  });

  worker.on('completed', (job) => {
    logger.info({ jobId: job.id }, 'Run worker completed');
  });

  return worker;
};
