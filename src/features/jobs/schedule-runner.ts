import cron, { ScheduledTask } from 'node-cron';
import { logger } from '@/utils/logger';
import type { AgentDefinition } from '@/features/agents/agents.types';
import { agentStore } from '@/features/agents/agents.store';
import { enqueueScheduledRun } from '@/queues/run-queue';

const agentSchedules = new Map<string, ScheduledTask>();

export const scheduleKey = (agentId: string, scheduleId: string): string => `agent:${agentId}:schedule:${scheduleId}`;

export const unregisterAgentSchedules = (agentId: string): void => {
  const prefix = `agent:${agentId}:schedule:`;
  for (const [key, task] of agentSchedules) {
    if (key.startsWith(prefix)) {
      task.stop();
      agentSchedules.delete(key);
      logger.info({ key }, 'Agent schedule removed');
    }
  }
};

export const registerAgentSchedules = (agent: AgentDefinition): void => {
  unregisterAgentSchedules(agent.agentId);

  for (const schedule of agent.schedules) {
    const key = scheduleKey(agent.agentId, schedule.scheduleId);
    if (!cron.validate(schedule.cron)) {
      logger.warn({ key, cron: schedule.cron }, 'Invalid cron expression for agent schedule');
      continue;
    }

    const task = cron.schedule(schedule.cron, async () => {
      try {
        await enqueueScheduledRun({
          agentId: agent.agentId,
          scheduleId: schedule.scheduleId,
          executionTime: new Date().toISOString(),
        });
      } catch (error) {
        logger.error({ err: error, key }, 'Failed to enqueue scheduled run');
      }
    });

    agentSchedules.set(key, task);
    logger.info({ key, workflowId: schedule.workflowId }, 'Agent schedule registered');
  }
};

export const initializeAgentSchedules = async (): Promise<void> => {
  const agents = await agentStore.listAgents();
  for (const agent of agents) {
    registerAgentSchedules(agent);
  }
};
