import { logger } from '@/utils/logger';
import { decryptToolSecrets } from '@/features/tools/tools.security';
import { AgentModel } from './agents.model';
import { agentDefinitionSchema } from './agents.schema';
import type { AgentDefinition, AgentStore } from './agents.types';

export const parseStoredAgent = (definition: unknown): AgentDefinition | null => {
  const parsed = agentDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, 'Stored agent definition is invalid');
    return null;
  }
  return parsed.data;
};

/** Loads agents with tool secrets decrypted, ready for execution. */
export class MongoAgentStore implements AgentStore {
  async getAgent(agentId: string): Promise<AgentDefinition | null> {
    const document = await AgentModel.findOne({ agentId }).lean();
    if (!document) {
      return null;
    }
    const agent = parseStoredAgent(document.definition);
    return agent && { ...agent, tools: decryptToolSecrets(agent.tools) };
  }

  async listAgents(): Promise<AgentDefinition[]> {
    const documents = await AgentModel.find().lean();
    const agents: AgentDefinition[] = [];
    for (const document of documents) {
      const agent = parseStoredAgent(document.definition);
      if (agent) {
        agents.push(agent);
      }
    }
    return agents;
  }
}

export const agentStore = new MongoAgentStore();
