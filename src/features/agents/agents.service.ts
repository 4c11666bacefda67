import { AppError } from '@/shared/errors/app-error';
import { HttpStatus } from '@/utils/http-status';
import { registerAgentSchedules, unregisterAgentSchedules } from '@/features/jobs/schedule-runner';
import { encryptToolSecrets, maskToolSecrets } from '@/features/tools/tools.security';
import { AgentModel, AgentDocument } from './agents.model';
import { agentDefinitionSchema } from './agents.schema';
import { agentStore, parseStoredAgent } from './agents.store';
import type { AgentDefinition, AgentInput } from './agents.types';
import { validateAgentDefinition } from './agents.validation';

type AgentBody = Omit<AgentInput, 'owner'>;

const toDefinition = (owner: string, body: AgentBody): AgentDefinition => {
  const agent = agentDefinitionSchema.parse({ ...body, owner });
  const issues = validateAgentDefinition(agent);
  if (issues.length > 0) {
    throw new AppError('Agent definition is invalid', HttpStatus.BAD_REQUEST, { issues });
  }
  return agent;
};

const formatAgent = (document: Pick<AgentDocument, 'agentId' | 'definition' | 'createdAt' | 'updatedAt'>) => {
  const agent = parseStoredAgent(document.definition);
  if (!agent) {
    throw new AppError(`Agent ${document.agentId} has an invalid stored definition`, HttpStatus.INTERNAL_SERVER_ERROR);
  }
  return {
    ...agent,
    tools: maskToolSecrets(agent.tools),
    createdAt: document.createdAt,
    updatedAt: document.updatedAt,
  };
};

const findOwnedAgent = async (agentId: string, owner: string): Promise<AgentDocument> => {
  const document = await AgentModel.findOne({ agentId });
  if (!document || document.owner !== owner) {
    throw new AppError('Agent not found', HttpStatus.NOT_FOUND);
  }
  return document;
};

export const listAgents = async (owner: string) => {
  const documents = await AgentModel.find({ owner }).sort({ updatedAt: -1 }).lean();
  return documents.map((document) => ({
    agentId: document.agentId,
    agentName: document.agentName,
    version: document.version,
    updatedAt: document.updatedAt,
  }));
};

export const getAgent = async (agentId: string, owner: string) => formatAgent(await findOwnedAgent(agentId, owner));

export const createAgent = async (owner: string, body: AgentBody) => {
  const agent = toDefinition(owner, body);
  const existing = await AgentModel.exists({ agentId: agent.agentId });
  if (existing) {
    throw new AppError('Agent id already in use', HttpStatus.CONFLICT);
  }

  const document = await AgentModel.create({
    agentId: agent.agentId,
    agentName: agent.agentName,
    owner,
    version: agent.version,
    definition: { ...agent, tools: encryptToolSecrets(agent.tools) },
  });
  registerAgentSchedules(agent);
  return formatAgent(document);
};

export const updateAgent = async (agentId: string, owner: string, body: Omit<AgentBody, 'agentId'>) => {
  const document = await findOwnedAgent(agentId, owner);
  const agent = toDefinition(owner, { ...body, agentId });

  document.agentName = agent.agentName;
  document.version = agent.version;
  document.definition = { ...agent, tools: encryptToolSecrets(agent.tools) };
  document.markModified('definition');
  await document.save();

  registerAgentSchedules(agent);
  return formatAgent(document);
};

export const deleteAgent = async (agentId: string, owner: string): Promise<void> => {
  const document = await findOwnedAgent(agentId, owner);
  await document.deleteOne();
  unregisterAgentSchedules(agentId);
};

/** Decrypted definition for a run started by the agent's owner. */
export const getAgentForExecution = async (agentId: string, owner: string): Promise<AgentDefinition> => {
  await findOwnedAgent(agentId, owner);
  const agent = await agentStore.getAgent(agentId);
  if (!agent) {
    throw new AppError('Agent not found', HttpStatus.NOT_FOUND);
  }
  return agent;
};
