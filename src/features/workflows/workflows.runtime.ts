import { agentStore } from '@/features/agents/agents.store';
import { mongoDocumentStore } from '@/features/data-store/data-store.service';
import { llmService } from '@/features/llm/llm.service';
import { ToolInvokerService } from '@/features/tools/tools.invoker';
import { telegramChannel } from '@/shared/services/telegram.service';
import { WorkflowEngine } from './workflows.engine';

export const toolInvoker = new ToolInvokerService({
  store: mongoDocumentStore,
  channel: telegramChannel,
});

export const workflowEngine = new WorkflowEngine({
  agents: agentStore,
  llm: llmService,
  tools: toolInvoker,
  store: mongoDocumentStore,
});
