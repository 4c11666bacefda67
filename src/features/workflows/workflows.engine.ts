import { randomUUID } from 'crypto';
import { envConfig } from '@/config/env';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import type { AgentDefinition, AgentStore } from '@/features/agents/agents.types';
import { validateWorkflow } from '@/features/agents/agents.validation';
import type { DocumentStore } from '@/features/data-store/data-store.types';
import type { LlmInvoker } from '@/features/llm/llm.types';
import type { ToolInvoker } from '@/features/tools/tools.types';
import { cloneValue, isPlainObject } from './workflows.context';
import {
  DefinitionError,
  StepLimitExceededError,
  ValidationError,
  WorkflowError,
  toWorkflowError,
} from './workflows.errors';
import { NodeExecutor } from './workflows.executor';
import type {
  ExecutionRecord,
  ExecutionScope,
  RunOptions,
  RunResult,
  RunStatus,
  VariableContext,
} from './workflows.types';

export interface WorkflowEngineDeps {
  agents: AgentStore;
  llm: LlmInvoker;
  tools: ToolInvoker;
  store: DocumentStore;
  maxSteps?: number;
  failureMessage?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

type FinalStatus = RunResult['status'];

interface RunState {
  runId: string;
  agentId: string;
  workflowId: string;
  context: VariableContext;
  records: ExecutionRecord[];
  responses: string[];
  steps: number;
  startedAt: Date;
}

const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Interprets one workflow per run: nodes execute strictly in sequence,
 * outputs are merged into the run's variable context and a conditional
 * directive may jump to any node, backwards included, up to `maxSteps`.
 */
export class WorkflowEngine {
  private readonly executor: NodeExecutor;
  private readonly maxSteps: number;
  private readonly failureMessage: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.executor = new NodeExecutor({ llm: deps.llm, tools: deps.tools, store: deps.store, sleep: deps.sleep });
    this.maxSteps = deps.maxSteps ?? envConfig.WORKFLOW_MAX_STEPS;
    this.failureMessage = deps.failureMessage ?? envConfig.WORKFLOW_FAILURE_MESSAGE;
    this.logger = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async runWorkflow(
    agentId: string,
    workflowId: string,
    initialContext: VariableContext,
    options: RunOptions = {},
  ): Promise<RunResult> {
    let agent: AgentDefinition | null;
    try {
      agent = await this.deps.agents.getAgent(agentId);
    } catch (error) {
      const state = this.createState(agentId, workflowId, initialContext, options);
      this.logger.error({ err: error, agentId, workflowId }, 'Failed to load agent');
      return this.fail(state, toWorkflowError(error), options, this.logger);
    }

    if (!agent) {
      const state = this.createState(agentId, workflowId, initialContext, options);
      return this.fail(state, new DefinitionError(`Agent "${agentId}" not found`, { agentId }), options, this.logger);
    }
    return this.execute(agent, workflowId, initialContext, options);
  }

  async execute(
    agent: AgentDefinition,
    workflowId: string,
    initialContext: VariableContext,
    options: RunOptions = {},
  ): Promise<RunResult> {
    const state = this.createState(agent.agentId, workflowId, initialContext, options);
    const log = this.logger.child({ runId: state.runId, agentId: agent.agentId, workflowId });
    let status: RunStatus = 'pending';

    const workflow = agent.workflows.find((candidate) => candidate.workflowId === workflowId);
    if (!workflow) {
      return this.fail(state, new DefinitionError(`Workflow "${workflowId}" not found`, { workflowId }), options, log);
    }
    if (state.context.user_id === undefined && state.context.scheduled_execution !== true) {
      return this.fail(
        state,
        new ValidationError('Initial context needs a user_id or a scheduled_execution marker'),
        options,
        log,
      );
    }
    const [issue] = validateWorkflow(agent, workflow);
    if (issue) {
      return this.fail(state, new WorkflowError(issue.kind, issue.message, { path: issue.path }), options, log);
    }

    const maxSteps = options.maxSteps ?? this.maxSteps;
    const scope: ExecutionScope = {
      runId: state.runId,
      agent,
      workflow,
      context: state.context,
      respond: async (message) => {
        await options.respond?.(message);
        state.responses.push(message);
      },
      record: (entry) => {
        state.records.push(entry);
      },
      logger: log,
    };

    status = 'running';
    log.info({ status, nodes: workflow.nodes.length }, 'Workflow run started');

    let index = 0;
    while (index < workflow.nodes.length) {
      if (options.signal?.aborted) {
        return this.finish(state, 'halted', log, { haltReason: 'cancelled' });
      }
      if (state.steps >= maxSteps) {
        return this.fail(state, new StepLimitExceededError(maxSteps), options, log);
      }

      const node = workflow.nodes[index];
      state.steps += 1;
      const { output, directive } = await this.executor.execute(node, scope);

      if (node.output_variable && directive.type !== 'fail') {
        state.context[node.output_variable] = output;
      }

      switch (directive.type) {
        case 'continue':
          index += 1;
          break;
        case 'jump': {
          const target = workflow.nodes.findIndex((candidate) => candidate.nodeId === directive.nodeId);
          if (target === -1) {
            return this.fail(
              state,
              new DefinitionError(`Node "${node.nodeId}" jumps to unknown node "${directive.nodeId}"`),
              options,
              log,
            );
          }
          index = target;
          break;
        }
        case 'halt':
          return this.finish(state, 'halted', log, { haltReason: directive.reason });
        case 'complete':
          return this.finish(state, 'completed', log);
        case 'fail':
          return this.fail(state, directive.error, options, log);
        default: {
          const unknownDirective: never = directive;
          return this.fail(state, toWorkflowError(unknownDirective), options, log);
        }
      }
    }

    return this.finish(state, 'completed', log);
  }

  private createState(
    agentId: string,
    workflowId: string,
    initialContext: VariableContext,
    options: RunOptions,
  ): RunState {
    const startedAt = this.now();
    const runId = options.runId ?? randomUUID();
    const copied = cloneValue(initialContext);
    const context: VariableContext = isPlainObject(copied) ? copied : {};
    if (typeof context.current_date !== 'string') {
      context.current_date = isoDate(startedAt);
    }
    context.agent_id = agentId;
    context.run_id = runId;

    return { runId, agentId, workflowId, context, records: [], responses: [], steps: 0, startedAt };
  }

  private finish(
    state: RunState,
    status: FinalStatus,
    log: Logger,
    extra: Pick<RunResult, 'haltReason' | 'error'> = {},
  ): RunResult {
    const result: RunResult = {
      runId: state.runId,
      agentId: state.agentId,
      workflowId: state.workflowId,
      status,
      context: state.context,
      records: state.records,
      responses: state.responses,
      steps: state.steps,
      ...extra,
      startedAt: state.startedAt,
      endedAt: this.now(),
    };
    log.info({ status, steps: state.steps, haltReason: extra.haltReason }, 'Workflow run finished');
    return result;
  }

  private async fail(state: RunState, error: WorkflowError, options: RunOptions, log: Logger): Promise<RunResult> {
    log.warn({ kind: error.kind, details: error.details }, error.message);
    try {
      await options.respond?.(this.failureMessage);
      state.responses.push(this.failureMessage);
    } catch (deliveryError) {
      log.error({ err: deliveryError }, 'Failed to deliver the failure message');
    }
    return this.finish(state, 'failed', log, { error: error.toJSON() });
  }
}
