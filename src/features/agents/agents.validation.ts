import type { AgentDefinition, DefinitionIssue, WorkflowSpec } from './agents.types';

const duplicates = (values: string[]): string[] => {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      repeated.add(value);
    }
    seen.add(value);
  }
  return Array.from(repeated);
};

/**
 * Cross-reference checks for one workflow: node ids are unique, every
 * `tool_call` names a declared tool and every branch target exists.
 */
export const validateWorkflow = (agent: AgentDefinition, workflow: WorkflowSpec): DefinitionIssue[] => {
  const issues: DefinitionIssue[] = [];
  const base = `workflows.${workflow.workflowId}`;
  const toolIds = new Set(agent.tools.map((tool) => tool.toolId));
  const nodeIds = new Set(workflow.nodes.map((node) => node.nodeId));

  for (const nodeId of duplicates(workflow.nodes.map((node) => node.nodeId))) {
    issues.push({ kind: 'DefinitionError', path: `${base}.nodes`, message: `Duplicate nodeId "${nodeId}"` });
  }

  for (const node of workflow.nodes) {
    const path = `${base}.nodes.${node.nodeId}`;
    if (node.type === 'tool_call' && !toolIds.has(node.toolId)) {
      issues.push({
        kind: 'UnknownToolReference',
        path,
        message: `Node "${node.nodeId}" references unknown tool "${node.toolId}"`,
      });
    }
    if (node.type === 'conditional_logic') {
      for (const target of [node.true_branch, node.false_branch]) {
        if (target && !nodeIds.has(target)) {
          issues.push({
            kind: 'DefinitionError',
            path,
            message: `Node "${node.nodeId}" branches to unknown node "${target}"`,
          });
        }
      }
    }
  }

  return issues;
};

export const validateAgentDefinition = (agent: AgentDefinition): DefinitionIssue[] => {
  const issues: DefinitionIssue[] = [];

  for (const toolId of duplicates(agent.tools.map((tool) => tool.toolId))) {
    issues.push({ kind: 'DefinitionError', path: 'tools', message: `Duplicate toolId "${toolId}"` });
  }
  for (const workflowId of duplicates(agent.workflows.map((workflow) => workflow.workflowId))) {
    issues.push({ kind: 'DefinitionError', path: 'workflows', message: `Duplicate workflowId "${workflowId}"` });
  }
  for (const scheduleId of duplicates(agent.schedules.map((schedule) => schedule.scheduleId))) {
    issues.push({ kind: 'DefinitionError', path: 'schedules', message: `Duplicate scheduleId "${scheduleId}"` });
  }

  const workflowIds = new Set(agent.workflows.map((workflow) => workflow.workflowId));
  for (const schedule of agent.schedules) {
    if (!workflowIds.has(schedule.workflowId)) {
      issues.push({
        kind: 'DefinitionError',
        path: `schedules.${schedule.scheduleId}`,
        message: `Schedule "${schedule.scheduleId}" references unknown workflow "${schedule.workflowId}"`,
      });
    }
  }

  for (const workflow of agent.workflows) {
    issues.push(...validateWorkflow(agent, workflow));
  }

  return issues;
};
