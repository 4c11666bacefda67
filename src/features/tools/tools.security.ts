import { decryptValue, encryptValue, maskValue } from '@/shared/services/encryption.service';
import { isPlainObject } from '@/features/workflows/workflows.context';
import type { ToolSpec } from '@/features/agents/agents.types';
import { getToolDefinition, toolSpecSchema } from './tools.registry';

type Transform = (value: string) => string;

// Copies `source` along `path` and applies `transform` to the string leaf, if any.
const transformAt = (source: Record<string, unknown>, path: string[], transform: Transform): Record<string, unknown> => {
  const [head, ...rest] = path;
  if (head === undefined || !(head in source)) {
    return source;
  }
  const current = source[head];
  if (rest.length === 0) {
    return typeof current === 'string' ? { ...source, [head]: transform(current) } : source;
  }
  return isPlainObject(current) ? { ...source, [head]: transformAt(current, rest, transform) } : source;
};

const applyToSecureFields = (tool: ToolSpec, transform: Transform): ToolSpec => {
  const secureFields = getToolDefinition(tool.type)?.secureFields ?? [];
  if (secureFields.length === 0) {
    return tool;
  }
  const config = secureFields.reduce<Record<string, unknown>>(
    (current, field) => transformAt(current, field.split('.'), transform),
    { ...tool.config },
  );
  return toolSpecSchema.parse({ ...tool, config });
};

export const encryptToolSecrets = (tools: ToolSpec[]): ToolSpec[] =>
  tools.map((tool) => applyToSecureFields(tool, encryptValue));

export const decryptToolSecrets = (tools: ToolSpec[]): ToolSpec[] =>
  tools.map((tool) => applyToSecureFields(tool, decryptValue));

export const maskToolSecrets = (tools: ToolSpec[]): ToolSpec[] => tools.map((tool) => applyToSecureFields(tool, maskValue));
