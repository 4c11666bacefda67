import { MalformedToolCallMarkerError } from '@/features/workflows/workflows.errors';
import { isPlainObject } from '@/features/workflows/workflows.context';
import type { ToolInvoker, ToolParams, ToolScope } from '@/features/tools/tools.types';
import type { LlmInvoker, LlmRequest } from './llm.types';

const MARKER_START = /\[\s*TOOL_CALL\s*:\s*([A-Za-z0-9_-]+)\s*,?\s*/;

export type ToolCallScan =
  | { kind: 'none' }
  | { kind: 'malformed'; error: MalformedToolCallMarkerError }
  | { kind: 'call'; toolId: string; params: ToolParams; start: number; end: number };

export interface InterceptedCompletion {
  text: string;
  note?: string;
  toolCall?: { toolId: string; result: unknown };
}

// Index just past the `}` that closes the object opening at `start`, or -1.
const findObjectEnd = (text: string, start: number): number => {
  let depth = 0;
  let quote: string | null = null;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (quote) {
      if (char === '\\') {
        index += 1;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"') {
      quote = char;
    } else if (char === '{') {
      depth += 1;
    } else if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return index + 1;
      }
    }
  }
  return -1;
};

/** Locates the first `[TOOL_CALL: <toolId>, {json}]` marker in model output. */
export const findToolCall = (text: string): ToolCallScan => {
  const match = MARKER_START.exec(text);
  if (!match) {
    return { kind: 'none' };
  }

  const start = match.index;
  const toolId = match[1];
  const objectStart = start + match[0].length;
  const raw = text.slice(start);
  const malformed = (reason: string): ToolCallScan => ({
    kind: 'malformed',
    error: new MalformedToolCallMarkerError(`Tool call for ${toolId} ignored: ${reason}`, raw),
  });

  if (text[objectStart] !== '{') {
    return malformed('parameters must be a JSON object');
  }
  const objectEnd = findObjectEnd(text, objectStart);
  if (objectEnd === -1) {
    return malformed('unbalanced braces');
  }
  const closing = /^\s*\]/.exec(text.slice(objectEnd));
  if (!closing) {
    return malformed('missing closing "]"');
  }

  let params: unknown;
  try {
    params = JSON.parse(text.slice(objectStart, objectEnd));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return malformed(`invalid JSON (${reason})`);
  }
  if (!isPlainObject(params)) {
    return malformed('parameters must be a JSON object');
  }

  return { kind: 'call', toolId, params, start, end: objectEnd + closing[0].length };
};

export const continuationPrompt = (toolId: string, result: unknown): string =>
  `Tool ${toolId} returned: ${JSON.stringify(result ?? null)}\nContinue your answer using this result.`;

/**
 * One completion with at most one tool call spliced in. A marker in the
 * continuation is returned as plain text.
 */
export const completeWithToolInterception = async (
  llm: LlmInvoker,
  tools: ToolInvoker,
  request: LlmRequest,
  scope: ToolScope,
): Promise<InterceptedCompletion> => {
  const first = await llm.complete(request);
  const scan = findToolCall(first);

  if (scan.kind === 'none') {
    return { text: first };
  }
  if (scan.kind === 'malformed') {
    return { text: first, note: `${scan.error.kind}: ${scan.error.message}` };
  }

  const tool = scope.agent.tools.find((candidate) => candidate.toolId === scan.toolId);
  if (!tool) {
    return { text: first, note: `Tool-call marker names unknown tool "${scan.toolId}"` };
  }

  const result = await tools.invoke(tool, scan.params, scope);
  const continuation = await llm.complete({
    ...request,
    conversationHistory: [
      ...request.conversationHistory,
      { role: 'user', content: request.userPrompt },
      { role: 'assistant', content: first },
    ],
    userPrompt: continuationPrompt(scan.toolId, result),
  });

  const prefix = first.slice(0, scan.start).trim();
  return {
    text: prefix ? `${prefix}\n${continuation}` : continuation,
    toolCall: { toolId: scan.toolId, result },
  };
};
