import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { ChatMessage, ToolCallResult } from '@market-agent/shared/src/types/tool.types.js';
import type { CompletionFailure, CompletionGateway } from '../llm/completion-gateway.js';
import type { ToolRegistry } from './tool-registry.js';

const log = createChildLogger('tools:round');

export interface ToolRoundRequest {
  readonly gateway: CompletionGateway;
  readonly registry: ToolRegistry;
  readonly messages: readonly ChatMessage[];
  readonly sessionId: string;
  readonly credential?: string;
  readonly feedback?: string;
}

export interface ToolRoundSuccess {
  readonly success: true;
  readonly results: readonly ToolCallResult[];
  /** Set when the model answered without requesting tools. */
  readonly directAnswer?: string;
  readonly transcript: readonly ChatMessage[];
}

export interface ToolRoundProtocolFailure {
  readonly success: false;
  readonly reason: 'protocol';
  readonly error: string;
  readonly failure: CompletionFailure;
  readonly results: readonly ToolCallResult[];
  readonly transcript: readonly ChatMessage[];
}

export interface ToolRoundToolFailure {
  readonly success: false;
  readonly reason: 'tool';
  readonly error: string;
  readonly results: readonly ToolCallResult[];
  readonly transcript: readonly ChatMessage[];
}

export type ToolRoundOutcome = ToolRoundSuccess | ToolRoundProtocolFailure | ToolRoundToolFailure;

function serializeResult(result: unknown): string {
  return typeof result === 'string' ? result : JSON.stringify(result);
}

export function formatToolFailures(results: readonly ToolCallResult[]): string {
  const failed = results
    .filter((r) => !r.success)
    .map((r) => `${r.toolName}: ${serializeResult(r.result)}`);
  return `Tool execution failed: ${failed.join('; ')}`;
}

/**
 * One completion call followed by at most one sequential pass over the
 * requested tools. The model is never called a second time.
 */
export async function runToolRound(request: ToolRoundRequest): Promise<ToolRoundOutcome> {
  const { gateway, registry, sessionId } = request;

  const transcript: ChatMessage[] = [...request.messages];
  if (request.feedback) {
    transcript.push({
      role: 'user',
      content: `Feedback on the previous answer: ${request.feedback}\nRevise your answer accordingly.`,
    });
  }

  const completion = await gateway.complete({
    messages: transcript,
    tools: registry.declarations(),
    sessionId,
    credential: request.credential,
  });

  if (!completion.ok) {
    log.error({ sessionId, kind: completion.error.kind }, 'Tool round completion failed');
    return {
      success: false,
      reason: 'protocol',
      error: completion.error.message,
      failure: completion.error,
      results: [],
      transcript,
    };
  }

  const { toolCalls, content } = completion.message;
  if (!toolCalls) {
    log.info({ sessionId }, 'Model answered without tool calls');
    return { success: true, results: [], directAnswer: content ?? '', transcript };
  }

  const results: ToolCallResult[] = [];
  for (const call of toolCalls) {
    results.push(await registry.invoke(call));
  }

  transcript.push({ role: 'assistant', content: content ?? '', toolCalls });
  for (const result of results) {
    transcript.push({
      role: 'tool',
      content: serializeResult(result.result),
      toolCallId: result.toolCallId,
    });
  }

  const allSucceeded = results.every((r) => r.success);
  log.info(
    { sessionId, toolCount: results.length, failed: results.filter((r) => !r.success).length },
    'Tool round complete',
  );

  if (!allSucceeded) {
    return {
      success: false,
      reason: 'tool',
      error: formatToolFailures(results),
      results,
      transcript,
    };
  }

  return { success: true, results, transcript };
}
