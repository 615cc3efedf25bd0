import { z } from 'zod';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { LlmFailureKind } from '@market-agent/shared/src/utils/errors.js';
import type {
  ChatMessage,
  ToolCallRequest,
  ToolDeclaration,
} from '@market-agent/shared/src/types/tool.types.js';

const log = createChildLogger('llm:completion-gateway');

export const SESSION_CORRELATION_HEADER = 'X-NCP-CLOVASTUDIO-REQUEST-ID';

export interface CompletionRequest {
  readonly messages: readonly ChatMessage[];
  readonly tools?: readonly ToolDeclaration[];
  readonly sessionId: string;
  readonly credential?: string;
}

export interface CompletionMessage {
  readonly content?: string;
  /** Absent when the model answered directly. */
  readonly toolCalls?: readonly ToolCallRequest[];
}

export interface CompletionFailure {
  readonly kind: LlmFailureKind;
  readonly message: string;
  readonly status?: number;
}

export type CompletionResult =
  | { readonly ok: true; readonly message: CompletionMessage }
  | { readonly ok: false; readonly error: CompletionFailure };

export interface CompletionGateway {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface CompletionGatewayConfig {
  readonly url: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
  readonly temperature: number;
  readonly maxTokens: number;
}

const WireToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string().min(1),
    arguments: z.unknown(),
  }),
});

const WireMessageSchema = z.object({
  role: z.string().optional(),
  content: z.string().nullish(),
  toolCalls: z.array(WireToolCallSchema).optional(),
  tool_calls: z.array(WireToolCallSchema).optional(),
});

const WireResponseSchema = z.union([
  z.object({ result: z.object({ message: WireMessageSchema }) }),
  z.object({ choices: z.array(z.object({ message: WireMessageSchema })).min(1) }),
]);

type WireMessage = z.infer<typeof WireMessageSchema>;

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolCalls
      ? {
          toolCalls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: call.arguments },
          })),
        }
      : {}),
    ...(message.toolCallId ? { toolCallId: message.toolCallId } : {}),
  };
}

function fromWireMessage(message: WireMessage): CompletionMessage | undefined {
  const wireCalls = message.toolCalls ?? message.tool_calls;
  const content = message.content ?? undefined;

  if (!wireCalls && content === undefined) {
    return undefined;
  }

  return {
    content,
    toolCalls: wireCalls?.map((call, index) => ({
      id: call.id ?? `call_${String(index)}`,
      name: call.function.name,
      arguments: call.function.arguments,
    })),
  };
}

/**
 * Accepts both response envelopes the service has used:
 * `{result: {message}}` and `{choices: [{message}]}`.
 */
export function parseCompletionResponse(body: unknown): CompletionResult {
  const parsed = WireResponseSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      error: { kind: 'malformed', message: 'Response contains no message' },
    };
  }

  const wireMessage =
    'result' in parsed.data ? parsed.data.result.message : parsed.data.choices[0].message;
  const message = fromWireMessage(wireMessage);

  if (!message) {
    return {
      ok: false,
      error: { kind: 'malformed', message: 'Message has neither tool calls nor content' },
    };
  }

  return { ok: true, message };
}

function classifyFetchError(error: unknown, timeoutMs: number): CompletionFailure {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return {
      kind: 'timeout',
      message: `Completion request timed out after ${String(timeoutMs)}ms`,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause =
    error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return { kind: 'transport', message: `Completion request failed: ${message}${cause}` };
}

export function createCompletionGateway(config: CompletionGatewayConfig): CompletionGateway {
  log.info({ url: config.url, timeoutMs: config.timeoutMs }, 'Using HTTP completion gateway');

  return {
    async complete(request: CompletionRequest): Promise<CompletionResult> {
      const tools = request.tools ?? [];
      const token = request.credential ?? config.apiKey;

      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        [SESSION_CORRELATION_HEADER]: request.sessionId,
      };
      if (token) {
        headers['Authorization'] = `Bearer ${token}`;
      }

      const body = {
        messages: request.messages.map(toWireMessage),
        ...(tools.length > 0 ? { tools } : {}),
        temperature: config.temperature,
        max_tokens: config.maxTokens,
      };

      log.debug(
        {
          sessionId: request.sessionId,
          messageCount: request.messages.length,
          toolCount: tools.length,
        },
        'Sending completion request',
      );

      let response: Response;
      try {
        response = await fetch(config.url, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(config.timeoutMs),
        });
      } catch (error) {
        const failure = classifyFetchError(error, config.timeoutMs);
        log.warn({ sessionId: request.sessionId, kind: failure.kind }, failure.message);
        return { ok: false, error: failure };
      }

      if (!response.ok) {
        const detail = (await response.text().catch(() => '')).slice(0, 200);
        const failure: CompletionFailure = {
          kind: 'http',
          status: response.status,
          message: `Completion service responded with ${String(response.status)}${detail ? `: ${detail}` : ''}`,
        };
        log.warn({ sessionId: request.sessionId, status: response.status }, 'Completion HTTP error');
        return { ok: false, error: failure };
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        if (error instanceof Error && error.name === 'TimeoutError') {
          return { ok: false, error: classifyFetchError(error, config.timeoutMs) };
        }
        return {
          ok: false,
          error: { kind: 'malformed', message: 'Completion response is not valid JSON' },
        };
      }

      const result = parseCompletionResponse(payload);
      if (!result.ok) {
        log.warn({ sessionId: request.sessionId }, result.error.message);
      }
      return result;
    },
  };
}
