import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { LlmError } from '@market-agent/shared/src/utils/errors.js';
import type { CompletionGateway } from './completion-gateway.js';

const log = createChildLogger('llm:client');

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly sessionId?: string;
  readonly credential?: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

function withSchemaInstruction(request: LlmRequest): string {
  if (!request.jsonSchema) {
    return request.systemPrompt;
  }
  return `${request.systemPrompt}\n\nRespond with a single JSON object matching this JSON schema:\n${JSON.stringify(request.jsonSchema)}`;
}

/**
 * Single-shot text completion over the gateway: no tools are offered and
 * the call is never retried.
 */
export function createLlmClient(gateway: CompletionGateway): LlmClient {
  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'LLM invocation');

      const result = await gateway.complete({
        messages: [
          { role: 'system', content: withSchemaInstruction(request) },
          { role: 'user', content: request.userMessage },
        ],
        sessionId: request.sessionId ?? '',
        credential: request.credential,
      });

      if (!result.ok) {
        throw new LlmError(`LLM invocation failed: ${result.error.message}`, result.error.kind);
      }

      const content = result.message.content;
      if (content === undefined) {
        throw new LlmError('LLM invocation returned tool calls instead of text', 'malformed');
      }

      return { content };
    },
  };
}
