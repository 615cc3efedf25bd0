import { describe, it, expect, vi } from 'vitest';
import { createLlmClient } from './llm-client.js';
import type { CompletionGateway, CompletionResult } from './completion-gateway.js';
import { createMockCompletionGateway } from './mock-completion-gateway.js';
import { LlmError } from '@market-agent/shared/src/utils/errors.js';

function createGateway(result: CompletionResult): CompletionGateway {
  return { complete: vi.fn().mockResolvedValue(result) };
}

describe('createLlmClient', () => {
  it('should send a system and a user turn without tools', async () => {
    const gateway = createGateway({ ok: true, message: { content: 'answer' } });
    const client = createLlmClient(gateway);

    const response = await client.invoke({
      systemPrompt: 'You are a stock market assistant.',
      userMessage: '삼성전자 종가',
      sessionId: 'session-1',
      credential: 'test-secret',
    });

    expect(response.content).toBe('answer');
    expect(gateway.complete).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: 'You are a stock market assistant.' },
        { role: 'user', content: '삼성전자 종가' },
      ],
      sessionId: 'session-1',
      credential: 'test-secret',
    });
  });

  it('should append the JSON schema to the system prompt', async () => {
    const gateway = createGateway({ ok: true, message: { content: '{}' } });
    const client = createLlmClient(gateway);

    await client.invoke({
      systemPrompt: 'Analyse.',
      userMessage: 'q',
      jsonSchema: { type: 'object' },
    });

    const request = vi.mocked(gateway.complete).mock.calls[0][0];
    expect(request.messages[0].content).toBe(
      'Analyse.\n\nRespond with a single JSON object matching this JSON schema:\n{"type":"object"}',
    );
    expect(request.sessionId).toBe('');
  });

  it('should throw an LlmError carrying the failure kind on timeout', async () => {
    const client = createLlmClient(
      createGateway({ ok: false, error: { kind: 'timeout', message: 'timed out' } }),
    );

    const error = await client.invoke({ systemPrompt: 's', userMessage: 'u' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect((error as LlmError).kind).toBe('timeout');
    expect((error as LlmError).message).toBe('LLM invocation failed: timed out');
  });

  it('should carry the http failure kind', async () => {
    const client = createLlmClient(
      createGateway({ ok: false, error: { kind: 'http', status: 401, message: 'unauthorized' } }),
    );

    const error = await client.invoke({ systemPrompt: 's', userMessage: 'u' }).catch((e: unknown) => e);

    expect((error as LlmError).kind).toBe('http');
    expect((error as LlmError).message).toBe('LLM invocation failed: unauthorized');
  });

  it('should reject tool calls in a text completion', async () => {
    const client = createLlmClient(
      createGateway({
        ok: true,
        message: { toolCalls: [{ id: 'c', name: 'get_rsi_stocks', arguments: {} }] },
      }),
    );

    await expect(client.invoke({ systemPrompt: 's', userMessage: 'u' })).rejects.toThrow(
      'LLM invocation returned tool calls instead of text',
    );
  });
});

describe('createMockCompletionGateway', () => {
  it('should classify dated queries as fetch', async () => {
    const client = createLlmClient(createMockCompletionGateway());
    const response = await client.invoke({
      systemPrompt: 'You are a query classifier. Tokens: fetch_stock_data, ambiguous_query',
      userMessage: '2024-07-15 삼성전자 종가는?',
    });
    expect(response.content).toBe('fetch_stock_data');
  });

  it('should classify vague queries as ambiguous', async () => {
    const client = createLlmClient(createMockCompletionGateway());
    const response = await client.invoke({
      systemPrompt: 'You are a query classifier. Tokens: fetch_stock_data, ambiguous_query',
      userMessage: '요즘 분위기 좋은 주식있어?',
    });
    expect(response.content).toBe('ambiguous_query');
  });

  it('should answer tool rounds directly', async () => {
    const gateway = createMockCompletionGateway();
    const result = await gateway.complete({
      messages: [{ role: 'user', content: 'q' }],
      tools: [
        {
          type: 'function',
          function: { name: 'get_rsi_stocks', description: 'RSI', parameters: {} },
        },
      ],
      sessionId: 's',
    });

    expect(result).toEqual({ ok: true, message: { content: 'Mock answer without tool calls' } });
  });
});
