import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import type { ChatMessage } from '@market-agent/shared/src/types/tool.types.js';
import { ToolExecutionError } from '@market-agent/shared/src/utils/errors.js';
import type {
  CompletionGateway,
  CompletionRequest,
  CompletionResult,
} from '../llm/completion-gateway.js';
import { createToolRegistry, defineTool } from '../tools/tool-registry.js';
import { createRouterState } from '../testing/router-state.js';
import { createDataRetrievalNode } from './data-retrieval.js';

function createGateway(result: CompletionResult): CompletionGateway {
  return { complete: vi.fn().mockResolvedValue(result) };
}

function toolCalls(...calls: Array<[string, Record<string, unknown>]>): CompletionResult {
  return {
    ok: true,
    message: {
      toolCalls: calls.map(([name, args], i) => ({ id: `call-${String(i + 1)}`, name, arguments: args })),
    },
  };
}

function sentMessages(gateway: CompletionGateway): readonly ChatMessage[] {
  const calls = (gateway.complete as ReturnType<typeof vi.fn>).mock.calls as Array<[CompletionRequest]>;
  return calls[0][0].messages;
}

const registry = createToolRegistry([
  defineTool({
    name: 'get_stock_price',
    description: 'Daily price of one stock',
    schema: z.object({ ticker: z.string() }),
    execute: (args) => Promise.resolve({ ticker: args.ticker, close: 86500 }),
  }),
  defineTool({
    name: 'get_market_index',
    description: 'Market index on a day',
    schema: z.object({}),
    execute: () => Promise.resolve({ kospi: 2850.5 }),
  }),
  defineTool({
    name: 'screen_by_volume',
    description: 'Volume screener',
    schema: z.object({}),
    execute: () =>
      Promise.resolve({
        date: '2024-07-15',
        totalCount: 12,
        returnedCount: 2,
        results: [
          { name: '삼성전자', volume: 15000000 },
          { name: 'SK하이닉스', volume: 4200000 },
        ],
      }),
  }),
  defineTool({
    name: 'screen_by_rsi',
    description: 'RSI screener',
    schema: z.object({}),
    execute: () => Promise.resolve({ total_count: 0, returned_count: 0, results: [] }),
  }),
  defineTool({
    name: 'broken',
    description: 'Always fails',
    schema: z.object({}),
    execute: () => Promise.reject(new ToolExecutionError('database unavailable')),
  }),
]);

describe('data retrieval node', () => {
  it('should key fetch results by tool name', async () => {
    const gateway = createGateway(
      toolCalls(['get_stock_price', { ticker: '005930' }], ['get_market_index', {}]),
    );
    const node = createDataRetrievalNode('fetch', { gateway, registry });

    const update = await node(createRouterState({ query: '2024-07-15 삼성전자 종가' }));

    expect(update).toEqual({
      retrieval: {
        source: 'fetch',
        status: 'ok',
        results: [
          {
            get_stock_price: { ticker: '005930', close: 86500 },
            get_market_index: { kospi: 2850.5 },
          },
        ],
        totalCount: 2,
        returnedCount: 2,
        summary: 'Stock data retrieved: 2024-07-15 삼성전자 종가',
        parameters: { query: '2024-07-15 삼성전자 종가', backgroundKnowledge: {} },
      },
    });
  });

  it('should describe the question and suggest a comparison for several stocks', async () => {
    const gateway = createGateway(toolCalls(['get_market_index', {}]));
    const node = createDataRetrievalNode('fetch', { gateway, registry });

    await node(
      createRouterState({
        query: '삼성전자와 NAVER 비교',
        backgroundKnowledge: {
          stocks: [
            { ticker: '005930', name: '삼성전자' },
            { ticker: '035420', name: 'NAVER' },
          ],
        },
      }),
    );

    const [system, user] = sentMessages(gateway);
    expect(system.role).toBe('system');
    expect(user.content.split('\n')).toEqual([
      'question: 삼성전자와 NAVER 비교',
      'today: 2024-07-16',
      'background_knowledge: {"stocks":[{"ticker":"005930","name":"삼성전자"},{"ticker":"035420","name":"NAVER"}]}',
      'Several stocks were named (삼성전자 005930, NAVER 035420); prefer get_stock_comparison when the question compares them.',
    ]);
  });

  it('should pass the clarified parameters to the model', async () => {
    const gateway = createGateway(toolCalls(['screen_by_volume', {}]));
    const node = createDataRetrievalNode('conditional', { gateway, registry });

    await node(
      createRouterState({
        query: '2024-07-15 KOSPI 거래량 상위',
        clarification: {
          originalQuery: '거래량 많은 종목',
          clarifiedQuery: '2024-07-15 KOSPI 거래량 상위',
          startDate: '2024-07-15',
          marketScope: 'KOSPI',
        },
      }),
    );

    expect(sentMessages(gateway)[1].content).toContain(
      'clarification: {"startDate":"2024-07-15","marketScope":"KOSPI"}',
    );
  });

  it('should report the screening list with its counts', async () => {
    const gateway = createGateway(toolCalls(['screen_by_volume', {}]));
    const node = createDataRetrievalNode('conditional', { gateway, registry });

    const update = await node(createRouterState({ query: '2024-07-15 거래량 상위' }));

    expect(update.retrieval).toMatchObject({
      source: 'conditional',
      status: 'ok',
      results: [
        { name: '삼성전자', volume: 15000000 },
        { name: 'SK하이닉스', volume: 4200000 },
      ],
      totalCount: 12,
      returnedCount: 2,
      summary: "Found 12 stocks matching '2024-07-15 거래량 상위'. (showing top 2)",
    });
  });

  it('should read snake_case counts and report an empty screen', async () => {
    const gateway = createGateway(toolCalls(['screen_by_rsi', {}]));
    const node = createDataRetrievalNode('signal', { gateway, registry });

    const update = await node(createRouterState({ query: 'RSI 70 이상' }));

    expect(update.retrieval).toMatchObject({
      source: 'signal',
      status: 'ok',
      results: [],
      totalCount: 0,
      returnedCount: 0,
      summary: "No stocks match 'RSI 70 이상'.",
    });
  });

  it('should mark the retrieval failed when a tool fails', async () => {
    const gateway = createGateway(toolCalls(['get_market_index', {}], ['broken', {}]));
    const node = createDataRetrievalNode('fetch', { gateway, registry });

    const update = await node(createRouterState({ query: '시장 요약' }));

    expect(update.retrieval).toEqual({
      source: 'fetch',
      status: 'failed',
      results: [],
      totalCount: 0,
      returnedCount: 0,
      summary: 'Request failed',
      parameters: { query: '시장 요약', backgroundKnowledge: {} },
      error: 'Tool execution failed: broken: database unavailable',
    });
  });

  it('should mark the retrieval failed when the completion call fails', async () => {
    const gateway = createGateway({ ok: false, error: { kind: 'timeout', message: 'timed out' } });
    const node = createDataRetrievalNode('signal', { gateway, registry });

    const update = await node(createRouterState({ query: '골든크로스 종목' }));

    expect(update.retrieval).toMatchObject({ status: 'failed', error: 'timed out' });
  });

  it('should keep a direct answer when no tool was requested', async () => {
    const gateway = createGateway({ ok: true, message: { content: '해당 날짜는 휴장일입니다.' } });
    const node = createDataRetrievalNode('fetch', { gateway, registry });

    const update = await node(createRouterState({ query: '2024-07-13 삼성전자 종가' }));

    expect(update.retrieval).toMatchObject({
      status: 'ok',
      results: [],
      totalCount: 0,
      directAnswer: '해당 날짜는 휴장일입니다.',
    });
  });
});
