import { describe, it, expect, vi } from 'vitest';
import type { LlmClient, LlmRequest } from '../llm/llm-client.js';
import { createRouterState } from '../testing/router-state.js';
import { SAMPLE_QUESTIONS } from '../testing/sample-quiz.js';
import { createClassifierNode, isQuizTrigger, parseCategory } from './classifier.js';

function llm(content: string): LlmClient {
  return { invoke: vi.fn().mockResolvedValue({ content }) };
}

function systemPrompt(client: LlmClient): string {
  const calls = (client.invoke as ReturnType<typeof vi.fn>).mock.calls as Array<[LlmRequest]>;
  return calls[0][0].systemPrompt;
}

describe('parseCategory', () => {
  it('should match the bare token case-insensitively', () => {
    expect(parseCategory('  Signal_Stock_Data \n')).toBe('signal');
  });

  it('should take the earliest whole-word token inside an explanation', () => {
    expect(
      parseCategory('Category: conditional_stock_data (not fetch_stock_data)'),
    ).toBe('conditional');
  });

  it('should fall back to substring containment', () => {
    expect(parseCategory('answer=fetch_stock_datax')).toBe('fetch');
  });

  it('should ignore tokens outside the allowed set', () => {
    expect(parseCategory('ambiguous_query', ['fetch', 'conditional', 'signal'])).toBeUndefined();
  });

  it('should return undefined for unrelated text', () => {
    expect(parseCategory('I am not sure')).toBeUndefined();
    expect(parseCategory('')).toBeUndefined();
  });
});

describe('isQuizTrigger', () => {
  it.each(['주식퀴즈', '퀴즈도전!', '주식퀴즈도전', '퀴즈 시작할래'])('should detect %s', (query) => {
    expect(isQuizTrigger(query)).toBe(true);
  });

  it('should ignore other mentions of quizzes', () => {
    expect(isQuizTrigger('퀴즈 결과 알려줘')).toBe(false);
  });
});

describe('classifier node', () => {
  it('should route an active quiz to the quiz without calling the model', async () => {
    const client = llm('fetch_stock_data');
    const node = createClassifierNode({ llmClient: client });

    const update = await node(
      createRouterState({
        query: '1',
        quizSession: {
          phase: 'asking',
          quizSessionId: 'abcd1234',
          startedAt: '2024-07-16T03:00:00.000Z',
          question: SAMPLE_QUESTIONS[0],
          hintUsed: false,
        },
      }),
    );

    expect(update).toEqual({ category: 'quiz' });
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should route a quiz trigger phrase to the quiz', async () => {
    const node = createClassifierNode({ llmClient: llm('fetch_stock_data') });

    expect(await node(createRouterState({ query: '주식퀴즈 도전할래' }))).toEqual({ category: 'quiz' });
  });

  it('should classify with the full prompt on the first pass', async () => {
    const client = llm('conditional_stock_data');
    const node = createClassifierNode({ llmClient: client });

    const update = await node(createRouterState({ query: '2024-07-15 거래량 많은 종목' }));

    expect(update).toEqual({ category: 'conditional' });
    expect(systemPrompt(client)).toContain('ambiguous_query');
  });

  it('should default to ambiguous when the first-pass answer is unreadable', async () => {
    const node = createClassifierNode({ llmClient: llm('모르겠습니다') });

    expect(await node(createRouterState({ query: '요즘 좋은 주식?' }))).toEqual({ category: 'ambiguous' });
  });

  it('should default to ambiguous when the model call fails on the first pass', async () => {
    const client: LlmClient = { invoke: vi.fn().mockRejectedValue(new Error('timeout')) };
    const node = createClassifierNode({ llmClient: client });

    expect(await node(createRouterState({ query: '요즘 좋은 주식?' }))).toEqual({ category: 'ambiguous' });
  });

  it('should omit ambiguous after clarification and default to fetch', async () => {
    const client = llm('ambiguous_query');
    const node = createClassifierNode({ llmClient: client });

    const update = await node(
      createRouterState({
        query: '2024-07-15 KOSPI 등락률 상위 종목',
        clarification: { originalQuery: '요즘 좋은 주식?', clarifiedQuery: '2024-07-15 KOSPI 등락률 상위 종목' },
        clarificationPasses: 1,
      }),
    );

    expect(update).toEqual({ category: 'fetch' });
    expect(systemPrompt(client)).not.toContain('ambiguous_query');
  });

  it('should coerce ambiguous to fetch once the clarification cap is reached', async () => {
    const node = createClassifierNode({ llmClient: llm('ambiguous_query') });

    const update = await node(createRouterState({ query: '요즘 좋은 주식?', clarificationPasses: 1 }));

    expect(update).toEqual({ category: 'fetch' });
  });
});
