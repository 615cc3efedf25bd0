import { describe, it, expect, vi } from 'vitest';
import { AgentError } from '@market-agent/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import { SAMPLE_QUESTIONS } from '../testing/sample-quiz.js';
import { createAnswerChecker, matchAnswerByRule } from './answer-checker.js';

const question = SAMPLE_QUESTIONS[0];

function createMockClient(content: string): LlmClient {
  return { invoke: vi.fn().mockResolvedValue({ content }) };
}

describe('matchAnswerByRule', () => {
  it.each(['1', '1번', ' 1 번', '①', '삼성전자', '정답은 삼성전자요'])(
    'should accept %s as the correct answer',
    (answer) => {
      expect(matchAnswerByRule(question, answer)?.isCorrect).toBe(true);
    },
  );

  it.each(['2', '3번', '④', 'naver', 'SK하이닉스 같아요'])('should reject %s with full confidence', (answer) => {
    const result = matchAnswerByRule(question, answer);
    expect(result?.isCorrect).toBe(false);
    expect(result?.confidence).toBe(100);
  });

  it('should leave free-form answers to the model', () => {
    expect(matchAnswerByRule(question, '갤럭시 만드는 회사')).toBeUndefined();
    expect(matchAnswerByRule(question, '5')).toBeUndefined();
  });
});

describe('AnswerChecker', () => {
  it('should not call the model when a rule matches', async () => {
    const client = createMockClient('{}');
    const checker = createAnswerChecker(client);

    const result = await checker.check(question, '1');

    expect(result).toEqual({
      isCorrect: true,
      confidence: 100,
      reason: 'Answer selects option 1 (삼성전자)',
      method: 'rule',
    });
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should use the model verdict for free-form answers', async () => {
    const client = createMockClient(
      JSON.stringify({ isCorrect: true, confidence: 90, reason: 'Samsung Electronics' }),
    );
    const checker = createAnswerChecker(client);

    const result = await checker.check(question, 'Samsung Electronics', { credential: 'test-token' });

    expect(result).toEqual({
      isCorrect: true,
      confidence: 90,
      reason: 'Samsung Electronics',
      method: 'model',
    });
    expect(client.invoke).toHaveBeenCalledWith(
      expect.objectContaining({ credential: 'test-token' }),
    );
  });

  it('should throw when the model never returns a valid verdict', async () => {
    const checker = createAnswerChecker(createMockClient('not json'));

    await expect(checker.check(question, 'Samsung Electronics')).rejects.toThrow(AgentError);
  });
});
