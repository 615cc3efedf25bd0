import { describe, it, expect, vi } from 'vitest';
import type { QuizHistoryRecord } from '@market-agent/shared/src/types/quiz.types.js';
import { QuizError } from '@market-agent/shared/src/utils/errors.js';
import { createInMemoryQuizHistoryRepository } from '../repositories/in-memory-quiz-history.repository.js';
import type { QuizHistoryRepository } from '../repositories/quiz-history.repository.js';
import { SAMPLE_QUESTIONS } from '../testing/sample-quiz.js';
import { createQuizBankService } from './quiz-bank.js';

function attempt(requestId: string, quizId: number): QuizHistoryRecord {
  return {
    requestId,
    quizId,
    quizQuestion: 'q',
    correctAnswer: 'c',
    userAnswer: 'a',
    isCorrect: false,
    hintUsed: false,
    rewardAmount: 0,
    completedAt: '2024-07-15T00:00:00.000Z',
    createdAt: '2024-07-15T00:00:00.000Z',
  };
}

describe('QuizBankService', () => {
  it('should prefer questions the requester has not attempted', async () => {
    const history = createInMemoryQuizHistoryRepository([
      attempt('user-a', 1),
      attempt('user-a', 2),
      attempt('user-b', 3),
    ]);
    const bank = createQuizBankService(SAMPLE_QUESTIONS, history, () => 0);

    const question = await bank.selectQuestion('user-a');

    expect(question.id).toBe(3);
  });

  it('should pick randomly from the full bank once everything was attempted', async () => {
    const history = createInMemoryQuizHistoryRepository([
      attempt('user-a', 1),
      attempt('user-a', 2),
      attempt('user-a', 3),
    ]);
    const bank = createQuizBankService(SAMPLE_QUESTIONS, history, () => 0.5);

    const question = await bank.selectQuestion('user-a');

    expect(question.id).toBe(2);
  });

  it('should keep the index in range when random returns values close to one', async () => {
    const bank = createQuizBankService(
      SAMPLE_QUESTIONS,
      createInMemoryQuizHistoryRepository(),
      () => 0.9999,
    );

    expect((await bank.selectQuestion('user-a')).id).toBe(3);
  });

  it('should fall back to the full bank when history lookup fails', async () => {
    const history: QuizHistoryRepository = {
      save: vi.fn(),
      findAttemptedQuizIds: vi.fn().mockRejectedValue(new Error('unavailable')),
      listRewardedAttempts: vi.fn(),
    };
    const bank = createQuizBankService(SAMPLE_QUESTIONS, history, () => 0);

    expect((await bank.selectQuestion('user-a')).id).toBe(1);
  });

  it('should not query history for an empty requester id', async () => {
    const history: QuizHistoryRepository = {
      save: vi.fn(),
      findAttemptedQuizIds: vi.fn().mockResolvedValue([1]),
      listRewardedAttempts: vi.fn(),
    };
    const bank = createQuizBankService(SAMPLE_QUESTIONS, history, () => 0);

    expect((await bank.selectQuestion('')).id).toBe(1);
    expect(history.findAttemptedQuizIds).not.toHaveBeenCalled();
  });

  it('should throw QuizError for an empty bank', async () => {
    const bank = createQuizBankService([], createInMemoryQuizHistoryRepository());

    await expect(bank.selectQuestion('user-a')).rejects.toThrow(QuizError);
  });
});
