import type { QuizHistoryRecord } from '@market-agent/shared/src/types/quiz.types.js';
import type { QuizHistoryRepository } from './quiz-history.repository.js';

export function createInMemoryQuizHistoryRepository(
  initial: readonly QuizHistoryRecord[] = [],
): QuizHistoryRepository {
  const records: QuizHistoryRecord[] = [...initial];

  return {
    save(record: QuizHistoryRecord): Promise<void> {
      records.push(record);
      return Promise.resolve();
    },

    findAttemptedQuizIds(requestId: string): Promise<readonly number[]> {
      const ids = records.filter((r) => r.requestId === requestId).map((r) => r.quizId);
      return Promise.resolve([...new Set(ids)]);
    },

    listRewardedAttempts(requestId: string): Promise<readonly QuizHistoryRecord[]> {
      const rewarded = records
        .filter((r) => r.requestId === requestId && r.isCorrect && r.rewardAmount > 0)
        .sort((a, b) => b.completedAt.localeCompare(a.completedAt));
      return Promise.resolve(rewarded);
    },
  };
}
