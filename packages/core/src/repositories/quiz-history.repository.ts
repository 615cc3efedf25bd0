import type { QuizHistoryRecord } from '@market-agent/shared/src/types/quiz.types.js';

export interface QuizHistoryRepository {
  save(record: QuizHistoryRecord): Promise<void>;
  findAttemptedQuizIds(requestId: string): Promise<readonly number[]>;
  /** Correct attempts that earned a reward, newest first. */
  listRewardedAttempts(requestId: string): Promise<readonly QuizHistoryRecord[]>;
}
