import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { QuizError } from '@market-agent/shared/src/utils/errors.js';
import type { QuizQuestion } from '@market-agent/shared/src/types/quiz.types.js';
import type { QuizHistoryRepository } from '../repositories/quiz-history.repository.js';

const log = createChildLogger('quiz:bank');

export interface QuizBankService {
  readonly size: number;
  /** Prefers questions the requester has never attempted; random over all once exhausted. */
  selectQuestion(requestId: string): Promise<QuizQuestion>;
}

export function createQuizBankService(
  questions: readonly QuizQuestion[],
  history: QuizHistoryRepository,
  random: () => number = Math.random,
): QuizBankService {
  const pick = (pool: readonly QuizQuestion[]): QuizQuestion => {
    const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
    return pool[index];
  };

  return {
    size: questions.length,

    async selectQuestion(requestId: string): Promise<QuizQuestion> {
      if (questions.length === 0) {
        throw new QuizError('Quiz bank is empty');
      }

      let attempted: ReadonlySet<number> = new Set();
      if (requestId) {
        try {
          attempted = new Set(await history.findAttemptedQuizIds(requestId));
        } catch (error) {
          log.warn(
            { err: error, requestId },
            'Could not load quiz history, selecting from the full bank',
          );
        }
      }

      const unplayed = questions.filter((q) => !attempted.has(q.id));
      const question = pick(unplayed.length > 0 ? unplayed : questions);

      log.info(
        { quizId: question.id, unplayed: unplayed.length, total: questions.length },
        'Quiz question selected',
      );
      return question;
    },
  };
}
