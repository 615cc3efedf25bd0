import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { QuizHistoryRecord } from '@market-agent/shared/src/types/quiz.types.js';
import { PersistenceError, toError } from '@market-agent/shared/src/utils/errors.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { QuizHistoryRepository } from '../repositories/quiz-history.repository.js';

const log = createChildLogger('firestore:quiz-history');

const COLLECTION = 'quiz-history';

interface QuizHistoryDocument {
  requestId: string;
  quizId: number;
  quizQuestion: string;
  correctAnswer: string;
  userAnswer: string;
  isCorrect: boolean;
  hintUsed: boolean;
  rewardStock?: string;
  rewardAmount: number;
  completedAt: Timestamp;
  createdAt: Timestamp;
}

function toDoc(record: QuizHistoryRecord): QuizHistoryDocument {
  return {
    ...record,
    completedAt: Timestamp.fromDate(new Date(record.completedAt)),
    createdAt: Timestamp.fromDate(new Date(record.createdAt)),
  };
}

function fromDoc(data: QuizHistoryDocument): QuizHistoryRecord {
  return {
    ...data,
    completedAt: data.completedAt.toDate().toISOString(),
    createdAt: data.createdAt.toDate().toISOString(),
  };
}

export function createFirestoreQuizHistoryRepository(db: Firestore): QuizHistoryRepository {
  const collectionRef = db.collection(COLLECTION);

  return {
    async save(record: QuizHistoryRecord): Promise<void> {
      try {
        await collectionRef.add(toDoc(record));
        log.info({ quizId: record.quizId, isCorrect: record.isCorrect }, 'Quiz history saved');
      } catch (error) {
        throw new PersistenceError('Failed to save quiz history', toError(error));
      }
    },

    async findAttemptedQuizIds(requestId: string): Promise<readonly number[]> {
      const snapshot = await collectionRef.where('requestId', '==', requestId).get();
      const ids = snapshot.docs.map((doc) => (doc.data() as QuizHistoryDocument).quizId);
      return [...new Set(ids)];
    },

    async listRewardedAttempts(requestId: string): Promise<readonly QuizHistoryRecord[]> {
      const snapshot = await collectionRef
        .where('requestId', '==', requestId)
        .where('isCorrect', '==', true)
        .where('rewardAmount', '>', 0)
        .get();

      return snapshot.docs
        .map((doc) => fromDoc(doc.data() as QuizHistoryDocument))
        .sort((a, b) => b.completedAt.localeCompare(a.completedAt));
    },
  };
}
