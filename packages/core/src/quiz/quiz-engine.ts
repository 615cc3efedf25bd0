import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type {
  ActiveQuizSession,
  QuizHistoryRecord,
  QuizOutcome,
  QuizSession,
  RewardPackage,
} from '@market-agent/shared/src/types/quiz.types.js';
import type { QuizHistoryRepository } from '../repositories/quiz-history.repository.js';
import type { AnswerChecker } from './answer-checker.js';
import type { CompanyInsightWriter } from './company-insight.js';
import type { HintProvider } from './hint-provider.js';
import { isHintRequest } from './hint-provider.js';
import type { QuizBankService } from './quiz-bank.js';
import {
  endQuiz,
  isActiveQuiz,
  QUIZ_TIMEOUT_MS,
  isQuizExpired,
  revertToAsking,
  startQuiz,
  transitionQuizPhase,
} from './quiz-phase.js';
import {
  QUIZ_CHECK_FAILED_MESSAGE,
  QUIZ_CLOSED_MESSAGE,
  QUIZ_ERROR_MESSAGE,
  QUIZ_EXPIRED_MESSAGE,
  formatCorrectAnswer,
  formatHint,
  formatQuizStart,
  formatWrongAnswer,
} from './quiz-messages.js';
import type { RewardCalculator } from './reward-calculator.js';
import { checkRewardEligibility, totalRewards } from './reward-policy.js';

const log = createChildLogger('quiz:engine');

const RECORDED_SESSION_LIMIT = 1000;

export interface QuizTurnInput {
  readonly requestId: string;
  readonly input: string;
  readonly quiz: QuizSession;
  readonly credential?: string;
  readonly now?: number;
}

export interface QuizTurnResult {
  readonly quiz: QuizSession;
  readonly outcome: QuizOutcome;
}

export interface QuizEngine {
  handleTurn(turn: QuizTurnInput): Promise<QuizTurnResult>;
}

export interface QuizEngineDeps {
  readonly bank: QuizBankService;
  readonly checker: AnswerChecker;
  readonly hints: HintProvider;
  readonly rewards: RewardCalculator;
  readonly insight: CompanyInsightWriter;
  readonly history: QuizHistoryRepository;
  /** Defaults to the 10 minute session idle timeout. */
  readonly quizTimeoutMs?: number;
}

interface Completion {
  readonly isCorrect: boolean;
  readonly userAnswer: string;
}

/**
 * Runs one quiz turn against the session's quiz sub-record. The returned
 * session replaces the old one; history is written at most once per
 * quiz session.
 */
export function createQuizEngine(deps: QuizEngineDeps): QuizEngine {
  const { bank, checker, hints, rewards, insight, history } = deps;
  const quizTimeoutMs = deps.quizTimeoutMs ?? QUIZ_TIMEOUT_MS;
  const recorded = new Set<string>();

  const markRecorded = (quizSessionId: string): boolean => {
    if (recorded.has(quizSessionId)) {
      return false;
    }
    recorded.add(quizSessionId);
    if (recorded.size > RECORDED_SESSION_LIMIT) {
      const oldest = recorded.values().next();
      if (!oldest.done) {
        recorded.delete(oldest.value);
      }
    }
    return true;
  };

  const grantReward = async (
    turn: QuizTurnInput,
    quiz: ActiveQuizSession,
    now: number,
  ): Promise<RewardPackage | undefined> => {
    const company = quiz.question.correctAnswer.company;
    try {
      const rewarded = turn.requestId ? await history.listRewardedAttempts(turn.requestId) : [];
      const eligibility = checkRewardEligibility(rewarded, now);
      if (!eligibility.eligible) {
        log.info({ nextEligibleAt: eligibility.nextEligibleAt }, 'Reward limited by cooldown');
        return {
          eligible: false,
          stock: company,
          shares: 0,
          nextEligibleAt: eligibility.nextEligibleAt,
          totalRewards: totalRewards(rewarded),
        };
      }

      const quote = await rewards.quote(company, now);
      const pending: QuizHistoryRecord = {
        requestId: turn.requestId,
        quizId: quiz.question.id,
        quizQuestion: quiz.question.question,
        correctAnswer: company,
        userAnswer: turn.input,
        isCorrect: true,
        hintUsed: quiz.hintUsed,
        rewardStock: quote.stock,
        rewardAmount: quote.shares,
        completedAt: new Date(now).toISOString(),
        createdAt: quiz.startedAt,
      };
      return {
        eligible: true,
        stock: quote.stock,
        ticker: quote.ticker,
        shares: quote.shares,
        referencePrice: quote.referencePrice,
        referenceDate: quote.referenceDate,
        totalRewards: totalRewards([...rewarded, pending]),
      };
    } catch (error) {
      log.error({ err: error, quizId: quiz.question.id }, 'Reward calculation failed');
      return undefined;
    }
  };

  const recordHistory = async (
    turn: QuizTurnInput,
    quiz: ActiveQuizSession,
    completion: Completion,
    reward: RewardPackage | undefined,
    now: number,
  ): Promise<void> => {
    if (!markRecorded(quiz.quizSessionId)) {
      log.debug({ quizSessionId: quiz.quizSessionId }, 'History already recorded');
      return;
    }
    const record: QuizHistoryRecord = {
      requestId: turn.requestId,
      quizId: quiz.question.id,
      quizQuestion: quiz.question.question,
      correctAnswer: quiz.question.correctAnswer.company,
      userAnswer: completion.userAnswer,
      isCorrect: completion.isCorrect,
      hintUsed: quiz.hintUsed,
      ...(reward?.eligible ? { rewardStock: reward.stock } : {}),
      rewardAmount: reward?.eligible ? reward.shares : 0,
      completedAt: new Date(now).toISOString(),
      createdAt: quiz.startedAt,
    };
    try {
      await history.save(record);
      log.info(
        { quizId: record.quizId, isCorrect: record.isCorrect, rewardAmount: record.rewardAmount },
        'Quiz history recorded',
      );
    } catch (error) {
      log.error({ err: error, quizSessionId: quiz.quizSessionId }, 'Quiz history write failed');
    }
  };

  /** processing → completed → inactive, recording history once. */
  const complete = async (
    turn: QuizTurnInput,
    processing: ActiveQuizSession,
    completion: Completion,
    reward: RewardPackage | undefined,
    now: number,
  ): Promise<QuizSession> => {
    const completed = transitionQuizPhase(processing, 'completed');
    const finished = isActiveQuiz(completed.session) ? completed.session : processing;
    await recordHistory(turn, finished, completion, reward, now);
    return endQuiz(completed.session);
  };

  const start = async (turn: QuizTurnInput, now: number): Promise<QuizTurnResult> => {
    const question = await bank.selectQuestion(turn.requestId);
    const started = startQuiz(turn.quiz, question, now);
    return {
      quiz: started.session,
      outcome: { type: 'started', message: formatQuizStart(question), quizId: question.id },
    };
  };

  const hint = async (turn: QuizTurnInput, quiz: ActiveQuizSession): Promise<QuizTurnResult> => {
    const context = { sessionId: turn.requestId, credential: turn.credential };
    const [keywordHint, newsHint] = await Promise.all([
      hints.keywordHint(quiz.question, context),
      hints.newsHint(quiz.question, context),
    ]);
    return {
      quiz: { ...quiz, hintUsed: true },
      outcome: { type: 'hint', message: formatHint(keywordHint, newsHint), quizId: quiz.question.id },
    };
  };

  const answer = async (
    turn: QuizTurnInput,
    quiz: ActiveQuizSession,
    now: number,
  ): Promise<QuizTurnResult> => {
    const moved = transitionQuizPhase(quiz, 'processing');
    if (!moved.ok || !isActiveQuiz(moved.session)) {
      return { quiz: endQuiz(quiz), outcome: { type: 'error', message: QUIZ_ERROR_MESSAGE } };
    }
    const processing = moved.session;
    const context = { sessionId: turn.requestId, credential: turn.credential };

    let isCorrect: boolean;
    try {
      isCorrect = (await checker.check(processing.question, turn.input, context)).isCorrect;
    } catch (error) {
      log.error({ err: error, quizId: processing.question.id }, 'Answer check failed');
      return {
        quiz: processing,
        outcome: { type: 'error', message: QUIZ_CHECK_FAILED_MESSAGE, quizId: processing.question.id },
      };
    }

    if (!isCorrect) {
      const reverted = revertToAsking(processing);
      const keywordHint = await hints.keywordHint(processing.question, context);
      return {
        quiz: reverted.session,
        outcome: {
          type: 'incorrect',
          message: formatWrongAnswer(turn.input, keywordHint),
          quizId: processing.question.id,
        },
      };
    }

    const [reward, companyInsight] = await Promise.all([
      grantReward(turn, processing, now),
      insight.write(processing.question, context),
    ]);
    const ended = await complete(turn, processing, { isCorrect: true, userAnswer: turn.input }, reward, now);
    return {
      quiz: ended,
      outcome: {
        type: 'correct',
        message: formatCorrectAnswer(processing.question, companyInsight, reward),
        quizId: processing.question.id,
        reward,
      },
    };
  };

  const run = async (turn: QuizTurnInput, now: number): Promise<QuizTurnResult> => {
    const quiz = turn.quiz;

    if (isQuizExpired(quiz, now, quizTimeoutMs)) {
      log.info({ phase: quiz.phase }, 'Quiz expired');
      return { quiz: endQuiz(quiz), outcome: { type: 'expired', message: QUIZ_EXPIRED_MESSAGE } };
    }

    if (!isActiveQuiz(quiz)) {
      return start(turn, now);
    }

    switch (quiz.phase) {
      case 'asking':
        return isHintRequest(turn.input) ? hint(turn, quiz) : answer(turn, quiz, now);
      case 'processing': {
        // A previous answer check never finished; close the quiz out.
        const ended = await complete(turn, quiz, { isCorrect: false, userAnswer: '' }, undefined, now);
        return {
          quiz: ended,
          outcome: { type: 'completed', message: QUIZ_CLOSED_MESSAGE, quizId: quiz.question.id },
        };
      }
      case 'completed':
        return {
          quiz: endQuiz(quiz),
          outcome: { type: 'completed', message: QUIZ_CLOSED_MESSAGE, quizId: quiz.question.id },
        };
      default:
        log.error({ phase: turn.quiz.phase }, 'Unknown quiz phase');
        return { quiz: endQuiz(quiz), outcome: { type: 'error', message: QUIZ_ERROR_MESSAGE } };
    }
  };

  return {
    async handleTurn(turn: QuizTurnInput): Promise<QuizTurnResult> {
      const now = turn.now ?? Date.now();
      try {
        return await run(turn, now);
      } catch (error) {
        log.error({ err: error, phase: turn.quiz.phase }, 'Quiz turn failed');
        return { quiz: endQuiz(turn.quiz), outcome: { type: 'error', message: QUIZ_ERROR_MESSAGE } };
      }
    },
  };
}
