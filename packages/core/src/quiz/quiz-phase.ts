import { randomUUID } from 'node:crypto';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type {
  ActiveQuizSession,
  QuizPhase,
  QuizQuestion,
  QuizSession,
} from '@market-agent/shared/src/types/quiz.types.js';

const log = createChildLogger('quiz:phase');

export const QUIZ_TIMEOUT_MS = 10 * 60 * 1000;

const ALLOWED_TRANSITIONS: Readonly<Record<QuizPhase, readonly QuizPhase[]>> = {
  inactive: ['asking'],
  asking: ['processing', 'completed'],
  processing: ['completed'],
  completed: ['inactive'],
};

export type TransitionResult =
  | { readonly ok: true; readonly session: QuizSession }
  | { readonly ok: false; readonly session: QuizSession; readonly reason: string };

export const INACTIVE_QUIZ: QuizSession = { phase: 'inactive' };

export function canTransition(from: QuizPhase, to: QuizPhase): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function reject(session: QuizSession, to: QuizPhase, reason: string): TransitionResult {
  log.warn({ from: session.phase, to, reason }, 'Quiz phase transition rejected');
  return { ok: false, session, reason };
}

export function isActiveQuiz(session: QuizSession): session is ActiveQuizSession {
  return session.phase !== 'inactive';
}

export function newQuizSessionId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/** inactive → asking; the only way a question enters the session. */
export function startQuiz(
  session: QuizSession,
  question: QuizQuestion,
  now: number = Date.now(),
): TransitionResult {
  if (!canTransition(session.phase, 'asking')) {
    return reject(session, 'asking', `Cannot start a quiz from ${session.phase}`);
  }
  return {
    ok: true,
    session: {
      phase: 'asking',
      quizSessionId: newQuizSessionId(),
      startedAt: new Date(now).toISOString(),
      question,
      hintUsed: false,
    },
  };
}

/** Moves along the allow-list; rejected moves leave the session unchanged. */
export function transitionQuizPhase(session: QuizSession, to: QuizPhase): TransitionResult {
  if (!canTransition(session.phase, to)) {
    return reject(session, to, `Transition ${session.phase} → ${to} is not allowed`);
  }
  if (to === 'inactive') {
    return { ok: true, session: INACTIVE_QUIZ };
  }
  if (!isActiveQuiz(session)) {
    return reject(session, to, 'Starting a quiz requires a question');
  }
  return { ok: true, session: { ...session, phase: to } };
}

/** Wrong answer: processing goes back to asking with the same question. */
export function revertToAsking(session: QuizSession): TransitionResult {
  if (session.phase !== 'processing') {
    return reject(session, 'asking', `Cannot revert to asking from ${session.phase}`);
  }
  return { ok: true, session: { ...session, phase: 'asking' } };
}

/** Teardown from any phase. */
export function endQuiz(session: QuizSession): QuizSession {
  if (isActiveQuiz(session)) {
    log.debug({ quizSessionId: session.quizSessionId, from: session.phase }, 'Quiz ended');
  }
  return INACTIVE_QUIZ;
}

/** A quiz shares the session idle timeout; `timeoutMs` defaults to 10 minutes. */
export function isQuizExpired(
  session: QuizSession,
  now: number = Date.now(),
  timeoutMs: number = QUIZ_TIMEOUT_MS,
): boolean {
  if (!isActiveQuiz(session)) {
    return false;
  }
  const started = Date.parse(session.startedAt);
  return Number.isNaN(started) || now - started > timeoutMs;
}
