import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { QuizEngine } from '../quiz/quiz-engine.js';
import type { RouterGraphState, RouterNode } from '../orchestration/router-state.js';
import { QUIZ_ERROR_MESSAGE } from '../quiz/quiz-messages.js';

const log = createChildLogger('agent:quiz');

export interface QuizNodeDeps {
  readonly engine: QuizEngine;
  readonly now?: () => number;
}

export function createQuizNode(deps: QuizNodeDeps): RouterNode {
  const { engine, now = Date.now } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const { quiz, outcome } = await engine.handleTurn({
      requestId: state.sessionId,
      input: state.query,
      quiz: state.quizSession,
      credential: state.credential,
      now: now(),
    });
    log.info(
      { sessionId: state.sessionId, outcome: outcome.type, phase: quiz.phase },
      'Quiz turn handled',
    );
    return {
      quizSession: quiz,
      retrieval: { source: 'quiz', outcome, summary: `Quiz ${outcome.type}` },
    };
  };
}

export function createQuizResponseNode(): RouterNode {
  return (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const retrieval = state.retrieval;
    const response = retrieval?.source === 'quiz' ? retrieval.outcome.message : QUIZ_ERROR_MESSAGE;
    return Promise.resolve({ response });
  };
}
