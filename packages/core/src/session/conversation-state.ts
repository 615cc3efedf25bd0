import type { ConversationState } from '@market-agent/shared/src/types/conversation.types.js';
import { INACTIVE_QUIZ } from '../quiz/quiz-phase.js';

export function createConversationState(sessionId: string): ConversationState {
  return {
    sessionId,
    query: '',
    backgroundKnowledge: {},
    response: '',
    quiz: INACTIVE_QUIZ,
  };
}

/**
 * Starts a new turn on a stored state: per-turn fields are cleared, the quiz
 * sub-record carries over.
 */
export function beginTurn(
  state: ConversationState,
  query: string,
  credential?: string,
): ConversationState {
  return {
    sessionId: state.sessionId,
    query,
    backgroundKnowledge: {},
    response: '',
    credential,
    quiz: state.quiz,
  };
}
