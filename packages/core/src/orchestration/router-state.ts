import { Annotation } from '@langchain/langgraph';
import type {
  BackgroundKnowledge,
  ClarificationRecord,
  QueryCategory,
  RetrievalResult,
} from '@market-agent/shared/src/types/conversation.types.js';
import type { QuizSession } from '@market-agent/shared/src/types/quiz.types.js';
import type { CompletenessAnalysis } from '../agents/agent-output.schemas.js';

export type ClarificationDecision = 'askUser' | 'selfClarify';

export const RouterGraphAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  query: Annotation<string>,
  credential: Annotation<string | undefined>,
  /** Calendar date in Korea when the turn started, `YYYY-MM-DD`. */
  today: Annotation<string>,
  category: Annotation<QueryCategory | undefined>,
  backgroundKnowledge: Annotation<BackgroundKnowledge>,
  completeness: Annotation<CompletenessAnalysis | undefined>,
  clarificationDecision: Annotation<ClarificationDecision | undefined>,
  clarification: Annotation<ClarificationRecord | undefined>,
  clarificationPasses: Annotation<number>,
  retrieval: Annotation<RetrievalResult | undefined>,
  response: Annotation<string>,
  quizSession: Annotation<QuizSession>,
});

export type RouterGraphState = typeof RouterGraphAnnotation.State;

export type RouterNode = (state: RouterGraphState) => Promise<Partial<RouterGraphState>>;
