import type { MarketScope } from './market.types.js';
import type { QuizOutcome, QuizSession } from './quiz.types.js';

export type QueryCategory = 'fetch' | 'conditional' | 'signal' | 'quiz' | 'ambiguous';

export type RetrievalCategory = 'fetch' | 'conditional' | 'signal';

export interface ResolvedStock {
  readonly ticker: string;
  readonly name: string;
}

export interface BackgroundKnowledge {
  readonly queryDate?: string;
  readonly isTradingDate?: boolean;
  readonly stockNames?: readonly string[];
  readonly stocks?: readonly ResolvedStock[];
}

export interface ClarificationRecord {
  readonly originalQuery: string;
  readonly clarifiedQuery: string;
  readonly startDate?: string;
  readonly endDate?: string;
  readonly marketScope?: MarketScope;
  readonly primaryCriteria?: string;
  readonly secondaryCriteria?: string;
}

export interface DataRetrievalResult {
  readonly source: RetrievalCategory;
  readonly status: 'ok' | 'failed';
  readonly results: readonly Record<string, unknown>[];
  readonly totalCount: number;
  readonly returnedCount: number;
  readonly summary: string;
  readonly parameters: Record<string, unknown>;
  readonly error?: string;
  /** Text the model returned instead of calling a tool. */
  readonly directAnswer?: string;
}

export interface QuizRetrievalResult {
  readonly source: 'quiz';
  readonly outcome: QuizOutcome;
  readonly summary: string;
}

export type RetrievalResult = DataRetrievalResult | QuizRetrievalResult;

export interface ConversationState {
  readonly sessionId: string;
  readonly query: string;
  readonly category?: QueryCategory;
  readonly backgroundKnowledge: BackgroundKnowledge;
  readonly retrieval?: RetrievalResult;
  readonly response: string;
  readonly clarification?: ClarificationRecord;
  readonly credential?: string;
  readonly quiz: QuizSession;
}
