import type { ConversationState } from './conversation.types.js';
import type { QuizPhase } from './quiz.types.js';

export interface SessionRecord {
  readonly state: ConversationState;
  readonly lastActivity: number;
}

export interface SessionSummary {
  readonly sessionId: string;
  readonly quizActive: boolean;
  readonly quizPhase: QuizPhase;
  readonly elapsedMinutes: number;
  readonly lastActivity: string;
}

export type EvictionReason = 'idle' | 'quizExpired' | 'capacity';

/** Removed session ids per eviction reason. */
export type SweepReport = Readonly<Record<EvictionReason, readonly string[]>>;
