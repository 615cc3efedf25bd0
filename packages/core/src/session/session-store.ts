import type { ConversationState } from '@market-agent/shared/src/types/conversation.types.js';
import type { SessionSummary, SweepReport } from '@market-agent/shared/src/types/session.types.js';

/**
 * Holds conversation state per session id. Empty ids get an ephemeral record
 * that is never stored.
 */
export interface SessionStore {
  getOrCreate(sessionId: string): Promise<ConversationState>;
  save(sessionId: string, state: ConversationState): Promise<void>;
  sweep(): Promise<SweepReport>;
  list(): Promise<SessionSummary[]>;
  /** getOrCreate → fn → save under a per-session lock. */
  withSession<T>(
    sessionId: string,
    fn: (state: ConversationState) => Promise<{ readonly state: ConversationState; readonly value: T }>,
  ): Promise<T>;
}

export interface SessionStoreConfig {
  readonly idleTimeoutMs: number;
  readonly capacity: number;
}

export const DEFAULT_SESSION_STORE_CONFIG: SessionStoreConfig = {
  idleTimeoutMs: 10 * 60 * 1000,
  capacity: 5,
};
