import type { ConversationState } from '@market-agent/shared/src/types/conversation.types.js';
import type {
  SessionRecord,
  SessionSummary,
  SweepReport,
} from '@market-agent/shared/src/types/session.types.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { isActiveQuiz, isQuizExpired } from '../quiz/quiz-phase.js';
import { createConversationState } from './conversation-state.js';
import { createKeyedMutex } from './keyed-mutex.js';
import { DEFAULT_SESSION_STORE_CONFIG } from './session-store.js';
import type { SessionStore, SessionStoreConfig } from './session-store.js';

const log = createChildLogger('session:store');

export function createInMemorySessionStore(
  config: SessionStoreConfig = DEFAULT_SESSION_STORE_CONFIG,
): SessionStore {
  // Map iteration order is insertion order; touch() re-inserts, so the
  // first entry is always the least recently active.
  const records = new Map<string, SessionRecord>();
  const mutex = createKeyedMutex();

  function touch(sessionId: string, state: ConversationState): boolean {
    const isNew = !records.has(sessionId);
    records.delete(sessionId);
    records.set(sessionId, { state, lastActivity: Date.now() });
    return isNew;
  }

  function enforceCapacity(): string[] {
    const evicted: string[] = [];
    for (const sessionId of records.keys()) {
      if (records.size <= config.capacity) {
        break;
      }
      records.delete(sessionId);
      evicted.push(sessionId);
    }
    if (evicted.length > 0) {
      log.warn({ evicted, capacity: config.capacity }, 'Session capacity exceeded, evicted oldest');
    }
    return evicted;
  }

  function sweepSync(): SweepReport {
    const now = Date.now();
    const idle: string[] = [];
    const quizExpired: string[] = [];

    for (const [sessionId, record] of records) {
      if (now - record.lastActivity > config.idleTimeoutMs) {
        records.delete(sessionId);
        idle.push(sessionId);
      } else if (isQuizExpired(record.state.quiz, now, config.idleTimeoutMs)) {
        records.delete(sessionId);
        quizExpired.push(sessionId);
      }
    }

    if (idle.length > 0) {
      log.info({ sessions: idle }, 'Removed idle sessions');
    }
    if (quizExpired.length > 0) {
      log.info({ sessions: quizExpired }, 'Removed sessions with expired quizzes');
    }
    return { idle, quizExpired, capacity: enforceCapacity() };
  }

  function getOrCreateSync(sessionId: string): ConversationState {
    sweepSync();
    const existing = sessionId ? records.get(sessionId) : undefined;
    if (existing) {
      touch(sessionId, existing.state);
      return existing.state;
    }

    const state = createConversationState(sessionId);
    if (sessionId) {
      touch(sessionId, state);
      enforceCapacity();
      log.debug({ sessionId, sessions: records.size }, 'Session created');
    }
    return state;
  }

  function saveSync(sessionId: string, state: ConversationState): void {
    if (!sessionId) {
      return;
    }
    if (touch(sessionId, state)) {
      enforceCapacity();
    }
  }

  return {
    getOrCreate(sessionId: string): Promise<ConversationState> {
      return Promise.resolve(getOrCreateSync(sessionId));
    },

    save(sessionId: string, state: ConversationState): Promise<void> {
      saveSync(sessionId, state);
      return Promise.resolve();
    },

    sweep(): Promise<SweepReport> {
      return Promise.resolve(sweepSync());
    },

    list(): Promise<SessionSummary[]> {
      const now = Date.now();
      const summaries = [...records.entries()].map(([sessionId, record]) => ({
        sessionId,
        quizActive: isActiveQuiz(record.state.quiz),
        quizPhase: record.state.quiz.phase,
        elapsedMinutes: Math.round(((now - record.lastActivity) / 60_000) * 10) / 10,
        lastActivity: new Date(record.lastActivity).toISOString(),
      }));
      return Promise.resolve(summaries);
    },

    async withSession<T>(
      sessionId: string,
      fn: (state: ConversationState) => Promise<{ readonly state: ConversationState; readonly value: T }>,
    ): Promise<T> {
      if (!sessionId) {
        const result = await fn(getOrCreateSync(sessionId));
        return result.value;
      }

      return mutex.run(sessionId, async () => {
        const result = await fn(getOrCreateSync(sessionId));
        saveSync(sessionId, result.state);
        return result.value;
      });
    },
  };
}
