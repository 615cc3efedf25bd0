import { describe, it, expect, vi, afterEach } from 'vitest';
import type { ConversationState } from '@market-agent/shared/src/types/conversation.types.js';
import { createInMemorySessionStore } from './in-memory-session-store.js';

const T0 = Date.parse('2024-07-15T00:00:00Z');
const MINUTE = 60_000;

function at(ms: number): void {
  vi.spyOn(Date, 'now').mockReturnValue(ms);
}

function withQuiz(state: ConversationState, startedAt: number): ConversationState {
  return {
    ...state,
    quiz: {
      phase: 'asking',
      quizSessionId: 'abcd1234',
      startedAt: new Date(startedAt).toISOString(),
      question: {
        id: 1,
        question: 'Which company leads the memory chip market?',
        options: { '1': '삼성전자', '2': 'SK하이닉스', '3': 'NAVER', '4': '카카오' },
        correctAnswer: { number: '1', company: '삼성전자', symbol: '①' },
        background: 'Largest memory maker.',
      },
      hintUsed: false,
    },
  };
}

describe('InMemorySessionStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create a default record on first sight', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    const state = await store.getOrCreate('s1');

    expect(state).toEqual({
      sessionId: 's1',
      query: '',
      backgroundKnowledge: {},
      response: '',
      quiz: { phase: 'inactive' },
    });
    expect((await store.list()).map((s) => s.sessionId)).toEqual(['s1']);
  });

  it('should return the stored record for a known id', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    const state = await store.getOrCreate('s1');
    await store.save('s1', { ...state, response: 'hello' });

    expect((await store.getOrCreate('s1')).response).toBe('hello');
  });

  it('should remove a session idle for 11 minutes', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    await store.getOrCreate('s1');

    at(T0 + 11 * MINUTE);
    const report = await store.sweep();

    expect(report).toEqual({ idle: ['s1'], quizExpired: [], capacity: [] });
    expect(await store.list()).toEqual([]);
  });

  it('should keep a session idle for exactly 10 minutes', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    await store.getOrCreate('s1');

    at(T0 + 10 * MINUTE);
    expect((await store.sweep()).idle).toEqual([]);
  });

  it('should evict the least recently active session when a sixth arrives', async () => {
    const store = createInMemorySessionStore();
    for (let i = 1; i <= 5; i++) {
      at(T0 + i * 1000);
      await store.getOrCreate(`s${String(i)}`);
    }
    // s1 becomes the most recent, so s2 is the oldest.
    at(T0 + 6000);
    await store.getOrCreate('s1');
    at(T0 + 7000);
    await store.getOrCreate('s6');

    const ids = (await store.list()).map((s) => s.sessionId);
    expect(ids).toEqual(['s3', 's4', 's5', 's1', 's6']);
  });

  it('should report quiz expiry from an explicit sweep', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    const state = await store.getOrCreate('quiz-user');
    await store.save('quiz-user', withQuiz(state, T0 - 8 * MINUTE));

    at(T0 + 3 * MINUTE);
    expect(await store.sweep()).toEqual({ idle: [], quizExpired: ['quiz-user'], capacity: [] });
  });

  it('should apply the configured idle timeout to quizzes', async () => {
    at(T0);
    const store = createInMemorySessionStore({ idleTimeoutMs: 30 * MINUTE, capacity: 5 });
    const state = await store.getOrCreate('quiz-user');
    await store.save('quiz-user', withQuiz(state, T0 - 8 * MINUTE));

    at(T0 + 3 * MINUTE);
    expect(await store.sweep()).toEqual({ idle: [], quizExpired: [], capacity: [] });

    at(T0 + 23 * MINUTE);
    expect(await store.sweep()).toEqual({ idle: [], quizExpired: ['quiz-user'], capacity: [] });
  });

  it('should not store records for an empty session id', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    const state = await store.getOrCreate('');
    await store.save('', { ...state, response: 'ignored' });

    expect(state.sessionId).toBe('');
    expect(await store.list()).toEqual([]);
  });

  it('should summarise sessions for listing', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    const state = await store.getOrCreate('s1');
    await store.save('s1', withQuiz(state, T0));

    at(T0 + 90_000);
    expect(await store.list()).toEqual([
      {
        sessionId: 's1',
        quizActive: true,
        quizPhase: 'asking',
        elapsedMinutes: 1.5,
        lastActivity: '2024-07-15T00:00:00.000Z',
      },
    ]);
  });

  it('should serialise turns on the same session id', async () => {
    at(T0);
    const store = createInMemorySessionStore();
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withSession('s1', async (state) => {
      await gate;
      return { state: { ...state, response: 'first' }, value: 'first done' };
    });
    const second = store.withSession('s1', (state) =>
      Promise.resolve({ state: { ...state, response: 'second' }, value: state.response }),
    );
    const other = await store.withSession('s2', (state) =>
      Promise.resolve({ state, value: 'other done' }),
    );

    expect(other).toBe('other done');
    releaseFirst();
    expect(await first).toBe('first done');
    expect(await second).toBe('first');
    expect((await store.getOrCreate('s1')).response).toBe('second');
  });

  it('should release the lock when a turn fails', async () => {
    at(T0);
    const store = createInMemorySessionStore();

    await expect(
      store.withSession('s1', () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');
    const value = await store.withSession('s1', (state) => Promise.resolve({ state, value: 'ok' }));

    expect(value).toBe('ok');
  });
});
