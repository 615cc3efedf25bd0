import { describe, it, expect } from 'vitest';
import { createTestApp } from '../test-helpers.js';

function ask(sessionId: string, question: string): [string, RequestInit] {
  return [
    `/agent?question=${encodeURIComponent(question)}`,
    { headers: { 'X-NCP-CLOVASTUDIO-REQUEST-ID': sessionId } },
  ];
}

describe('GET /sessions', () => {
  it('should return no sessions before any question', async () => {
    const app = createTestApp();

    const res = await app.request('/sessions');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ sessions: [], total_sessions: 0 });
  });

  it('should list sessions with their quiz state', async () => {
    const app = createTestApp();
    await app.request(...ask('session-a', '2024-07-15 삼성전자 종가'));
    await app.request(...ask('session-b', '주식퀴즈'));

    const res = await app.request('/sessions');

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      sessions: Array<Record<string, unknown>>;
      total_sessions: number;
    };
    expect(body.total_sessions).toBe(2);
    expect(body.sessions.map((s) => [s['session_id'], s['quiz_active'], s['quiz_phase']])).toEqual([
      ['session-a', false, 'inactive'],
      ['session-b', true, 'asking'],
    ]);
    expect(body.sessions[0]).toHaveProperty('elapsed_minutes', 0);
    expect(typeof body.sessions[0]['last_activity']).toBe('string');
  });
});
