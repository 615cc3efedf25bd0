import { describe, it, expect, vi } from 'vitest';
import type { ConversationService } from '@market-agent/core/src/orchestration/conversation-service.js';
import { formatQuizStart } from '@market-agent/core/src/quiz/quiz-messages.js';
import { SAMPLE_QUESTIONS } from '@market-agent/core/src/testing/sample-quiz.js';
import { createTestApp } from '../test-helpers.js';
import { bearerToken } from './agent.js';

function agentRequest(question: string | undefined, headers: Record<string, string> = {}): [string, RequestInit] {
  const query = question === undefined ? '' : `?question=${encodeURIComponent(question)}`;
  return [`/agent${query}`, { headers: { 'X-Request-Id': 'req-1', ...headers } }];
}

const SESSION = { 'X-NCP-CLOVASTUDIO-REQUEST-ID': 'session-1' };

describe('GET /agent', () => {
  it('should answer a question for the session', async () => {
    const app = createTestApp();

    const res = await app.request(...agentRequest('2024-07-15 삼성전자 종가', SESSION));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ answer: 'Mock response' });
  });

  it('should forward the trimmed question and the bearer token', async () => {
    const conversation: ConversationService = {
      handleTurn: vi.fn().mockResolvedValue({ answer: 'ok' }),
    };
    const app = createTestApp({ conversation });

    const res = await app.request(
      ...agentRequest('  NAVER 거래량  ', { ...SESSION, Authorization: 'Bearer test-secret' }),
    );

    expect(res.status).toBe(200);
    expect(conversation.handleTurn).toHaveBeenCalledWith({
      sessionId: 'session-1',
      question: 'NAVER 거래량',
      credential: 'test-secret',
    });
  });

  it('should forward a lower-case bearer token', async () => {
    const conversation: ConversationService = {
      handleTurn: vi.fn().mockResolvedValue({ answer: 'ok' }),
    };
    const app = createTestApp({ conversation });

    await app.request(...agentRequest('NAVER', { ...SESSION, Authorization: 'bearer test-secret' }));

    expect(conversation.handleTurn).toHaveBeenCalledWith({
      sessionId: 'session-1',
      question: 'NAVER',
      credential: 'test-secret',
    });
  });

  it('should run a quiz across requests on the same session', async () => {
    const app = createTestApp();

    const started = await app.request(...agentRequest('주식퀴즈', SESSION));
    expect(await started.json()).toEqual({ answer: formatQuizStart(SAMPLE_QUESTIONS[0]) });

    const answered = await app.request(...agentRequest('1번', SESSION));
    const body = (await answered.json()) as { answer: string };
    expect(body.answer.split('\n')[0]).toBe('🎉 정답입니다! 정답은 ① 삼성전자입니다.');
  });

  it('should reject a missing question', async () => {
    const app = createTestApp();

    const res = await app.request(...agentRequest(undefined, SESSION));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId: 'req-1',
      details: ['question: Required'],
    });
  });

  it('should reject a missing session header', async () => {
    const app = createTestApp();

    const res = await app.request(...agentRequest('삼성전자 종가'));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { code: string; details: string[] };
    expect(body.code).toBe('VALIDATION_ERROR');
    expect(body.details).toEqual(['x-ncp-clovastudio-request-id: Required']);
  });

  it('should report an unexpected failure with its message', async () => {
    const conversation: ConversationService = {
      handleTurn: vi.fn().mockRejectedValue(new Error('router exploded')),
    };
    const app = createTestApp({ conversation });

    const res = await app.request(...agentRequest('삼성전자 종가', SESSION));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'router exploded',
      code: 'INTERNAL_ERROR',
      requestId: 'req-1',
    });
  });
});

describe('bearerToken', () => {
  it('should extract the token from a bearer header', () => {
    expect(bearerToken('Bearer test-secret')).toBe('test-secret');
  });

  it('should match the scheme case-insensitively', () => {
    expect(bearerToken('bearer test-secret')).toBe('test-secret');
    expect(bearerToken('BEARER  test-secret ')).toBe('test-secret');
  });

  it('should ignore other schemes and empty tokens', () => {
    expect(bearerToken('Basic dXNlcg==')).toBeUndefined();
    expect(bearerToken('Bearer   ')).toBeUndefined();
    expect(bearerToken(undefined)).toBeUndefined();
  });
});
