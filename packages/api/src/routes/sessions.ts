import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { SessionStore } from '@market-agent/core/src/session/session-store.js';
import { createRouter, type AppEnv } from '../types.js';
import { SessionListResponseSchema } from '../schemas/responses.js';

const listSessionsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Sessions'],
  summary: 'List active conversation sessions',
  responses: {
    200: {
      description: 'Active sessions with their quiz state',
      content: {
        'application/json': {
          schema: SessionListResponseSchema,
        },
      },
    },
  },
});

export function createSessionRoutes(store: SessionStore): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(listSessionsRoute, async (c) => {
    const summaries = await store.list();

    return c.json(
      {
        sessions: summaries.map((s) => ({
          session_id: s.sessionId,
          quiz_active: s.quizActive,
          quiz_phase: s.quizPhase,
          elapsed_minutes: s.elapsedMinutes,
          last_activity: s.lastActivity,
        })),
        total_sessions: summaries.length,
      },
      200,
    );
  });

  return routes;
}
