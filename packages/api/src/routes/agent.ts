import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono, RouteConfig } from '@hono/zod-openapi';
import type { ConversationService } from '@market-agent/core/src/orchestration/conversation-service.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { AgentHeadersSchema, AgentQuerySchema, SESSION_HEADER } from '../schemas/requests.js';
import { AgentResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';

const log = createChildLogger('api:agent');

const agentSecurity: RouteConfig['security'] = [{ Bearer: [] }, {}];

const agentRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Agent'],
  summary: 'Ask the market agent a question',
  description:
    'Runs one conversation turn for the session named in the X-NCP-CLOVASTUDIO-REQUEST-ID header. ' +
    'Stock quiz turns go through the same endpoint.',
  security: agentSecurity,
  request: {
    query: AgentQuerySchema,
    headers: AgentHeadersSchema,
  },
  responses: {
    200: {
      description: 'Answer text',
      content: {
        'application/json': {
          schema: AgentResponseSchema,
        },
      },
    },
    400: {
      description: 'Missing question or session header',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    500: {
      description: 'Unexpected failure',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const BEARER_PATTERN = /^bearer\s+(.+)$/i;

/** The auth scheme is case-insensitive. */
export function bearerToken(header: string | undefined): string | undefined {
  const match = header ? BEARER_PATTERN.exec(header.trim()) : null;
  const token = match?.[1]?.trim();
  return token || undefined;
}

export function createAgentRoutes(conversation: ConversationService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(agentRoute, async (c) => {
    const { question } = c.req.valid('query');
    const headers = c.req.valid('header');
    const sessionId = headers[SESSION_HEADER];
    const credential = bearerToken(headers.authorization);

    log.info(
      { requestId: c.get('requestId'), sessionId, hasCredential: credential !== undefined },
      'Agent question received',
    );

    const { answer } = await conversation.handleTurn({ sessionId, question, credential });
    return c.json({ answer }, 200);
  });

  return routes;
}
