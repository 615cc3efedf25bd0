import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ConversationService } from '@market-agent/core/src/orchestration/conversation-service.js';
import type { SessionStore } from '@market-agent/core/src/session/session-store.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, health } from './routes/health.js';
import { createAgentRoutes } from './routes/agent.js';
import { createSessionRoutes } from './routes/sessions.js';

const log = createChildLogger('api:server');

export interface AppDeps {
  readonly conversation: ConversationService;
  readonly sessionStore: SessionStore;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);
  app.route('/agent', createAgentRoutes(deps.conversation));
  app.route('/sessions', createSessionRoutes(deps.sessionStore));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Market Agent API',
        version: API_VERSION,
        description: 'Conversational agent for KOSPI and KOSDAQ market data with a stock quiz',
      },
    });
    spec.components = {
      ...spec.components,
      securitySchemes: {
        Bearer: {
          type: 'http',
          scheme: 'bearer',
        },
      },
    };
    return c.json(spec);
  });

  return app;
}
