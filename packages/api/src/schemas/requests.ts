import { z } from '@hono/zod-openapi';

export const SESSION_HEADER = 'x-ncp-clovastudio-request-id';

export const AgentQuerySchema = z.object({
  question: z
    .string()
    .trim()
    .min(1)
    .openapi({ description: 'Question in natural language', example: '2024-07-15 삼성전자 종가는?' }),
});

// Header names arrive lower-cased.
export const AgentHeadersSchema = z.object({
  [SESSION_HEADER]: z
    .string()
    .trim()
    .min(1)
    .openapi({ description: 'Conversation session id', example: 'session-1' }),
  authorization: z
    .string()
    .optional()
    .openapi({ description: 'Bearer token forwarded to the completion service' }),
});
