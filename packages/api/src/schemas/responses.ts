import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

export const AgentResponseSchema = z
  .object({
    answer: z.string(),
  })
  .openapi('AgentResponse');

export const SessionSummarySchema = z
  .object({
    session_id: z.string(),
    quiz_active: z.boolean(),
    quiz_phase: z.enum(['inactive', 'asking', 'processing', 'completed']),
    elapsed_minutes: z.number(),
    last_activity: z.string(),
  })
  .openapi('SessionSummary');

export const SessionListResponseSchema = z
  .object({
    sessions: z.array(SessionSummarySchema),
    total_sessions: z.number(),
  })
  .openapi('SessionListResponse');
