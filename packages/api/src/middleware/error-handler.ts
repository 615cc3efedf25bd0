import type { Context } from 'hono';
import { ZodError } from 'zod';
import { MarketAgentError } from '@market-agent/shared/src/utils/errors.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof MarketAgentError) {
    log.error({ requestId, code: err.code, error: err.message }, 'Agent failure');
  } else {
    log.error({ requestId, err }, 'Unhandled error');
  }

  const body: ErrorResponse = {
    error: err.message || 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
