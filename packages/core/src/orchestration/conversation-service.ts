import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { beginTurn } from '../session/conversation-state.js';
import type { SessionStore } from '../session/session-store.js';
import type { QueryRouter } from './router.js';

const log = createChildLogger('orchestration:conversation');

export interface TurnRequest {
  readonly sessionId: string;
  readonly question: string;
  readonly credential?: string;
}

export interface TurnResponse {
  readonly answer: string;
}

export interface ConversationService {
  handleTurn(request: TurnRequest): Promise<TurnResponse>;
}

/**
 * One turn per call, serialised per session. The credential is used for the
 * turn only and is not kept in the stored state.
 */
export function createConversationService(
  store: SessionStore,
  router: QueryRouter,
): ConversationService {
  return {
    async handleTurn(request: TurnRequest): Promise<TurnResponse> {
      const startedAt = Date.now();

      const answer = await store.withSession(request.sessionId, async (stored) => {
        const state = await router.run(beginTurn(stored, request.question, request.credential));
        return { state: { ...state, credential: undefined }, value: state.response };
      });

      log.info(
        { sessionId: request.sessionId, durationMs: Date.now() - startedAt },
        'Turn complete',
      );
      return { answer };
    },
  };
}
