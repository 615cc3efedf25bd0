import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { RouterGraphState, RouterNode } from '../orchestration/router-state.js';
import { formatRetrieval } from './retrieval-formatter.js';

const log = createChildLogger('agent:response-generator');

export const APOLOGY_RESPONSE =
  '죄송합니다. 답변을 생성하는 중 문제가 발생했습니다. 잠시 후 다시 시도해주세요.';

const BASE_PROMPT = `You are a Korean stock market assistant.
Answer the user's question in Korean using only the data provided.
State dates, prices (원), volumes (주) and percentages exactly as given; do not invent numbers.
When the data is empty or retrieval failed, say that the data could not be found and suggest how to rephrase the question.
Do not give investment advice.`;

function clarifiedPrompt(originalQuery: string, clarifiedQuery: string): string {
  return `${BASE_PROMPT}
The user's original question was vague: "${originalQuery}".
It was interpreted as: "${clarifiedQuery}". Briefly mention this interpretation at the start of the answer.`;
}

export interface ResponseGeneratorDeps {
  readonly llmClient: LlmClient;
}

export function createResponseGeneratorNode(deps: ResponseGeneratorDeps): RouterNode {
  const { llmClient } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const retrieval = state.retrieval;
    const data =
      retrieval && retrieval.source !== 'quiz' ? formatRetrieval(retrieval) : 'No data was retrieved.';
    const systemPrompt = state.clarification
      ? clarifiedPrompt(state.clarification.originalQuery, state.clarification.clarifiedQuery)
      : BASE_PROMPT;

    try {
      const result = await llmClient.invoke({
        systemPrompt,
        userMessage: `question: ${state.query}\n\ndata:\n${data}`,
        sessionId: state.sessionId,
        credential: state.credential,
      });
      log.info({ sessionId: state.sessionId, length: result.content.length }, 'Response generated');
      return { response: result.content.trim() };
    } catch (error) {
      log.error({ err: error, sessionId: state.sessionId }, 'Response generation failed');
      return { response: APOLOGY_RESPONSE };
    }
  };
}
