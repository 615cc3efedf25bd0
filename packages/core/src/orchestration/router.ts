import { StateGraph, START, END } from '@langchain/langgraph';
import type { ConversationState } from '@market-agent/shared/src/types/conversation.types.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { kstDate } from '@market-agent/shared/src/utils/dates.js';
import type { CompletionGateway } from '../llm/completion-gateway.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { MarketDataRepository } from '../repositories/market-data.repository.js';
import type { MarketToolRegistries } from '../tools/market/market-tools.js';
import type { QuizEngine } from '../quiz/quiz-engine.js';
import { createPreprocessNode } from '../agents/preprocess.js';
import { createClassifierNode } from '../agents/classifier.js';
import {
  createAmbiguousNode,
  createAskUserNode,
  createSelfClarifyNode,
} from '../agents/clarification.js';
import { createDataRetrievalNode } from '../agents/data-retrieval.js';
import { createResponseGeneratorNode } from '../agents/response-generator.js';
import { createQuizNode, createQuizResponseNode } from '../agents/quiz-response.js';
import { RouterGraphAnnotation, type RouterGraphState } from './router-state.js';

const log = createChildLogger('orchestration:router');

export interface QueryRouterConfig {
  readonly gateway: CompletionGateway;
  readonly llmClient: LlmClient;
  readonly repository: MarketDataRepository;
  readonly registries: MarketToolRegistries;
  readonly quizEngine: QuizEngine;
  readonly now?: () => number;
}

export interface QueryRouter {
  /** Runs one turn from preprocessing to the answer; returns the updated state. */
  run(state: ConversationState): Promise<ConversationState>;
}

function routeAfterClassify(state: RouterGraphState): string {
  switch (state.category) {
    case 'quiz':
      return 'quiz';
    case 'conditional':
      return 'conditional';
    case 'signal':
      return 'signal';
    case 'ambiguous':
      return 'ambiguous';
    default:
      return 'fetch';
  }
}

function routeAfterAmbiguous(state: RouterGraphState): string {
  return state.clarificationDecision === 'askUser' ? 'askUser' : 'selfClarify';
}

export function createQueryRouter(config: QueryRouterConfig): QueryRouter {
  const now = config.now ?? Date.now;
  const llmDeps = { llmClient: config.llmClient };

  const graph = new StateGraph(RouterGraphAnnotation)
    .addNode('preprocess', createPreprocessNode({ repository: config.repository, llmClient: config.llmClient }))
    .addNode('classify', createClassifierNode(llmDeps))
    .addNode('ambiguous', createAmbiguousNode(llmDeps))
    .addNode('askUser', createAskUserNode(llmDeps))
    .addNode('selfClarify', createSelfClarifyNode(llmDeps))
    .addNode('fetch', createDataRetrievalNode('fetch', { gateway: config.gateway, registry: config.registries.fetch }))
    .addNode(
      'conditional',
      createDataRetrievalNode('conditional', { gateway: config.gateway, registry: config.registries.conditional }),
    )
    .addNode('signal', createDataRetrievalNode('signal', { gateway: config.gateway, registry: config.registries.signal }))
    .addNode('quiz', createQuizNode({ engine: config.quizEngine, now }))
    .addNode('quizResponse', createQuizResponseNode())
    .addNode('generateResponse', createResponseGeneratorNode(llmDeps))
    .addEdge(START, 'preprocess')
    .addEdge('preprocess', 'classify')
    .addConditionalEdges('classify', routeAfterClassify, {
      fetch: 'fetch',
      conditional: 'conditional',
      signal: 'signal',
      quiz: 'quiz',
      ambiguous: 'ambiguous',
    })
    .addConditionalEdges('ambiguous', routeAfterAmbiguous, {
      askUser: 'askUser',
      selfClarify: 'selfClarify',
    })
    .addEdge('askUser', END)
    .addEdge('selfClarify', 'classify')
    .addEdge('fetch', 'generateResponse')
    .addEdge('conditional', 'generateResponse')
    .addEdge('signal', 'generateResponse')
    .addEdge('quiz', 'quizResponse')
    .addEdge('quizResponse', END)
    .addEdge('generateResponse', END)
    .compile();

  return {
    async run(state: ConversationState): Promise<ConversationState> {
      log.info({ sessionId: state.sessionId }, 'Routing query');

      const result = await graph.invoke({
        sessionId: state.sessionId,
        query: state.query,
        credential: state.credential,
        today: kstDate(now()),
        category: undefined,
        backgroundKnowledge: {},
        completeness: undefined,
        clarificationDecision: undefined,
        clarification: undefined,
        clarificationPasses: 0,
        retrieval: undefined,
        response: '',
        quizSession: state.quiz,
      });

      log.info({ sessionId: state.sessionId, category: result.category }, 'Routing complete');

      return {
        sessionId: state.sessionId,
        query: result.query,
        category: result.category,
        backgroundKnowledge: result.backgroundKnowledge,
        retrieval: result.retrieval,
        response: result.response,
        clarification: result.clarification,
        credential: state.credential,
        quiz: result.quizSession,
      };
    },
  };
}
