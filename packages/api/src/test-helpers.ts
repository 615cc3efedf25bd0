import type { OpenAPIHono } from '@hono/zod-openapi';
import { createLlmClient } from '@market-agent/core/src/llm/llm-client.js';
import { createMockCompletionGateway } from '@market-agent/core/src/llm/mock-completion-gateway.js';
import { createConversationService } from '@market-agent/core/src/orchestration/conversation-service.js';
import { createQueryRouter } from '@market-agent/core/src/orchestration/router.js';
import { createAnswerChecker } from '@market-agent/core/src/quiz/answer-checker.js';
import { createCompanyInsightWriter } from '@market-agent/core/src/quiz/company-insight.js';
import { createHintProvider } from '@market-agent/core/src/quiz/hint-provider.js';
import { createQuizBankService } from '@market-agent/core/src/quiz/quiz-bank.js';
import { createQuizEngine } from '@market-agent/core/src/quiz/quiz-engine.js';
import { createRewardCalculator } from '@market-agent/core/src/quiz/reward-calculator.js';
import { createInMemoryMarketDataRepository } from '@market-agent/core/src/repositories/in-memory-market-data.repository.js';
import { createInMemoryQuizHistoryRepository } from '@market-agent/core/src/repositories/in-memory-quiz-history.repository.js';
import { createMockNewsClient } from '@market-agent/core/src/services/news-search/mock-news-client.js';
import { createInMemorySessionStore } from '@market-agent/core/src/session/in-memory-session-store.js';
import type { SessionStore } from '@market-agent/core/src/session/session-store.js';
import { SAMPLE_MARKET_DATA } from '@market-agent/core/src/testing/sample-market-data.js';
import { SAMPLE_QUESTIONS } from '@market-agent/core/src/testing/sample-quiz.js';
import { createMarketToolRegistries } from '@market-agent/core/src/tools/market/market-tools.js';
import type { ConversationService } from '@market-agent/core/src/orchestration/conversation-service.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export interface TestAppOptions {
  readonly conversation?: ConversationService;
  readonly sessionStore?: SessionStore;
}

/**
 * Creates an app over the mock completion gateway, in-memory repositories
 * and the sample market data. For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): OpenAPIHono<AppEnv> {
  const sessionStore = options.sessionStore ?? createInMemorySessionStore();
  if (options.conversation) {
    return createApp({ conversation: options.conversation, sessionStore });
  }

  const gateway = createMockCompletionGateway();
  const llmClient = createLlmClient(gateway);
  const repository = createInMemoryMarketDataRepository(SAMPLE_MARKET_DATA);
  const history = createInMemoryQuizHistoryRepository();
  const quizEngine = createQuizEngine({
    bank: createQuizBankService(SAMPLE_QUESTIONS, history, () => 0),
    checker: createAnswerChecker(llmClient),
    hints: createHintProvider(llmClient, createMockNewsClient()),
    rewards: createRewardCalculator(repository),
    insight: createCompanyInsightWriter(llmClient),
    history,
  });
  const router = createQueryRouter({
    gateway,
    llmClient,
    repository,
    registries: createMarketToolRegistries(repository),
    quizEngine,
  });

  return createApp({ conversation: createConversationService(sessionStore, router), sessionStore });
}
