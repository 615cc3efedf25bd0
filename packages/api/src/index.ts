import { serve } from '@hono/node-server';
import type { AgentConfig } from '@market-agent/schemas/src/agent-config.schema.js';
import { loadAgentConfig, loadQuizBank } from '@market-agent/schemas/src/config-loader.js';
import { createFirestoreClient } from '@market-agent/core/src/infrastructure/firestore-client.js';
import { createFirestoreMarketDataRepository } from '@market-agent/core/src/infrastructure/firestore-market-data.repository.js';
import { createFirestoreQuizHistoryRepository } from '@market-agent/core/src/infrastructure/firestore-quiz-history.repository.js';
import { createCompletionGateway } from '@market-agent/core/src/llm/completion-gateway.js';
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
import {
  createDisabledNewsClient,
  createNaverNewsClient,
} from '@market-agent/core/src/services/news-search/naver-news-client.js';
import type { NewsSearchClient } from '@market-agent/core/src/services/news-search/types.js';
import { createInMemorySessionStore } from '@market-agent/core/src/session/in-memory-session-store.js';
import { SAMPLE_MARKET_DATA } from '@market-agent/core/src/testing/sample-market-data.js';
import { createMarketToolRegistries } from '@market-agent/core/src/tools/market/market-tools.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

const SWEEP_INTERVAL_MS = 60 * 1000;

function createNewsClient(config: AgentConfig): NewsSearchClient {
  if (config.mockLlm) {
    return createMockNewsClient();
  }
  const { clientId, clientSecret } = config.news;
  if (clientId && clientSecret) {
    return createNaverNewsClient({ clientId, clientSecret });
  }
  log.warn('Naver credentials not set, news hints disabled');
  return createDisabledNewsClient();
}

async function main(): Promise<void> {
  const config = loadAgentConfig();

  const gateway = config.mockLlm
    ? createMockCompletionGateway()
    : createCompletionGateway({
        url: config.completion.url,
        apiKey: config.completion.apiKey,
        timeoutMs: config.completion.timeoutMs,
        temperature: config.completion.temperature,
        maxTokens: config.completion.maxTokens,
      });
  const llmClient = createLlmClient(gateway);

  const db = config.storage === 'firestore' ? createFirestoreClient(config.gcpProjectId) : undefined;
  const repository = db
    ? createFirestoreMarketDataRepository(db)
    : createInMemoryMarketDataRepository(SAMPLE_MARKET_DATA);
  const history = db ? createFirestoreQuizHistoryRepository(db) : createInMemoryQuizHistoryRepository();

  const bank = await loadQuizBank(config.quizBankPath);
  const idleTimeoutMs = config.session.idleTimeoutMinutes * 60 * 1000;

  const quizEngine = createQuizEngine({
    bank: createQuizBankService(bank.questions, history),
    checker: createAnswerChecker(llmClient),
    hints: createHintProvider(llmClient, createNewsClient(config)),
    rewards: createRewardCalculator(repository),
    insight: createCompanyInsightWriter(llmClient),
    history,
    quizTimeoutMs: idleTimeoutMs,
  });

  const router = createQueryRouter({
    gateway,
    llmClient,
    repository,
    registries: createMarketToolRegistries(repository),
    quizEngine,
  });

  const sessionStore = createInMemorySessionStore({
    idleTimeoutMs,
    capacity: config.session.capacity,
  });

  const sweepTimer = setInterval(() => {
    sessionStore.sweep().catch((error: unknown) => {
      log.error({ err: error }, 'Session sweep failed');
    });
  }, SWEEP_INTERVAL_MS);
  sweepTimer.unref();

  const app = createApp({
    conversation: createConversationService(sessionStore, router),
    sessionStore,
  });

  log.info(
    { port: config.port, storage: config.storage, mockLlm: config.mockLlm, questions: bank.questions.length },
    'Starting market agent API server',
  );

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'Market agent API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
