import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@market-agent/shared/src/utils/errors.js';
import { validateAgentConfig, validateQuizBank } from './validators.js';
import type { AgentConfig } from './agent-config.schema.js';
import type { QuizBank } from './quiz-bank.schema.js';

export const DEFAULT_QUIZ_BANK_PATH = fileURLToPath(
  new URL('../../../data/quiz-bank.json', import.meta.url),
);

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadQuizBank(filePath: string = DEFAULT_QUIZ_BANK_PATH): Promise<QuizBank> {
  const raw = await readJsonFile(filePath);
  return validateQuizBank(raw);
}

/**
 * Builds the runtime configuration from environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  return validateAgentConfig({
    port: env['PORT'],
    mockLlm: env['MARKET_AGENT_MOCK_LLM'],
    storage: env['MARKET_AGENT_STORAGE'],
    gcpProjectId: env['MARKET_AGENT_GCP_PROJECT_ID'] ?? env['GCP_PROJECT_ID'],
    completion: {
      url: env['COMPLETION_API_URL'],
      apiKey: env['COMPLETION_API_KEY'],
      timeoutMs: env['COMPLETION_TIMEOUT_MS'],
      temperature: env['COMPLETION_TEMPERATURE'],
      maxTokens: env['COMPLETION_MAX_TOKENS'],
    },
    session: {
      idleTimeoutMinutes: env['SESSION_IDLE_TIMEOUT_MINUTES'],
      capacity: env['SESSION_CAPACITY'],
    },
    quizBankPath: env['QUIZ_BANK_PATH'],
    news: {
      clientId: env['NAVER_CLIENT_ID'],
      clientSecret: env['NAVER_CLIENT_SECRET'],
    },
  });
}
