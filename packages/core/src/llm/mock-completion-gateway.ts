import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { CompletionGateway, CompletionRequest, CompletionResult } from './completion-gateway.js';

const log = createChildLogger('llm:mock-gateway');

const DATE_PATTERN = /\d{4}-?\d{2}-?\d{2}/;

function createMockContent(systemPrompt: string, userMessage: string): string {
  const prompt = systemPrompt.toLowerCase();

  if (prompt.includes('query classifier')) {
    if (DATE_PATTERN.test(userMessage)) {
      return 'fetch_stock_data';
    }
    return prompt.includes('ambiguous_query') ? 'ambiguous_query' : 'fetch_stock_data';
  }

  if (prompt.includes('completeness analyst')) {
    return JSON.stringify({
      hasStockName: false,
      hasSpecificDate: false,
      hasRelativeTime: false,
      hasMetrics: false,
      hasConditions: false,
      missingInformationType: 'NONE',
      informationCompleteness: 'AMBIGUOUS',
    });
  }

  if (prompt.includes('query rewriter')) {
    return JSON.stringify({ clarifiedQuery: userMessage, marketScope: 'ALL' });
  }

  if (prompt.includes('company name extractor')) {
    return '없음';
  }

  if (prompt.includes('quiz answer checker')) {
    return JSON.stringify({ isCorrect: false, confidence: 50, reason: 'Mock checker' });
  }

  if (prompt.includes('news search keyword writer')) {
    return '산업, 시장, 기술';
  }

  if (prompt.includes('company insight writer')) {
    return '업계를 대표하는 기업으로 주요 사업의 업황과 실적 발표가 주가에 큰 영향을 줍니다.';
  }

  if (prompt.includes('quiz hint writer') || prompt.includes('news keyword extractor')) {
    return '키워드: 관련 정보, 배경지식, 참고자료';
  }

  return 'Mock response';
}

/**
 * Deterministic stand-in for the completion service, used for local runs
 * without credentials. Tool rounds are always answered directly.
 */
export function createMockCompletionGateway(): CompletionGateway {
  log.info('Using mock completion gateway');

  return {
    complete(request: CompletionRequest): Promise<CompletionResult> {
      const systemPrompt = request.messages.find((m) => m.role === 'system')?.content ?? '';
      const userMessage = request.messages.filter((m) => m.role === 'user').at(-1)?.content ?? '';

      log.debug(
        { sessionId: request.sessionId, toolCount: request.tools?.length ?? 0 },
        'Mock completion',
      );

      if (request.tools && request.tools.length > 0) {
        return Promise.resolve({
          ok: true,
          message: { content: 'Mock answer without tool calls' },
        });
      }

      return Promise.resolve({
        ok: true,
        message: { content: createMockContent(systemPrompt, userMessage) },
      });
    },
  };
}
