import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { QueryCategory } from '@market-agent/shared/src/types/conversation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import { isActiveQuiz } from '../quiz/quiz-phase.js';
import type { RouterGraphState, RouterNode } from '../orchestration/router-state.js';

const log = createChildLogger('agent:classifier');

export const MAX_CLARIFICATION_PASSES = 1;

export const QUIZ_TRIGGERS: readonly string[] = ['퀴즈도전', '주식퀴즈', '퀴즈 시작'];

const CATEGORY_TOKENS: ReadonlyArray<readonly [string, QueryCategory]> = [
  ['fetch_stock_data', 'fetch'],
  ['conditional_stock_data', 'conditional'],
  ['signal_stock_data', 'signal'],
  ['ambiguous_query', 'ambiguous'],
];

const ALL_CATEGORIES: readonly QueryCategory[] = ['fetch', 'conditional', 'signal', 'ambiguous'];
const CLARIFIED_CATEGORIES: readonly QueryCategory[] = ['fetch', 'conditional', 'signal'];

/**
 * Finds a category token in the model's answer: exact match first, then the
 * earliest token appearing as a whole word, then plain containment.
 */
export function parseCategory(
  response: string,
  allowed: readonly QueryCategory[] = ALL_CATEGORIES,
): QueryCategory | undefined {
  const text = response.trim().toLowerCase();
  if (!text) {
    return undefined;
  }
  const tokens = CATEGORY_TOKENS.filter(([, category]) => allowed.includes(category));

  const exact = tokens.find(([token]) => token === text);
  if (exact) {
    return exact[1];
  }

  const asWords = tokens
    .map(([token, category]) => ({ category, at: text.search(new RegExp(`\\b${token}\\b`)) }))
    .filter((m) => m.at >= 0)
    .sort((a, b) => a.at - b.at);
  if (asWords.length > 0) {
    return asWords[0].category;
  }

  return tokens.find(([token]) => text.includes(token))?.[1];
}

export function isQuizTrigger(query: string): boolean {
  return QUIZ_TRIGGERS.some((trigger) => query.includes(trigger));
}

const CATEGORY_GUIDE = `- fetch_stock_data: one stock's data on a single day, KOSPI/KOSDAQ index or market summary on a day, comparing several named stocks (close, volume, change rate), a stock against the market average, a stock's volume rank or share of market volume.
- conditional_stock_data: screening stocks on a date or period by price, volume, change rate, volume change versus the previous day, or the N most expensive stocks.
- signal_stock_data: screening by technical indicators: RSI, Bollinger bands, golden/dead cross, moving averages, volume moving average, "compared with the N-day average".`;

const AMBIGUOUS_GUIDE = `- ambiguous_query: the question cannot be answered as asked. Use it when a date is given but no stock or condition, when only relative time ("yesterday", "recently") is given, when a condition has no date or period, or when the question is vague ("any good stocks lately?").`;

const EXAMPLES = `Examples:
- "2025-06-26 KOSPI 시장에 거래된 종목 수는?" -> fetch_stock_data
- "2024-12-04 삼성전자와 LG전자 중 종가가 더 높은 종목은?" -> fetch_stock_data
- "2025-02-03에 셀트리온의 거래량 순위는?" -> fetch_stock_data
- "2025-03-03 KOSDAQ 시장에서 가장 가격이 높은 종목 3개를 알려줘" -> conditional_stock_data
- "2025-06-13에 등락률이 +7% 이상이면서 거래량이 전날대비 300% 이상 증가한 종목" -> conditional_stock_data
- "2025-01-20 RSI가 70 이상인 과매수 종목을 알려줘" -> signal_stock_data`;

function buildSystemPrompt(clarified: boolean): string {
  const guide = clarified ? CATEGORY_GUIDE : `${CATEGORY_GUIDE}\n${AMBIGUOUS_GUIDE}`;
  const intro = clarified
    ? 'You are a query classifier for Korean stock market questions that were already made specific.'
    : 'You are a query classifier for Korean stock market questions.';
  return `${intro}
Choose exactly one category and answer with its name only, no explanation.

${guide}

${EXAMPLES}`;
}

export interface ClassifierDeps {
  readonly llmClient: LlmClient;
}

export function createClassifierNode(deps: ClassifierDeps): RouterNode {
  const { llmClient } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    if (isActiveQuiz(state.quizSession) || isQuizTrigger(state.query)) {
      log.info({ sessionId: state.sessionId }, 'Routing to quiz');
      return { category: 'quiz' };
    }

    const clarified = state.clarification !== undefined;
    const allowed = clarified ? CLARIFIED_CATEGORIES : ALL_CATEGORIES;
    const fallback: QueryCategory = clarified ? 'fetch' : 'ambiguous';

    let category: QueryCategory;
    try {
      const response = await llmClient.invoke({
        systemPrompt: buildSystemPrompt(clarified),
        userMessage: `question: ${state.query}\nbackground_knowledge: ${JSON.stringify(state.backgroundKnowledge)}`,
        sessionId: state.sessionId,
        credential: state.credential,
      });
      const parsed = parseCategory(response.content, allowed);
      if (!parsed) {
        log.warn({ sessionId: state.sessionId, fallback }, 'Unrecognised category answer');
      }
      category = parsed ?? fallback;
    } catch (error) {
      log.error({ err: error, sessionId: state.sessionId, fallback }, 'Classification failed');
      category = fallback;
    }

    if (category === 'ambiguous' && state.clarificationPasses >= MAX_CLARIFICATION_PASSES) {
      category = 'fetch';
    }

    log.info(
      { sessionId: state.sessionId, category, clarified, passes: state.clarificationPasses },
      'Classification complete',
    );
    return { category };
  };
}
