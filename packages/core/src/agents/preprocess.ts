import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { toIsoDate } from '@market-agent/shared/src/utils/dates.js';
import type {
  BackgroundKnowledge,
  ResolvedStock,
} from '@market-agent/shared/src/types/conversation.types.js';
import type { StockInfo } from '@market-agent/shared/src/types/market.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { MarketDataRepository } from '../repositories/market-data.repository.js';
import type { RouterGraphState, RouterNode } from '../orchestration/router-state.js';

const log = createChildLogger('agent:preprocess');

const ISO_DATE_IN_TEXT = /\d{4}-\d{2}-\d{2}/;
const COMPACT_DATE_IN_TEXT = /(?<!\d)\d{8}(?!\d)/;
const NO_NAMES = new Set(['없음', '', 'none', 'null', '[]']);

export function extractQueryDate(query: string): string | undefined {
  const iso = ISO_DATE_IN_TEXT.exec(query) ?? COMPACT_DATE_IN_TEXT.exec(query);
  return iso ? toIsoDate(iso[0]) : undefined;
}

/** Known names found in the query, in order of appearance; names inside a longer match are dropped. */
export function matchKnownStockNames(query: string, stocks: readonly StockInfo[]): string[] {
  const text = query.toLowerCase();
  const found = stocks
    .map((s) => ({ name: s.name, at: text.indexOf(s.name.toLowerCase()) }))
    .filter((m) => m.at >= 0);
  return found
    .filter(
      (m) =>
        !found.some(
          (other) =>
            other.name.length > m.name.length &&
            other.at <= m.at &&
            other.at + other.name.length >= m.at + m.name.length,
        ),
    )
    .sort((a, b) => a.at - b.at)
    .map((m) => m.name);
}

/** Reads the extractor's answer: a JSON array, a comma list or a single name. */
export function parseExtractedNames(text: string): string[] {
  const trimmed = text.trim();
  if (NO_NAMES.has(trimmed.toLowerCase())) {
    return [];
  }
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim());
      }
    } catch {
      log.debug('Extractor answer is not a JSON array');
    }
  }
  if (trimmed.includes(',')) {
    return trimmed
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name !== '');
  }
  return [trimmed];
}

const EXTRACTION_PROMPT = `You are a company name extractor for Korean stock questions.
List every listed company named in the question, exactly as written.
Answer with a JSON array of names, or 없음 when there is none. Market names such as KOSPI or KOSDAQ are not companies.`;

export interface PreprocessDeps {
  readonly repository: MarketDataRepository;
  readonly llmClient: LlmClient;
}

export function createPreprocessNode(deps: PreprocessDeps): RouterNode {
  const { repository, llmClient } = deps;

  const extractWithModel = async (state: RouterGraphState): Promise<string[]> => {
    try {
      const response = await llmClient.invoke({
        systemPrompt: EXTRACTION_PROMPT,
        userMessage: state.query,
        sessionId: state.sessionId,
        credential: state.credential,
      });
      return parseExtractedNames(response.content);
    } catch (error) {
      log.warn({ err: error, sessionId: state.sessionId }, 'Company name extraction failed');
      return [];
    }
  };

  const build = async (state: RouterGraphState): Promise<BackgroundKnowledge> => {
    const knowledge: {
      queryDate?: string;
      isTradingDate?: boolean;
      stockNames?: readonly string[];
      stocks?: readonly ResolvedStock[];
    } = {};

    const queryDate = extractQueryDate(state.query);
    if (queryDate) {
      knowledge.queryDate = queryDate;
      knowledge.isTradingDate = await repository.hasTradingData(queryDate);
    }

    const known = matchKnownStockNames(state.query, await repository.listStocks());
    const names = known.length > 0 ? known : await extractWithModel(state);
    if (names.length > 0) {
      const resolved: ResolvedStock[] = [];
      for (const name of names) {
        const stock = await repository.findStockByName(name);
        if (stock) {
          resolved.push({ ticker: stock.ticker, name: stock.name });
        }
      }
      knowledge.stockNames = names;
      knowledge.stocks = resolved;
    }
    return knowledge;
  };

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    try {
      const backgroundKnowledge = await build(state);
      log.info(
        {
          sessionId: state.sessionId,
          queryDate: backgroundKnowledge.queryDate,
          stocks: backgroundKnowledge.stocks?.length ?? 0,
        },
        'Preprocessing complete',
      );
      return { backgroundKnowledge };
    } catch (error) {
      log.warn({ err: error, sessionId: state.sessionId }, 'Preprocessing failed, continuing without background');
      return { backgroundKnowledge: {} };
    }
  };
}
