import { describe, it, expect, vi } from 'vitest';
import type { LlmClient } from '../llm/llm-client.js';
import { createInMemoryMarketDataRepository } from '../repositories/in-memory-market-data.repository.js';
import { SAMPLE_MARKET_DATA, SAMPLE_STOCKS } from '../testing/sample-market-data.js';
import { createRouterState } from '../testing/router-state.js';
import {
  createPreprocessNode,
  extractQueryDate,
  matchKnownStockNames,
  parseExtractedNames,
} from './preprocess.js';

function llm(content: string): LlmClient {
  return { invoke: vi.fn().mockResolvedValue({ content }) };
}

describe('extractQueryDate', () => {
  it('should read ISO and compact dates', () => {
    expect(extractQueryDate('2024-07-15 삼성전자 종가')).toBe('2024-07-15');
    expect(extractQueryDate('20240715 삼성전자 종가')).toBe('2024-07-15');
  });

  it('should ignore impossible dates and longer digit runs', () => {
    expect(extractQueryDate('2024-02-30 종가')).toBeUndefined();
    expect(extractQueryDate('주문번호 1234567890')).toBeUndefined();
    expect(extractQueryDate('어제 종가')).toBeUndefined();
  });
});

describe('matchKnownStockNames', () => {
  it('should return names in order of appearance', () => {
    expect(matchKnownStockNames('NAVER와 삼성전자 비교', SAMPLE_STOCKS)).toEqual(['NAVER', '삼성전자']);
  });

  it('should match names case-insensitively', () => {
    expect(matchKnownStockNames('naver 종가', SAMPLE_STOCKS)).toEqual(['NAVER']);
  });

  it('should drop a name contained in a longer match', () => {
    const stocks = [
      ...SAMPLE_STOCKS,
      { ticker: '005935', name: '삼성전자우', market: 'KOSPI' as const },
    ];
    expect(matchKnownStockNames('삼성전자우 종가', stocks)).toEqual(['삼성전자우']);
  });
});

describe('parseExtractedNames', () => {
  it.each(['없음', '', 'None', 'null', '[]'])('should treat %s as no names', (text) => {
    expect(parseExtractedNames(text)).toEqual([]);
  });

  it('should parse JSON arrays, comma lists and single names', () => {
    expect(parseExtractedNames('["카카오", "LG전자"]')).toEqual(['카카오', 'LG전자']);
    expect(parseExtractedNames('카카오, LG전자')).toEqual(['카카오', 'LG전자']);
    expect(parseExtractedNames(' 카카오 ')).toEqual(['카카오']);
  });
});

describe('preprocess node', () => {
  const repository = createInMemoryMarketDataRepository(SAMPLE_MARKET_DATA);

  it('should record the date, trading status and resolved stocks', async () => {
    const client = llm('없음');
    const node = createPreprocessNode({ repository, llmClient: client });

    const update = await node(createRouterState({ query: '2024-07-15 삼성전자와 NAVER 종가 비교' }));

    expect(update.backgroundKnowledge).toEqual({
      queryDate: '2024-07-15',
      isTradingDate: true,
      stockNames: ['삼성전자', 'NAVER'],
      stocks: [
        { ticker: '005930', name: '삼성전자' },
        { ticker: '035420', name: 'NAVER' },
      ],
    });
    expect(client.invoke).not.toHaveBeenCalled();
  });

  it('should flag non-trading dates', async () => {
    const node = createPreprocessNode({ repository, llmClient: llm('없음') });

    const update = await node(createRouterState({ query: '2024-07-13 시장 요약' }));

    expect(update.backgroundKnowledge).toEqual({ queryDate: '2024-07-13', isTradingDate: false });
  });

  it('should ask the model when no known name appears and keep unresolved names', async () => {
    const client = llm('["하이닉스", "카카오"]');
    const node = createPreprocessNode({ repository, llmClient: client });

    const update = await node(createRouterState({ query: '하이닉스랑 카카오 비교' }));

    expect(update.backgroundKnowledge).toEqual({
      stockNames: ['하이닉스', '카카오'],
      stocks: [{ ticker: '000660', name: 'SK하이닉스' }],
    });
  });

  it('should continue with empty background when the repository fails', async () => {
    const failing = {
      ...repository,
      listStocks: vi.fn().mockRejectedValue(new Error('unavailable')),
    };
    const node = createPreprocessNode({ repository: failing, llmClient: llm('없음') });

    expect(await node(createRouterState({ query: '삼성전자 종가' }))).toEqual({ backgroundKnowledge: {} });
  });
});
