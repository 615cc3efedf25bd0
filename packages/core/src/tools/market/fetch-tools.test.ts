import { describe, it, expect } from 'vitest';
import { createInMemoryMarketDataRepository } from '../../repositories/in-memory-market-data.repository.js';
import { SAMPLE_MARKET_DATA } from '../../testing/sample-market-data.js';
import { createToolRegistry, isRecord } from '../tool-registry.js';
import { createFetchTools } from './fetch-tools.js';

function setup() {
  return createToolRegistry(createFetchTools(createInMemoryMarketDataRepository(SAMPLE_MARKET_DATA)));
}

async function call(name: string, args: Record<string, unknown>) {
  return setup().invoke({ id: 'call_0', name, arguments: args });
}

function payload(result: unknown): Record<string, unknown> {
  if (!isRecord(result)) {
    throw new Error('expected an object payload');
  }
  return result;
}

describe('fetch tools', () => {
  it('should return history for a suffixed ticker and a compact start date', async () => {
    const result = await call('get_historical_data', {
      ticker: '005930.KS',
      start_date: '20240711',
      end_date: '2024-07-12',
    });

    expect(result.success).toBe(true);
    const body = payload(result.result);
    expect(body['name']).toBe('삼성전자');
    expect(body['count']).toBe(2);
    expect(body['startDate']).toBe('2024-07-11');
  });

  it('should fail for an unknown stock', async () => {
    const result = await call('get_historical_data', { ticker: '999999', start_date: '2024-07-15' });
    expect(result.success).toBe(false);
    expect(result.result).toBe('Unknown stock: 999999');
  });

  it('should fail when the range has no bars', async () => {
    const result = await call('get_historical_data', { ticker: '005930', start_date: '2024-07-13' });
    expect(result.success).toBe(false);
    expect(result.result).toBe('No historical data found for 005930 on 2024-07-13');
  });

  it('should return both index bars for ALL', async () => {
    const result = await call('get_market_ohlcv', { market: 'ALL', date: '2024-07-15' });
    const results = payload(result.result)['results'];
    expect(Array.isArray(results) ? results.map((r: { close: number }) => r.close) : []).toEqual([2860, 860]);
  });

  it('should rank a stock by change rate within its market', async () => {
    const result = await call('get_stock_ranking', {
      ticker: 'NAVER',
      date: '2024-07-15',
      rank_by: 'change_rate',
    });

    expect(payload(result.result)).toMatchObject({
      stockName: 'NAVER',
      rank: 2,
      totalStocks: 4,
      value: 3.55,
      percentage: 50,
    });
  });

  it('should summarise the highest and lowest stock per metric', async () => {
    const result = await call('get_stock_comparison', {
      tickers: ['005930', '000660'],
      date: '2024-07-15',
      compare_by: ['volume'],
    });

    expect(payload(result.result)['comparisonSummary']).toMatchObject({
      volume: {
        highest: { name: '삼성전자', value: 2_000_000 },
        lowest: { name: 'SK하이닉스', value: 900_000 },
      },
    });
  });

  it('should compare volume with the market average', async () => {
    const result = await call('get_market_average_comparison', {
      ticker: '005930',
      date: '2024-07-15',
      compare_by: 'volume',
    });

    expect(payload(result.result)).toMatchObject({
      stockValue: 2_000_000,
      marketAverage: 1_150_000,
      difference: 850_000,
      percentageDifference: 73.91,
      isHigherThanAverage: true,
      totalStocksInMarket: 4,
    });
  });

  it('should compute the share of market volume', async () => {
    const result = await call('get_market_ratio', {
      ticker: '삼성전자',
      date: '2024-07-15',
      market: 'KOSPI',
    });

    expect(payload(result.result)).toMatchObject({
      marketTotal: 3_100_000,
      ratioPercentage: 64.52,
      totalStocksInMarket: 3,
    });
  });

  it('should require ticker and start_date in the declaration', () => {
    const declaration = setup()
      .declarations()
      .find((d) => d.function.name === 'get_historical_data');
    expect(declaration?.function.parameters['required']).toEqual(['ticker', 'start_date']);
  });
});
