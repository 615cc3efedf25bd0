import { describe, it, expect } from 'vitest';
import { createInMemoryMarketDataRepository } from './in-memory-market-data.repository.js';
import { SAMPLE_MARKET_DATA } from '../testing/sample-market-data.js';

describe('InMemoryMarketDataRepository', () => {
  const repo = createInMemoryMarketDataRepository(SAMPLE_MARKET_DATA);

  it('should list stocks filtered by market', async () => {
    const kosdaq = await repo.listStocks('KOSDAQ');
    expect(kosdaq.map((s) => s.name)).toEqual(['에코프로비엠']);
    expect(await repo.listStocks()).toHaveLength(4);
  });

  it('should prefer an exact name match over containment', async () => {
    expect((await repo.findStockByName('NAVER'))?.ticker).toBe('035420');
    expect((await repo.findStockByName('하이닉스'))?.ticker).toBe('000660');
    expect(await repo.findStockByName('   ')).toBeNull();
  });

  it('should return stock bars inside an inclusive range', async () => {
    const bars = await repo.getStockBars('005930', {
      startDate: '2024-07-11',
      endDate: '2024-07-12',
    });
    expect(bars.map((b) => b.close)).toEqual([88000, 86000]);
  });

  it('should order market bars by date then ticker', async () => {
    const bars = await repo.getMarketBars(
      { startDate: '2024-07-15', endDate: '2024-07-15' },
      'KOSPI',
    );
    expect(bars.map((b) => b.ticker)).toEqual(['000660', '005930', '035420']);
  });

  it('should look up index bars by market and date', async () => {
    expect((await repo.getIndexBar('KOSPI', '2024-07-15'))?.close).toBe(2860);
    expect(await repo.getIndexBar('KOSPI', '2024-07-14')).toBeNull();
  });

  it('should filter signals by indicator and scope', async () => {
    const range = { startDate: '2024-07-15', endDate: '2024-07-15' };
    const kospiRsi = await repo.getSignals('RSI_14', range, 'KOSPI');
    expect(kospiRsi.map((s) => s.value)).toEqual([72, 55, 81]);

    const dead = await repo.getStockSignals('005930', 'DEAD_CROSS', {
      startDate: '2024-07-01',
      endDate: '2024-07-31',
    });
    expect(dead.map((s) => s.date)).toEqual(['2024-07-12']);
  });

  it('should report trading data only for dates with bars', async () => {
    expect(await repo.hasTradingData('2024-07-15')).toBe(true);
    expect(await repo.hasTradingData('2024-07-13')).toBe(false);
  });
});
