import type {
  DailyBar,
  DateRange,
  IndexBar,
  Market,
  MarketScope,
  SignalIndicator,
  StockInfo,
  TechnicalSignal,
} from '@market-agent/shared/src/types/market.types.js';
import type { MarketDataRepository } from './market-data.repository.js';

export interface MarketDataSeed {
  readonly stocks?: readonly StockInfo[];
  readonly bars?: readonly DailyBar[];
  readonly indexBars?: readonly IndexBar[];
  readonly signals?: readonly TechnicalSignal[];
}

function inRange(date: string, range: DateRange): boolean {
  return date >= range.startDate && date <= range.endDate;
}

function byDateThenTicker<T extends { readonly date: string; readonly ticker: string }>(
  a: T,
  b: T,
): number {
  return a.date === b.date ? a.ticker.localeCompare(b.ticker) : a.date.localeCompare(b.date);
}

export function createInMemoryMarketDataRepository(seed: MarketDataSeed = {}): MarketDataRepository {
  const stocks = new Map<string, StockInfo>((seed.stocks ?? []).map((s) => [s.ticker, s]));
  const bars = [...(seed.bars ?? [])].sort(byDateThenTicker);
  const indexBars = new Map<string, IndexBar>(
    (seed.indexBars ?? []).map((b) => [`${b.market}_${b.date}`, b]),
  );
  const signals = [...(seed.signals ?? [])].sort(byDateThenTicker);

  const inScope = (ticker: string, scope: MarketScope = 'ALL'): boolean =>
    scope === 'ALL' || stocks.get(ticker)?.market === scope;

  return {
    listStocks(scope?: MarketScope): Promise<readonly StockInfo[]> {
      return Promise.resolve([...stocks.values()].filter((s) => inScope(s.ticker, scope)));
    },

    findStockByTicker(ticker: string): Promise<StockInfo | null> {
      return Promise.resolve(stocks.get(ticker) ?? null);
    },

    findStockByName(name: string): Promise<StockInfo | null> {
      const needle = name.trim();
      if (!needle) {
        return Promise.resolve(null);
      }
      const all = [...stocks.values()];
      const match = all.find((s) => s.name === needle) ?? all.find((s) => s.name.includes(needle));
      return Promise.resolve(match ?? null);
    },

    getStockBars(ticker: string, range: DateRange): Promise<readonly DailyBar[]> {
      return Promise.resolve(bars.filter((b) => b.ticker === ticker && inRange(b.date, range)));
    },

    getMarketBars(range: DateRange, scope?: MarketScope): Promise<readonly DailyBar[]> {
      return Promise.resolve(bars.filter((b) => inRange(b.date, range) && inScope(b.ticker, scope)));
    },

    getIndexBar(market: Market, date: string): Promise<IndexBar | null> {
      return Promise.resolve(indexBars.get(`${market}_${date}`) ?? null);
    },

    getSignals(
      indicator: SignalIndicator,
      range: DateRange,
      scope?: MarketScope,
    ): Promise<readonly TechnicalSignal[]> {
      return Promise.resolve(
        signals.filter(
          (s) => s.indicator === indicator && inRange(s.date, range) && inScope(s.ticker, scope),
        ),
      );
    },

    getStockSignals(
      ticker: string,
      indicator: SignalIndicator,
      range: DateRange,
    ): Promise<readonly TechnicalSignal[]> {
      return Promise.resolve(
        signals.filter(
          (s) => s.ticker === ticker && s.indicator === indicator && inRange(s.date, range),
        ),
      );
    },

    hasTradingData(date: string): Promise<boolean> {
      return Promise.resolve(bars.some((b) => b.date === date));
    },
  };
}
