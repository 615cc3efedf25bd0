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

/**
 * Read-only access to daily market data. Ranges are inclusive and dates are
 * ISO `YYYY-MM-DD` strings; results come back ordered by date, then ticker.
 */
export interface MarketDataRepository {
  listStocks(scope?: MarketScope): Promise<readonly StockInfo[]>;
  findStockByTicker(ticker: string): Promise<StockInfo | null>;
  /** Exact name match first, then the first stock whose name contains the input. */
  findStockByName(name: string): Promise<StockInfo | null>;
  getStockBars(ticker: string, range: DateRange): Promise<readonly DailyBar[]>;
  getMarketBars(range: DateRange, scope?: MarketScope): Promise<readonly DailyBar[]>;
  getIndexBar(market: Market, date: string): Promise<IndexBar | null>;
  getSignals(
    indicator: SignalIndicator,
    range: DateRange,
    scope?: MarketScope,
  ): Promise<readonly TechnicalSignal[]>;
  getStockSignals(
    ticker: string,
    indicator: SignalIndicator,
    range: DateRange,
  ): Promise<readonly TechnicalSignal[]>;
  hasTradingData(date: string): Promise<boolean>;
}
