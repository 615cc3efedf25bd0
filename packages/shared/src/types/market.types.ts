export type Market = 'KOSPI' | 'KOSDAQ';

export type MarketScope = Market | 'ALL';

export interface StockInfo {
  readonly ticker: string;
  readonly name: string;
  readonly market: Market;
}

export interface DailyBar {
  readonly ticker: string;
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly value: number;
  readonly changeRate: number;
}

export interface IndexBar {
  readonly market: Market;
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly value: number;
}

export type SignalIndicator =
  | 'RSI_14'
  | 'BOLLINGER_UPPER'
  | 'BOLLINGER_LOWER'
  | 'MA_5'
  | 'MA_20'
  | 'MA_60'
  | 'VOLUME_MA_5'
  | 'VOLUME_MA_20'
  | 'VOLUME_MA_60'
  | 'GOLDEN_CROSS'
  | 'DEAD_CROSS';

export interface TechnicalSignal {
  readonly ticker: string;
  readonly date: string;
  readonly indicator: SignalIndicator;
  readonly value: number;
}

export interface DateRange {
  readonly startDate: string;
  readonly endDate: string;
}
