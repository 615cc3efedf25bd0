import type { Firestore, Query } from '@google-cloud/firestore';
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
import { PersistenceError, toError } from '@market-agent/shared/src/utils/errors.js';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { MarketDataRepository } from '../repositories/market-data.repository.js';

const log = createChildLogger('firestore:market-data');

const STOCKS = 'stocks';
const DAILY_BARS = 'daily-bars';
const INDEX_BARS = 'index-bars';
const SIGNALS = 'technical-signals';

function byDateThenTicker(a: { date: string; ticker: string }, b: { date: string; ticker: string }): number {
  return a.date === b.date ? a.ticker.localeCompare(b.ticker) : a.date.localeCompare(b.date);
}

function inDateRange(query: Query, range: DateRange): Query {
  return query.where('date', '>=', range.startDate).where('date', '<=', range.endDate).orderBy('date');
}

/**
 * Documents are keyed by ticker (`stocks`), `<ticker>_<date>` (`daily-bars`),
 * `<market>_<date>` (`index-bars`) and `<ticker>_<date>_<indicator>` (`technical-signals`).
 */
export function createFirestoreMarketDataRepository(db: Firestore): MarketDataRepository {
  const stocksRef = db.collection(STOCKS);
  const barsRef = db.collection(DAILY_BARS);
  const indexRef = db.collection(INDEX_BARS);
  const signalsRef = db.collection(SIGNALS);

  async function read<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const cause = toError(error);
      log.error({ label, error: cause.message }, 'Market data query failed');
      throw new PersistenceError(`Failed to read ${label}`, cause);
    }
  }

  async function listStocks(scope: MarketScope = 'ALL'): Promise<readonly StockInfo[]> {
    return read(STOCKS, async () => {
      const query = scope === 'ALL' ? stocksRef : stocksRef.where('market', '==', scope);
      const snapshot = await query.get();
      return snapshot.docs.map((doc) => doc.data() as StockInfo);
    });
  }

  async function scopeFilter(scope: MarketScope | undefined): Promise<(ticker: string) => boolean> {
    if (!scope || scope === 'ALL') {
      return () => true;
    }
    const tickers = new Set((await listStocks(scope)).map((s) => s.ticker));
    return (ticker) => tickers.has(ticker);
  }

  return {
    listStocks,

    async findStockByTicker(ticker: string): Promise<StockInfo | null> {
      return read(STOCKS, async () => {
        const doc = await stocksRef.doc(ticker).get();
        return doc.exists ? (doc.data() as StockInfo) : null;
      });
    },

    async findStockByName(name: string): Promise<StockInfo | null> {
      const needle = name.trim();
      if (!needle) {
        return null;
      }
      const exact = await read(STOCKS, () => stocksRef.where('name', '==', needle).limit(1).get());
      if (!exact.empty) {
        return exact.docs[0].data() as StockInfo;
      }
      // Firestore has no substring match.
      const all = await listStocks();
      return all.find((s) => s.name.includes(needle)) ?? null;
    },

    async getStockBars(ticker: string, range: DateRange): Promise<readonly DailyBar[]> {
      return read(DAILY_BARS, async () => {
        const snapshot = await inDateRange(barsRef.where('ticker', '==', ticker), range).get();
        return snapshot.docs.map((doc) => doc.data() as DailyBar);
      });
    },

    async getMarketBars(range: DateRange, scope?: MarketScope): Promise<readonly DailyBar[]> {
      const included = await scopeFilter(scope);
      return read(DAILY_BARS, async () => {
        const snapshot = await inDateRange(barsRef, range).get();
        return snapshot.docs
          .map((doc) => doc.data() as DailyBar)
          .filter((bar) => included(bar.ticker))
          .sort(byDateThenTicker);
      });
    },

    async getIndexBar(market: Market, date: string): Promise<IndexBar | null> {
      return read(INDEX_BARS, async () => {
        const doc = await indexRef.doc(`${market}_${date}`).get();
        return doc.exists ? (doc.data() as IndexBar) : null;
      });
    },

    async getSignals(
      indicator: SignalIndicator,
      range: DateRange,
      scope?: MarketScope,
    ): Promise<readonly TechnicalSignal[]> {
      const included = await scopeFilter(scope);
      return read(SIGNALS, async () => {
        const snapshot = await inDateRange(signalsRef.where('indicator', '==', indicator), range).get();
        return snapshot.docs
          .map((doc) => doc.data() as TechnicalSignal)
          .filter((signal) => included(signal.ticker))
          .sort(byDateThenTicker);
      });
    },

    async getStockSignals(
      ticker: string,
      indicator: SignalIndicator,
      range: DateRange,
    ): Promise<readonly TechnicalSignal[]> {
      return read(SIGNALS, async () => {
        const query = signalsRef.where('ticker', '==', ticker).where('indicator', '==', indicator);
        const snapshot = await inDateRange(query, range).get();
        return snapshot.docs.map((doc) => doc.data() as TechnicalSignal);
      });
    },

    async hasTradingData(date: string): Promise<boolean> {
      return read(DAILY_BARS, async () => {
        const snapshot = await barsRef.where('date', '==', date).limit(1).get();
        return !snapshot.empty;
      });
    },
  };
}
