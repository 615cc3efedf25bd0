import { z } from 'zod';
import { ToolExecutionError } from '@market-agent/shared/src/utils/errors.js';
import type {
  DailyBar,
  DateRange,
  IndexBar,
  Market,
  MarketScope,
} from '@market-agent/shared/src/types/market.types.js';
import type { MarketDataRepository } from '../../repositories/market-data.repository.js';
import { defineTool } from '../tool-registry.js';
import type { RegisteredTool } from '../tool-registry.js';
import { IsoDateSchema, MarketScopeSchema, resolveStock, round } from './result-shaping.js';

const TickerSchema = z.string().min(1).describe('Stock ticker (e.g. 005930.KS) or company name');

const MetricSchema = z.enum(['close', 'volume', 'change_rate', 'value']);
type Metric = z.infer<typeof MetricSchema>;

function metricOf(bar: DailyBar, metric: Metric): number {
  switch (metric) {
    case 'close':
      return bar.close;
    case 'volume':
      return bar.volume;
    case 'change_rate':
      return bar.changeRate;
    case 'value':
      return bar.value;
  }
}

function formatBar(bar: DailyBar): Record<string, unknown> {
  return {
    date: bar.date,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    value: bar.value,
    changeRate: bar.changeRate,
  };
}

export function createFetchTools(repository: MarketDataRepository): RegisteredTool[] {
  const singleDay = (date: string): DateRange => ({ startDate: date, endDate: date });

  async function tradedBars(date: string, market: MarketScope): Promise<readonly DailyBar[]> {
    const bars = (await repository.getMarketBars(singleDay(date), market)).filter((b) => b.volume > 0);
    if (bars.length === 0) {
      throw new ToolExecutionError(`No market data found for ${date}`);
    }
    return bars;
  }

  async function stockBar(ticker: string, date: string): Promise<{ name: string; bar: DailyBar }> {
    const stock = await resolveStock(repository, ticker);
    const [bar] = await repository.getStockBars(stock.ticker, singleDay(date));
    if (!bar) {
      throw new ToolExecutionError(`No data found for ${stock.ticker} on ${date}`);
    }
    return { name: stock.name, bar };
  }

  return [
    defineTool({
      name: 'get_historical_data',
      description:
        'Daily OHLCV history of one stock for a date or an inclusive date range. Omit end_date for a single day.',
      schema: z.object({
        ticker: TickerSchema,
        start_date: IsoDateSchema,
        end_date: IsoDateSchema.optional(),
      }),
      async execute(args) {
        const stock = await resolveStock(repository, args.ticker);
        const endDate = args.end_date ?? args.start_date;
        const bars = await repository.getStockBars(stock.ticker, {
          startDate: args.start_date,
          endDate,
        });
        if (bars.length === 0) {
          throw new ToolExecutionError(`No historical data found for ${stock.ticker} on ${args.start_date}`);
        }
        return {
          ticker: stock.ticker,
          name: stock.name,
          startDate: args.start_date,
          endDate,
          results: bars.map(formatBar),
          count: bars.length,
        };
      },
    }),

    defineTool({
      name: 'get_market_ohlcv',
      description: 'KOSPI / KOSDAQ index OHLCV and trading value for one date. ALL returns both markets.',
      schema: z.object({ market: MarketScopeSchema, date: IsoDateSchema }),
      async execute(args) {
        const markets: readonly Market[] = args.market === 'ALL' ? ['KOSPI', 'KOSDAQ'] : [args.market];
        const bars: IndexBar[] = [];
        for (const market of markets) {
          const bar = await repository.getIndexBar(market, args.date);
          if (bar) {
            bars.push(bar);
          }
        }
        if (bars.length === 0) {
          throw new ToolExecutionError(`No market index data found for ${args.date}`);
        }
        return { date: args.date, market: args.market, results: bars };
      },
    }),

    defineTool({
      name: 'get_stock_ranking',
      description: "A stock's rank within its market on a date by volume, close or change rate.",
      schema: z.object({
        ticker: TickerSchema,
        date: IsoDateSchema,
        market: MarketScopeSchema,
        rank_by: z.enum(['volume', 'close', 'change_rate']).default('volume'),
      }),
      async execute(args) {
        const { name, bar } = await stockBar(args.ticker, args.date);
        const ranked = [...(await tradedBars(args.date, args.market))].sort(
          (a, b) => metricOf(b, args.rank_by) - metricOf(a, args.rank_by),
        );
        const position = ranked.findIndex((b) => b.ticker === bar.ticker);
        const rank = position === -1 ? ranked.length + 1 : position + 1;
        return {
          ticker: bar.ticker,
          stockName: name,
          date: args.date,
          market: args.market,
          rankBy: args.rank_by,
          rank,
          totalStocks: ranked.length,
          value: metricOf(bar, args.rank_by),
          percentage: round((rank / ranked.length) * 100, 2),
        };
      },
    }),

    defineTool({
      name: 'get_stock_comparison',
      description: 'Compares several stocks on a date by close, volume, change rate or trading value.',
      schema: z.object({
        tickers: z.array(TickerSchema).min(2),
        date: IsoDateSchema,
        compare_by: z.array(MetricSchema).min(1).default(['close', 'volume', 'change_rate']),
      }),
      async execute(args) {
        const companies: { ticker: string; name: string; bar: DailyBar }[] = [];
        for (const ticker of args.tickers) {
          const stock = await resolveStock(repository, ticker);
          const [bar] = await repository.getStockBars(stock.ticker, singleDay(args.date));
          if (bar) {
            companies.push({ ticker: stock.ticker, name: stock.name, bar });
          }
        }
        if (companies.length === 0) {
          throw new ToolExecutionError(`No data found for specified tickers on ${args.date}`);
        }

        const comparisonSummary: Record<string, unknown> = {};
        for (const metric of args.compare_by) {
          const sorted = [...companies]
            .sort((a, b) => metricOf(b.bar, metric) - metricOf(a.bar, metric))
            .map((c) => ({ name: c.name, ticker: c.ticker, value: metricOf(c.bar, metric) }));
          comparisonSummary[metric] = {
            highest: sorted[0],
            lowest: sorted[sorted.length - 1],
            allCompanies: sorted,
          };
        }

        return { date: args.date, comparisonSummary, companiesCount: companies.length };
      },
    }),

    defineTool({
      name: 'get_market_average_comparison',
      description: "Compares a stock's change rate or volume on a date with its market's average.",
      schema: z.object({
        ticker: TickerSchema,
        date: IsoDateSchema,
        market: MarketScopeSchema,
        compare_by: z.enum(['change_rate', 'volume']).default('change_rate'),
      }),
      async execute(args) {
        const { name, bar } = await stockBar(args.ticker, args.date);
        const bars = await tradedBars(args.date, args.market);
        const average = bars.reduce((sum, b) => sum + metricOf(b, args.compare_by), 0) / bars.length;
        const stockValue = metricOf(bar, args.compare_by);
        const difference = stockValue - average;
        return {
          ticker: bar.ticker,
          stockName: name,
          date: args.date,
          market: args.market,
          compareBy: args.compare_by,
          stockValue,
          marketAverage: round(average, 2),
          difference: round(difference, 2),
          percentageDifference: average === 0 ? 0 : round((difference / average) * 100, 2),
          isHigherThanAverage: stockValue > average,
          totalStocksInMarket: bars.length,
        };
      },
    }),

    defineTool({
      name: 'get_market_ratio',
      description: "A stock's share of its market's total volume or trading value on a date.",
      schema: z.object({
        ticker: TickerSchema,
        date: IsoDateSchema,
        market: MarketScopeSchema,
        ratio_by: z.enum(['volume', 'value']).default('volume'),
      }),
      async execute(args) {
        const { name, bar } = await stockBar(args.ticker, args.date);
        const bars = await tradedBars(args.date, args.market);
        const total = bars.reduce((sum, b) => sum + metricOf(b, args.ratio_by), 0);
        const stockValue = metricOf(bar, args.ratio_by);
        return {
          ticker: bar.ticker,
          stockName: name,
          date: args.date,
          market: args.market,
          ratioBy: args.ratio_by,
          stockValue,
          marketTotal: total,
          ratioPercentage: total === 0 ? 0 : round((stockValue / total) * 100, 2),
          totalStocksInMarket: bars.length,
        };
      },
    }),
  ];
}

