import { z } from 'zod';
import { addDays } from '@market-agent/shared/src/utils/dates.js';
import { ToolExecutionError } from '@market-agent/shared/src/utils/errors.js';
import type {
  DailyBar,
  DateRange,
  MarketScope,
  SignalIndicator,
  TechnicalSignal,
} from '@market-agent/shared/src/types/market.types.js';
import type { MarketDataRepository } from '../../repositories/market-data.repository.js';
import { defineTool } from '../tool-registry.js';
import type { RegisteredTool } from '../tool-registry.js';
import {
  CountSchema,
  DateScopeShape,
  IsoDateSchema,
  MarketScopeSchema,
  nameLookup,
  resolveRange,
  resolveStock,
  round,
  shapeResults,
} from './result-shaping.js';

const MaPeriodSchema = z.union([z.literal(5), z.literal(20), z.literal(60)]);

const MA_INDICATORS = { 5: 'MA_5', 20: 'MA_20', 60: 'MA_60' } as const;
const VOLUME_MA_INDICATORS = { 5: 'VOLUME_MA_5', 20: 'VOLUME_MA_20', 60: 'VOLUME_MA_60' } as const;

interface SignalWithBar {
  readonly signal: TechnicalSignal;
  readonly bar: DailyBar;
  readonly name: string;
}

interface CrossRow {
  readonly name: string;
  readonly ticker: string;
  readonly date: string;
  readonly signalType: SignalIndicator;
  readonly close: number;
  readonly volume: number;
}

interface SurgeRow {
  readonly name: string;
  readonly ticker: string;
  readonly date: string;
  readonly currentVolume: number;
  readonly avgVolume: number;
  readonly volumeRatio: number;
  readonly close: number;
}

export function createSignalTools(repository: MarketDataRepository): RegisteredTool[] {
  /** Joins indicator rows with the same day's bar, skipping days without trading. */
  async function signalsWithBars(
    indicator: SignalIndicator,
    range: DateRange,
    market: MarketScope,
  ): Promise<SignalWithBar[]> {
    const [signals, bars, stocks] = await Promise.all([
      repository.getSignals(indicator, range, market),
      repository.getMarketBars(range, market),
      repository.listStocks(market),
    ]);
    const barByKey = new Map(bars.map((b) => [`${b.ticker}_${b.date}`, b]));
    const nameOf = nameLookup(stocks);

    const joined: SignalWithBar[] = [];
    for (const signal of signals) {
      const bar = barByKey.get(`${signal.ticker}_${signal.date}`);
      if (bar && bar.volume > 0 && bar.close > 0) {
        joined.push({ signal, bar, name: nameOf(signal.ticker) });
      }
    }
    return joined;
  }

  return [
    defineTool({
      name: 'get_bollinger_touch_stocks',
      description:
        'Stocks whose daily high touched the upper Bollinger band, or whose low touched the lower band, within a tolerance (%).',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        band_type: z.enum(['UPPER', 'LOWER']).default('LOWER'),
        tolerance: z.number().nonnegative().default(0.5).describe('Touch tolerance (%)'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const upper = args.band_type === 'UPPER';
        const joined = await signalsWithBars(
          upper ? 'BOLLINGER_UPPER' : 'BOLLINGER_LOWER',
          range,
          args.market,
        );

        const touches = joined
          .filter(({ signal, bar }) =>
            upper
              ? bar.high >= signal.value && bar.high <= signal.value * (1 + args.tolerance / 100)
              : bar.low <= signal.value && bar.low >= signal.value * (1 - args.tolerance / 100),
          )
          .map(({ signal, bar, name }) => ({
            name,
            ticker: bar.ticker,
            date: bar.date,
            close: bar.close,
            bandValue: round(signal.value, 2),
            touchType: args.band_type.toLowerCase(),
          }));

        const direction = upper ? -1 : 1;
        touches.sort((a, b) => direction * (a.close / a.bandValue - b.close / b.bandValue));
        return shapeResults(touches, args.count, {
          ...range,
          bandType: args.band_type,
          tolerance: args.tolerance,
        });
      },
    }),

    defineTool({
      name: 'get_cross_signal_stocks',
      description: 'Stocks with a golden cross, dead cross or either on a date or within a period.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        signal_type: z.enum(['GOLDEN_CROSS', 'DEAD_CROSS', 'ALL']).default('GOLDEN_CROSS'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const indicators: readonly SignalIndicator[] =
          args.signal_type === 'ALL' ? ['GOLDEN_CROSS', 'DEAD_CROSS'] : [args.signal_type];

        const crosses: CrossRow[] = [];
        for (const indicator of indicators) {
          for (const { bar, name } of await signalsWithBars(indicator, range, args.market)) {
            crosses.push({
              name,
              ticker: bar.ticker,
              date: bar.date,
              signalType: indicator,
              close: bar.close,
              volume: bar.volume,
            });
          }
        }

        // Most recent first, then by volume.
        crosses.sort((a, b) => b.date.localeCompare(a.date) || b.volume - a.volume);
        return shapeResults(crosses, args.count, { ...range, signalType: args.signal_type });
      },
    }),

    defineTool({
      name: 'get_cross_signal_count_by_stock',
      description: 'Number of golden and dead crosses of one stock within a period.',
      schema: z.object({
        ticker: z.string().min(1).describe('Stock ticker (e.g. 005930.KS) or company name'),
        start_date: IsoDateSchema,
        end_date: IsoDateSchema,
      }),
      async execute(args) {
        const stock = await resolveStock(repository, args.ticker);
        const range = { startDate: args.start_date, endDate: args.end_date };
        const bars = await repository.getStockBars(stock.ticker, range);
        if (bars.length === 0) {
          throw new ToolExecutionError(
            `No data for ${stock.name} between ${args.start_date} and ${args.end_date}`,
          );
        }

        const [golden, dead] = await Promise.all([
          repository.getStockSignals(stock.ticker, 'GOLDEN_CROSS', range),
          repository.getStockSignals(stock.ticker, 'DEAD_CROSS', range),
        ]);
        const row = {
          name: stock.name,
          ticker: stock.ticker,
          startDate: args.start_date,
          endDate: args.end_date,
          goldenCrossCount: golden.length,
          deadCrossCount: dead.length,
          totalCrossCount: golden.length + dead.length,
        };
        return shapeResults([row], undefined, { ticker: stock.ticker, ...range });
      },
    }),

    defineTool({
      name: 'get_volume_surge_stocks',
      description:
        'Stocks whose volume reached surge_ratio % of their average volume over the preceding ma_period days.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        surge_ratio: z.number().positive().default(100).describe('Surge threshold (% of average)'),
        ma_period: z.number().int().positive().default(20).describe('Averaging window in days'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const [bars, stocks] = await Promise.all([
          repository.getMarketBars(
            { startDate: addDays(range.startDate, -args.ma_period), endDate: range.endDate },
            args.market,
          ),
          repository.listStocks(args.market),
        ]);
        const nameOf = nameLookup(stocks);

        const history = new Map<string, DailyBar[]>();
        const surges: SurgeRow[] = [];
        for (const bar of bars) {
          const prior = history.get(bar.ticker) ?? [];
          history.set(bar.ticker, [...prior, bar]);
          if (bar.date < range.startDate || bar.volume <= 0) {
            continue;
          }

          const windowStart = addDays(bar.date, -args.ma_period);
          const window = prior.filter((p) => p.date >= windowStart && p.volume > 0);
          if (window.length === 0) {
            continue;
          }
          const average = window.reduce((sum, p) => sum + p.volume, 0) / window.length;
          const ratio = (bar.volume / average) * 100;
          if (ratio >= args.surge_ratio) {
            surges.push({
              name: nameOf(bar.ticker),
              ticker: bar.ticker,
              date: bar.date,
              currentVolume: bar.volume,
              avgVolume: Math.round(average),
              volumeRatio: round(ratio, 1),
              close: bar.close,
            });
          }
        }

        surges.sort((a, b) => b.volumeRatio - a.volumeRatio);
        return shapeResults(surges, args.count, {
          ...range,
          surgeRatio: args.surge_ratio,
          maPeriod: args.ma_period,
        });
      },
    }),

    defineTool({
      name: 'get_rsi_stocks',
      description:
        'Stocks by 14-day RSI: OVERBOUGHT (>= threshold), OVERSOLD (<= threshold), ABOVE (>) or BELOW (<).',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        rsi_threshold: z.number().min(0).max(100).default(80),
        condition: z.enum(['OVERBOUGHT', 'OVERSOLD', 'ABOVE', 'BELOW']).default('OVERBOUGHT'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const threshold = args.rsi_threshold;
        const matches = (rsi: number): boolean => {
          switch (args.condition) {
            case 'OVERBOUGHT':
              return rsi >= threshold;
            case 'OVERSOLD':
              return rsi <= threshold;
            case 'ABOVE':
              return rsi > threshold;
            case 'BELOW':
              return rsi < threshold;
          }
        };

        const rows = (await signalsWithBars('RSI_14', range, args.market))
          .filter(({ signal }) => matches(signal.value))
          .map(({ signal, bar, name }) => ({
            name,
            ticker: bar.ticker,
            date: bar.date,
            rsi: round(signal.value, 2),
            close: bar.close,
            volume: bar.volume,
            condition: args.condition.toLowerCase(),
          }));

        const descending = args.condition === 'OVERBOUGHT' || args.condition === 'ABOVE';
        rows.sort((a, b) => (descending ? b.rsi - a.rsi : a.rsi - b.rsi));
        return shapeResults(rows, args.count, {
          ...range,
          rsiThreshold: threshold,
          condition: args.condition,
        });
      },
    }),

    defineTool({
      name: 'get_ma_deviation_stocks',
      description:
        'Stocks whose close deviates from their moving average by at least deviation_percent: ABOVE, BELOW or ABSOLUTE.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        ma_period: MaPeriodSchema.default(20),
        deviation_percent: z.number().nonnegative().default(10),
        condition: z.enum(['ABOVE', 'BELOW', 'ABSOLUTE']).default('ABOVE'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const pct = args.deviation_percent;

        const rows = (await signalsWithBars(MA_INDICATORS[args.ma_period], range, args.market))
          .filter(({ signal }) => signal.value > 0)
          .map(({ signal, bar, name }) => ({
            name,
            ticker: bar.ticker,
            date: bar.date,
            close: bar.close,
            maValue: round(signal.value, 2),
            deviation: ((bar.close - signal.value) / signal.value) * 100,
          }))
          .filter(({ deviation }) =>
            args.condition === 'ABOVE'
              ? deviation >= pct
              : args.condition === 'BELOW'
                ? deviation <= -pct
                : Math.abs(deviation) >= pct,
          )
          .map((row) => ({
            ...row,
            deviation: round(row.deviation, 2),
            condition: args.condition.toLowerCase(),
          }));

        if (args.condition === 'ABOVE') {
          rows.sort((a, b) => b.deviation - a.deviation);
        } else if (args.condition === 'BELOW') {
          rows.sort((a, b) => a.deviation - b.deviation);
        } else {
          rows.sort((a, b) => Math.abs(b.deviation) - Math.abs(a.deviation));
        }
        return shapeResults(rows, args.count, {
          ...range,
          maPeriod: args.ma_period,
          deviationPercent: pct,
          condition: args.condition,
        });
      },
    }),

    defineTool({
      name: 'get_volume_deviation_stocks',
      description:
        'Stocks whose volume deviates from its volume moving average by at least deviation_percent, ABOVE or BELOW.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        volume_ma_period: MaPeriodSchema.default(20),
        deviation_percent: z.number().nonnegative().default(100),
        condition: z.enum(['ABOVE', 'BELOW']).default('ABOVE'),
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const pct = args.deviation_percent;

        const rows = (
          await signalsWithBars(VOLUME_MA_INDICATORS[args.volume_ma_period], range, args.market)
        )
          .filter(({ signal }) => signal.value > 0)
          .map(({ signal, bar, name }) => {
            const ratio = bar.volume / signal.value;
            return {
              name,
              ticker: bar.ticker,
              date: bar.date,
              close: bar.close,
              currentVolume: bar.volume,
              volumeMa: Math.round(signal.value),
              deviationPercent: round((ratio - 1) * 100, 2),
              volumeRatio: round(ratio, 2),
            };
          })
          .filter(({ deviationPercent }) =>
            args.condition === 'ABOVE' ? deviationPercent >= pct : deviationPercent <= -pct,
          );

        const direction = args.condition === 'ABOVE' ? -1 : 1;
        rows.sort((a, b) => direction * (a.deviationPercent - b.deviationPercent));
        return shapeResults(rows, args.count, {
          ...range,
          volumeMaPeriod: args.volume_ma_period,
          deviationPercent: pct,
          condition: args.condition,
        });
      },
    }),
  ];
}
