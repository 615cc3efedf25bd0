import { z } from 'zod';
import { addDays } from '@market-agent/shared/src/utils/dates.js';
import { ToolExecutionError } from '@market-agent/shared/src/utils/errors.js';
import type { DailyBar, DateRange, MarketScope } from '@market-agent/shared/src/types/market.types.js';
import type { MarketDataRepository } from '../../repositories/market-data.repository.js';
import { defineTool } from '../tool-registry.js';
import type { RegisteredTool } from '../tool-registry.js';
import {
  CountSchema,
  DateScopeShape,
  IsoDateSchema,
  MarketScopeSchema,
  resolveRange,
  round,
  shapeResults,
} from './result-shaping.js';
import type { ListPayload } from './result-shaping.js';

/** How far back to look for the previous trading day of a bar. */
const PREVIOUS_DAY_LOOKBACK = 30;

/** Change rates beyond this are treated as data errors. */
const MAX_PLAUSIBLE_CHANGE_RATE = 30;

const OrderSchema = z.enum(['ASC', 'DESC']).default('DESC').describe('Sort direction');

type SortColumn = 'close' | 'volume' | 'changeRate' | 'volumeChangePercent';

interface ConditionRow {
  readonly name: string;
  readonly ticker: string;
  readonly market: string;
  readonly date: string;
  readonly close: number;
  readonly volume: number;
  readonly changeRate: number;
  readonly previousVolume?: number;
  readonly volumeChangePercent?: number;
}

interface SearchOptions {
  readonly market: MarketScope;
  readonly range: DateRange;
  readonly filter: (row: ConditionRow) => boolean;
  readonly sortBy: SortColumn;
  readonly order: 'ASC' | 'DESC';
  readonly withPreviousVolume?: boolean;
}

export function createConditionalTools(repository: MarketDataRepository): RegisteredTool[] {
  async function search(options: SearchOptions): Promise<ConditionRow[]> {
    const stocks = new Map((await repository.listStocks(options.market)).map((s) => [s.ticker, s]));
    const lookbackStart = options.withPreviousVolume
      ? addDays(options.range.startDate, -PREVIOUS_DAY_LOOKBACK)
      : options.range.startDate;
    const bars = await repository.getMarketBars(
      { startDate: lookbackStart, endDate: options.range.endDate },
      options.market,
    );

    const previousByTicker = new Map<string, DailyBar>();
    const rows: ConditionRow[] = [];
    for (const bar of bars) {
      const previous = previousByTicker.get(bar.ticker);
      previousByTicker.set(bar.ticker, bar);

      const stock = stocks.get(bar.ticker);
      if (!stock || bar.date < options.range.startDate || bar.volume <= 0) {
        continue;
      }

      let row: ConditionRow = {
        name: stock.name,
        ticker: stock.ticker,
        market: stock.market,
        date: bar.date,
        close: bar.close,
        volume: bar.volume,
        changeRate: bar.changeRate,
      };
      if (options.withPreviousVolume) {
        if (!previous || previous.volume <= 0) {
          continue;
        }
        row = {
          ...row,
          previousVolume: previous.volume,
          volumeChangePercent: round((bar.volume / previous.volume - 1) * 100, 2),
        };
      }
      if (options.filter(row)) {
        rows.push(row);
      }
    }

    const direction = options.order === 'ASC' ? 1 : -1;
    rows.sort((a, b) => direction * ((a[options.sortBy] ?? 0) - (b[options.sortBy] ?? 0)));

    // One row per stock: the best-ranked day within the range.
    const seen = new Set<string>();
    return rows.filter((row) => {
      if (seen.has(row.ticker)) {
        return false;
      }
      seen.add(row.ticker);
      return true;
    });
  }

  const respond = (
    rows: readonly ConditionRow[],
    count: number | undefined,
    range: DateRange,
  ): ListPayload<ConditionRow> =>
    shapeResults(rows, count, { startDate: range.startDate, endDate: range.endDate });

  return [
    defineTool({
      name: 'get_stocks_by_price_range',
      description: 'Stocks whose closing price lies within a price range on a date or over a period.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        min_price: z.number().optional().describe('Minimum close (KRW)'),
        max_price: z.number().optional().describe('Maximum close (KRW)'),
        order_by: OrderSchema,
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const rows = await search({
          market: args.market,
          range,
          sortBy: 'close',
          order: args.order_by,
          filter: (row) =>
            (args.min_price === undefined || row.close >= args.min_price) &&
            (args.max_price === undefined || row.close <= args.max_price),
        });
        return respond(rows, args.count, range);
      },
    }),

    defineTool({
      name: 'get_stocks_by_volume',
      description: 'Stocks whose trading volume is at least a minimum on a date or over a period.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        min_volume: z.number().int().nonnegative().optional().describe('Minimum volume (shares)'),
        order_by: OrderSchema,
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const rows = await search({
          market: args.market,
          range,
          sortBy: 'volume',
          order: args.order_by,
          filter: (row) => args.min_volume === undefined || row.volume >= args.min_volume,
        });
        return respond(rows, args.count, range);
      },
    }),

    defineTool({
      name: 'get_stocks_by_change_rate',
      description: 'Stocks whose daily change rate (%) lies within bounds on a date or over a period.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        min_change_rate: z.number().optional().describe('Minimum change rate (%)'),
        max_change_rate: z.number().optional().describe('Maximum change rate (%)'),
        order_by: OrderSchema,
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const rows = await search({
          market: args.market,
          range,
          sortBy: 'changeRate',
          order: args.order_by,
          filter: (row) =>
            Math.abs(row.changeRate) <= MAX_PLAUSIBLE_CHANGE_RATE &&
            (args.min_change_rate === undefined || row.changeRate >= args.min_change_rate) &&
            (args.max_change_rate === undefined || row.changeRate <= args.max_change_rate),
        });
        return respond(rows, args.count, range);
      },
    }),

    defineTool({
      name: 'get_stocks_by_volume_change',
      description:
        'Stocks whose volume is at least min_volume_ratio times the previous trading day (2.0 = 200%).',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        min_volume_ratio: z.number().positive().describe('Minimum ratio to the previous day volume'),
        order_by: OrderSchema,
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const rows = await search({
          market: args.market,
          range,
          sortBy: 'volumeChangePercent',
          order: args.order_by,
          withPreviousVolume: true,
          filter: (row) =>
            row.previousVolume !== undefined && row.volume / row.previousVolume >= args.min_volume_ratio,
        });
        return respond(rows, args.count, range);
      },
    }),

    defineTool({
      name: 'get_stocks_by_combined_conditions',
      description:
        'Stocks matching every given bound on price, volume, change rate and previous-day volume ratio.',
      schema: z.object({
        market: MarketScopeSchema,
        ...DateScopeShape,
        min_price: z.number().optional(),
        max_price: z.number().optional(),
        min_volume: z.number().int().nonnegative().optional(),
        max_volume: z.number().int().nonnegative().optional(),
        min_change_rate: z.number().optional(),
        max_change_rate: z.number().optional(),
        min_volume_ratio: z.number().positive().optional().describe('Single date only'),
        order_by_col: z.enum(['change_rate', 'volume', 'close']).default('change_rate'),
        order_by: OrderSchema,
        count: CountSchema,
      }),
      async execute(args) {
        const range = resolveRange(args);
        const minRatio = args.min_volume_ratio;
        if (minRatio !== undefined && range.startDate !== range.endDate) {
          throw new ToolExecutionError('Volume ratio conditions support a single date only');
        }
        const within = (value: number, min?: number, max?: number): boolean =>
          (min === undefined || value >= min) && (max === undefined || value <= max);

        const rows = await search({
          market: args.market,
          range,
          sortBy: args.order_by_col === 'change_rate' ? 'changeRate' : args.order_by_col,
          order: args.order_by,
          withPreviousVolume: minRatio !== undefined,
          filter: (row) =>
            within(row.close, args.min_price, args.max_price) &&
            within(row.volume, args.min_volume, args.max_volume) &&
            within(row.changeRate, args.min_change_rate, args.max_change_rate) &&
            (minRatio === undefined ||
              (row.previousVolume !== undefined && row.volume / row.previousVolume >= minRatio)),
        });
        return respond(rows, args.count, range);
      },
    }),

    defineTool({
      name: 'get_top_stocks_by_price',
      description: 'Top N stocks on a date ordered by close, volume or change rate.',
      schema: z.object({
        market: MarketScopeSchema,
        date: IsoDateSchema,
        top_n: z.number().int().positive().default(1),
        order_by: z.enum(['close', 'volume', 'change_rate']).default('close'),
        order_direction: OrderSchema,
      }),
      async execute(args) {
        const range = { startDate: args.date, endDate: args.date };
        const rows = await search({
          market: args.market,
          range,
          sortBy: args.order_by === 'change_rate' ? 'changeRate' : args.order_by,
          order: args.order_direction,
          filter: () => true,
        });
        return respond(rows, args.top_n, range);
      },
    }),
  ];
}
