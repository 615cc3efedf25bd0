import { z } from 'zod';
import { toIsoDate } from '@market-agent/shared/src/utils/dates.js';
import { ToolExecutionError } from '@market-agent/shared/src/utils/errors.js';
import type { DateRange, StockInfo } from '@market-agent/shared/src/types/market.types.js';
import type { MarketDataRepository } from '../../repositories/market-data.repository.js';

export const DEFAULT_RESULT_COUNT = 10;
export const MAX_RESULT_COUNT = 20;

/** Payload shape shared by every list-returning market tool. */
export interface ListPayload<T> {
  readonly totalCount: number;
  readonly returnedCount: number;
  readonly results: readonly T[];
  readonly [meta: string]: unknown;
}

export function shapeResults<T>(
  rows: readonly T[],
  count: number | undefined,
  meta: Record<string, unknown> = {},
): ListPayload<T> {
  const limit = Math.min(count ?? DEFAULT_RESULT_COUNT, MAX_RESULT_COUNT);
  const results = rows.slice(0, limit);
  return { ...meta, totalCount: rows.length, returnedCount: results.length, results };
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Accepts `YYYY-MM-DD` or `YYYYMMDD` and yields the ISO form. */
export const IsoDateSchema = z
  .string()
  .describe('Date in YYYY-MM-DD format')
  .transform((value, ctx) => {
    const iso = toIsoDate(value);
    if (!iso) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
      return z.NEVER;
    }
    return iso;
  });

export const MarketScopeSchema = z
  .enum(['KOSPI', 'KOSDAQ', 'ALL'])
  .default('ALL')
  .describe('Market (KOSPI, KOSDAQ, ALL)');

export const CountSchema = z
  .number()
  .int()
  .positive()
  .optional()
  .describe(`Number of results to return (default ${String(DEFAULT_RESULT_COUNT)}, max ${String(MAX_RESULT_COUNT)})`);

export const DateScopeShape = {
  date: IsoDateSchema.optional().describe('Single trading date (YYYY-MM-DD)'),
  start_date: IsoDateSchema.optional().describe('Range start (YYYY-MM-DD), used with end_date'),
  end_date: IsoDateSchema.optional().describe('Range end (YYYY-MM-DD), used with start_date'),
};

export interface DateScopeArgs {
  readonly date?: string;
  readonly start_date?: string;
  readonly end_date?: string;
}

/** A full range wins over a single date; neither is an error. */
export function resolveRange(args: DateScopeArgs): DateRange {
  if (args.start_date && args.end_date) {
    return { startDate: args.start_date, endDate: args.end_date };
  }
  if (args.date) {
    return { startDate: args.date, endDate: args.date };
  }
  throw new ToolExecutionError('Either date or start_date and end_date is required');
}

const EXCHANGE_SUFFIX = /\.(KS|KQ)$/i;

/** Resolves a ticker (with or without exchange suffix) or a company name. */
export async function resolveStock(
  repository: MarketDataRepository,
  tickerOrName: string,
): Promise<StockInfo> {
  const input = tickerOrName.trim();
  const stock =
    (await repository.findStockByTicker(input.replace(EXCHANGE_SUFFIX, ''))) ??
    (await repository.findStockByName(input));
  if (!stock) {
    throw new ToolExecutionError(`Unknown stock: ${tickerOrName}`);
  }
  return stock;
}

export function nameLookup(stocks: readonly StockInfo[]): (ticker: string) => string {
  const names = new Map(stocks.map((s) => [s.ticker, s.name]));
  return (ticker) => names.get(ticker) ?? ticker;
}
