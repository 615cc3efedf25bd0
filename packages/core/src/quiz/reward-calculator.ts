import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { QuizError } from '@market-agent/shared/src/utils/errors.js';
import { addDays, isWeekend, kstDate } from '@market-agent/shared/src/utils/dates.js';
import type { MarketDataRepository } from '../repositories/market-data.repository.js';
import { REWARD_BUDGET_KRW, roundShares } from './reward-policy.js';

const log = createChildLogger('quiz:reward-calculator');

const MAX_LOOKBACK_DAYS = 10;
const FALLBACK_LOOKBACK_DAYS = 7;

export interface RewardQuote {
  readonly stock: string;
  readonly ticker: string;
  readonly shares: number;
  readonly referencePrice: number;
  readonly referenceDate: string;
}

export interface RewardCalculator {
  /** Most recent day before today (KST) with trading data. */
  previousTradingDay(now?: number): Promise<string>;
  /** Fractional shares of the company worth the reward budget at the previous close. */
  quote(company: string, now?: number): Promise<RewardQuote>;
}

export function createRewardCalculator(repo: MarketDataRepository): RewardCalculator {
  const previousTradingDay = async (now: number = Date.now()): Promise<string> => {
    const today = kstDate(now);
    for (let back = 1; back <= MAX_LOOKBACK_DAYS; back++) {
      const candidate = addDays(today, -back);
      if (isWeekend(candidate)) {
        continue;
      }
      if (await repo.hasTradingData(candidate)) {
        return candidate;
      }
    }
    const fallback = addDays(today, -FALLBACK_LOOKBACK_DAYS);
    log.warn({ today, fallback }, 'No trading day found in lookback window, using fallback date');
    return fallback;
  };

  return {
    previousTradingDay,

    async quote(company: string, now: number = Date.now()): Promise<RewardQuote> {
      const stock = await repo.findStockByName(company);
      if (!stock) {
        throw new QuizError(`No ticker found for ${company}`);
      }

      const referenceDate = await previousTradingDay(now);
      const bars = await repo.getStockBars(stock.ticker, {
        startDate: referenceDate,
        endDate: referenceDate,
      });
      const close = bars[0]?.close;
      if (close === undefined || close <= 0) {
        throw new QuizError(`No closing price for ${company} (${stock.ticker}) on ${referenceDate}`);
      }

      const shares = roundShares(REWARD_BUDGET_KRW / close);
      log.info({ ticker: stock.ticker, referenceDate, shares }, 'Reward calculated');
      return { stock: company, ticker: stock.ticker, shares, referencePrice: close, referenceDate };
    },
  };
}
