import type { QuizHistoryRecord, RewardHolding } from '@market-agent/shared/src/types/quiz.types.js';

export const REWARD_BUDGET_KRW = 100;
export const REWARD_COOLDOWN_MS = 24 * 60 * 60 * 1000;

const SHARE_DIGITS = 7;

export function roundShares(value: number): number {
  const factor = 10 ** SHARE_DIGITS;
  return Math.round(value * factor) / factor;
}

export interface RewardEligibility {
  readonly eligible: boolean;
  readonly lastRewardedAt?: string;
  readonly nextEligibleAt?: string;
}

/** One rewarded answer per requester per 24 hours. */
export function checkRewardEligibility(
  rewarded: readonly QuizHistoryRecord[],
  now: number = Date.now(),
): RewardEligibility {
  const times = rewarded.map((r) => Date.parse(r.completedAt)).filter((t) => !Number.isNaN(t));
  if (times.length === 0) {
    return { eligible: true };
  }
  const last = Math.max(...times);
  const lastRewardedAt = new Date(last).toISOString();
  if (now - last >= REWARD_COOLDOWN_MS) {
    return { eligible: true, lastRewardedAt };
  }
  return {
    eligible: false,
    lastRewardedAt,
    nextEligibleAt: new Date(last + REWARD_COOLDOWN_MS).toISOString(),
  };
}

/** Shares per stock over all rewarded records, ordered by stock name. */
export function totalRewards(rewarded: readonly QuizHistoryRecord[]): RewardHolding[] {
  const totals = new Map<string, number>();
  for (const record of rewarded) {
    if (!record.rewardStock || record.rewardAmount <= 0) {
      continue;
    }
    totals.set(record.rewardStock, (totals.get(record.rewardStock) ?? 0) + record.rewardAmount);
  }
  return [...totals.entries()]
    .map(([stock, shares]) => ({ stock, shares: roundShares(shares) }))
    .sort((a, b) => a.stock.localeCompare(b.stock));
}
