import type { Tier, UserAccountState } from "../engine/types.js";
import { BPS, SECONDS_PER_YEAR, U64_MAX, checkedDiv, checkedMul, minBig } from "../math/checked.js";
import { LendingError } from "../engine/errors.js";

/** Reward multiplier per tier, percent */
export const TIER_MULTIPLIER_PCT: Record<Tier, bigint> = {
  Bronze: 75n,
  Silver: 100n,
  Gold: 125n,
  Diamond: 150n,
};

/**
 * reward = stake * rateBps * elapsed * multiplierPct / (year * 10000 * 100)
 */
export function computeReward(
  stake: bigint,
  baseRateBps: number,
  elapsedSeconds: number,
  multiplierPct: bigint
): bigint {
  if (stake === 0n || elapsedSeconds <= 0) return 0n;
  const numerator = checkedMul(
    checkedMul(checkedMul(stake, BigInt(baseRateBps)), BigInt(elapsedSeconds)),
    multiplierPct
  );
  const reward = checkedDiv(numerator, SECONDS_PER_YEAR * BPS * 100n);
  if (reward > U64_MAX) {
    throw new LendingError("ArithmeticOverflow", `reward ${reward} exceeds u64`);
  }
  return reward;
}

export function tierReward(stake: bigint, baseRateBps: number, elapsedSeconds: number, tier: Tier): bigint {
  return computeReward(stake, baseRateBps, elapsedSeconds, TIER_MULTIPLIER_PCT[tier]);
}

/**
 * Reward the account would earn over its whole commitment at its current tier
 */
export function fullTermReward(
  account: Pick<UserAccountState, "stakeAmount" | "stakeStartTime" | "intendedEndTime" | "tier">,
  baseRateBps: number
): bigint {
  return tierReward(
    account.stakeAmount,
    baseRateBps,
    account.intendedEndTime - account.stakeStartTime,
    account.tier
  );
}

export interface ExitQuote {
  early: boolean;
  /** Amount owed to the owner */
  payout: bigint;
  /** Amount credited to the permanent account (0 when not early) */
  penalty: bigint;
}

/**
 * Early exit forfeits the full-term reward out of principal; the penalty can
 * never exceed the stake itself.
 */
export function quoteEarlyExit(stake: bigint, fullTerm: bigint): ExitQuote {
  const penalty = minBig(fullTerm, stake);
  return { early: true, payout: stake - penalty, penalty };
}
