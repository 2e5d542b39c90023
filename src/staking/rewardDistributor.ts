import type { MarketState, RewardPreferences, Tier, UserAccountState } from "../engine/types.js";
import type { UnitContext } from "../engine/unitOfWork.js";
import type { Capabilities } from "../adapters/capabilities.js";
import { callCapability } from "../adapters/capabilities.js";
import { LendingError } from "../engine/errors.js";
import { requireUser } from "../engine/lendingOps.js";
import { checkedAdd, checkedSub, maxBig, minBig, mulDiv } from "../math/checked.js";
import { tierReward } from "./penalty.js";
import { refreshTier } from "./tierEngine.js";
import { BATCH_CADENCE_SECONDS } from "./preferences.js";
import { logger } from "../observability/logger.js";

export interface DistributionReceipt {
  owner: string;
  tier: Tier;
  /** Reward accrued since the previous distribution */
  accrued: bigint;
  /** accrued + redistribution credit - reward debt, floored at zero */
  netReward: bigint;
  paid: bigint;
  reinvested: bigint;
  /** Batch accumulator after this distribution */
  accumulated: bigint;
  /** Tier-pool credit paid into this distribution */
  creditSettled: bigint;
  /** Tier-pool debt taken out of this distribution */
  debtSettled: bigint;
}

export function requireActiveStake(account: UserAccountState): void {
  if (account.stakeAmount === 0n) {
    throw new LendingError("NoActiveStake", `${account.owner} has nothing staked`);
  }
}

export interface RedistributionSettlement {
  /** reward + credit - debt, floored at zero */
  net: bigint;
  /** Tier-pool credit paid out */
  creditSettled: bigint;
  /** Tier-pool debt collected */
  debtSettled: bigint;
}

/**
 * Nets pending tier-pool transfers against a reward and clears them.
 * Debt larger than reward + credit carries over to the next settlement.
 */
export function settleRedistribution(account: UserAccountState, reward: bigint): RedistributionSettlement {
  const creditSettled = account.redistributionCredit;
  const gross = checkedAdd(reward, creditSettled);
  account.redistributionCredit = 0n;
  const debtSettled = minBig(gross, account.rewardDebt);
  account.rewardDebt -= debtSettled;
  return { net: gross - debtSettled, creditSettled, debtSettled };
}

function payOut(market: MarketState, account: UserAccountState, amount: bigint, now: number): void {
  if (amount === 0n) return;
  account.totalRewardsReceived = checkedAdd(account.totalRewardsReceived, amount);
  account.lastPayoutTime = now;
  market.totalRewardsPaid = checkedAdd(market.totalRewardsPaid, amount);
}

/**
 * Adds `amount` to the stake, converting it through the liquidity capability.
 * Compound restarts the commitment window at `now`.
 */
async function restake(
  market: MarketState,
  account: UserAccountState,
  amount: bigint,
  caps: Capabilities,
  strategy: RewardPreferences["compoundStrategy"],
  now: number
): Promise<void> {
  if (amount === 0n) return;
  const derivative = await callCapability("liquidity.convert", () => caps.converter.convert(amount));
  account.stakeAmount = checkedAdd(account.stakeAmount, amount);
  account.liquidDerivativeAmount = checkedAdd(account.liquidDerivativeAmount, derivative);
  market.totalStaked = checkedAdd(market.totalStaked, amount);
  if (strategy === "Compound") {
    account.stakeStartTime = now;
    account.intendedEndTime = now + account.lockDurationDays * 86_400;
  }
}

/**
 * Accrues the owner's reward since the last distribution and pays or
 * reinvests it according to their preferences. No preferences pays all.
 */
export async function distributeRewardsIn(
  ctx: UnitContext,
  owner: string,
  caps: Capabilities
): Promise<DistributionReceipt> {
  const { draft, now } = ctx;
  const market = draft.market;
  const account = requireUser(draft, owner);
  requireActiveStake(account);

  if (now < account.lastRewardAccrualTime) {
    throw new LendingError("ClockRegression", `rewards last accrued at ${account.lastRewardAccrualTime}, now is ${now}`);
  }

  account.interactionCount += 1;
  const tier = refreshTier(account, now, market.assetDecimals);
  const accrued = tierReward(account.stakeAmount, market.stakingBaseRateBps, now - account.lastRewardAccrualTime, tier);
  account.lastRewardAccrualTime = now;
  const { net: netReward, creditSettled, debtSettled } = settleRedistribution(account, accrued);

  let paid = 0n;
  let reinvested = 0n;
  const prefs = account.rewardPreferences;

  if (!prefs) {
    paid = netReward;
  } else if (prefs.mode === "RecurringInvestment") {
    reinvested = mulDiv(netReward, BigInt(prefs.reinvestmentPercentage), 100n);
    paid = checkedSub(netReward, reinvested);
    await restake(market, account, reinvested, caps, prefs.compoundStrategy, now);
  } else {
    account.accumulatedRewards = checkedAdd(account.accumulatedRewards, netReward);
    const threshold = maxBig(prefs.batchSize, prefs.payoutThreshold);
    const cadenceMet = now - account.lastPayoutTime >= BATCH_CADENCE_SECONDS[prefs.batchFrequency];
    if (account.accumulatedRewards > 0n && account.accumulatedRewards >= threshold && cadenceMet) {
      const batch = account.accumulatedRewards;
      account.accumulatedRewards = 0n;
      account.lastPayoutTime = now;
      if (prefs.autoCompound) {
        reinvested = batch;
        await restake(market, account, batch, caps, prefs.compoundStrategy, now);
      } else {
        paid = batch;
      }
    }
  }
  payOut(market, account, paid, now);

  logger.info(
    {
      event: "rewards_distributed",
      owner,
      tier,
      mode: prefs?.mode ?? "Immediate",
      accrued: accrued.toString(),
      paid: paid.toString(),
      reinvested: reinvested.toString(),
    },
    "rewards distributed"
  );

  return {
    owner,
    tier,
    accrued,
    netReward,
    paid,
    reinvested,
    accumulated: account.accumulatedRewards,
    creditSettled,
    debtSettled,
  };
}
