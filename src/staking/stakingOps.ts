import type { Tier } from "../engine/types.js";
import type { UnitContext } from "../engine/unitOfWork.js";
import type { Capabilities } from "../adapters/capabilities.js";
import { callCapability } from "../adapters/capabilities.js";
import { LendingError } from "../engine/errors.js";
import { assertAuthority, getOrCreateUser, requireUser } from "../engine/lendingOps.js";
import { assertAmount, checkedAdd, checkedSub, maxBig } from "../math/checked.js";
import { fullTermReward, quoteEarlyExit, tierReward } from "./penalty.js";
import { epochBaseYield, planTierRedistribution, refreshTier } from "./tierEngine.js";
import type { StakerYield, TierRedistributionPlan } from "./tierEngine.js";
import { DEFAULT_REWARD_PREFERENCES, parseRewardPreferences } from "./preferences.js";
import type { RewardPreferencesInput } from "./preferences.js";
import { requireActiveStake, settleRedistribution } from "./rewardDistributor.js";
import type { RedistributionSettlement } from "./rewardDistributor.js";
import { logger } from "../observability/logger.js";

export const DEFAULT_LOCK_DURATION_DAYS = 1;
export const MAX_LOCK_DURATION_DAYS = 3650;

export interface StakeParams {
  owner: string;
  amount: bigint;
  /** Whole days, defaults to 1 */
  lockDurationDays?: number;
  enableLeverage?: boolean;
}

export interface StakeReceipt {
  owner: string;
  amount: bigint;
  derivativeAmount: bigint;
  leveragePosition: string | null;
  lockDurationDays: number;
  intendedEndTime: number;
  tier: Tier;
}

export interface StakeWithdrawalReceipt {
  owner: string;
  stakeAmount: bigint;
  early: boolean;
  /** Base asset owed to the owner */
  payout: bigint;
  /** Credited to the permanent account */
  penalty: bigint;
  earnedReward: bigint;
  /** Base asset received from redeeming the derivative */
  redeemed: bigint;
  /** Base asset returned by closing the leveraged position, 0 without one */
  leverageProceeds: bigint;
  /** Outstanding tier-pool credit paid at withdrawal */
  creditSettled: bigint;
  /** Outstanding tier-pool debt collected at withdrawal, from rewards first and then principal */
  debtSettled: bigint;
}

export function resolveLockDuration(days: number | undefined): number {
  const d = days ?? DEFAULT_LOCK_DURATION_DAYS;
  if (!Number.isInteger(d) || d < 1 || d > MAX_LOCK_DURATION_DAYS) {
    throw new LendingError("InvalidParameter", `lock duration ${d} days outside [1, ${MAX_LOCK_DURATION_DAYS}]`);
  }
  return d;
}

/**
 * Stakes the base asset: converts it to the liquid derivative and, when asked,
 * opens a leveraged position on the derivative. Either capability failing
 * rolls the whole stake back.
 */
export async function stakeIn(ctx: UnitContext, params: StakeParams, caps: Capabilities): Promise<StakeReceipt> {
  const { draft, now } = ctx;
  const { owner, amount } = params;
  assertAmount(amount, "stake amount");
  const days = resolveLockDuration(params.lockDurationDays);

  const account = getOrCreateUser(draft, owner, now);
  if (account.stakeAmount > 0n) {
    throw new LendingError("InvalidParameter", `${owner} already has an active stake`);
  }
  account.interactionCount += 1;

  const derivativeAmount = await callCapability("liquidity.convert", () => caps.converter.convert(amount));

  let leveragePosition: string | null = null;
  if (params.enableLeverage) {
    const leverage = caps.leverage;
    if (!leverage) {
      throw new LendingError("ExternalCallFailed", "leverage requested but no provider is configured");
    }
    leveragePosition = await callCapability("leverage.open", () => leverage.open(owner, derivativeAmount));
  }

  account.stakeAmount = amount;
  account.stakeStartTime = now;
  account.lockDurationDays = days;
  account.intendedEndTime = now + days * 86_400;
  account.lastRewardAccrualTime = now;
  account.lastPayoutTime = now;
  account.accumulatedRewards = 0n;
  account.liquidDerivativeAmount = derivativeAmount;
  account.leveragePosition = leveragePosition;
  account.rewardPreferences ??= { ...DEFAULT_REWARD_PREFERENCES };

  draft.market.totalStaked = checkedAdd(draft.market.totalStaked, amount);
  const tier = refreshTier(account, now, draft.market.assetDecimals);

  logger.info(
    {
      event: "stake_opened",
      owner,
      amount: amount.toString(),
      derivativeAmount: derivativeAmount.toString(),
      lockDurationDays: days,
      leveraged: leveragePosition !== null,
      tier,
    },
    "stake opened"
  );

  return {
    owner,
    amount,
    derivativeAmount,
    leveragePosition,
    lockDurationDays: days,
    intendedEndTime: account.intendedEndTime,
    tier,
  };
}

/**
 * Unwinds a stake: closes any leveraged position, redeems the derivative and
 * settles the payout.
 *
 * Before the intended end the owner receives max(0, stake - fullTermReward)
 * and the difference goes to the permanent account; pending rewards are
 * forfeited. From the intended end on, the owner receives stake + earned.
 * Tier-pool credit and debt settle either way: credit is paid out, and debt
 * the rewards cannot cover comes out of principal before any penalty.
 */
export async function withdrawStakeIn(
  ctx: UnitContext,
  owner: string,
  caps: Capabilities
): Promise<StakeWithdrawalReceipt> {
  const { draft, now } = ctx;
  const market = draft.market;
  const account = requireUser(draft, owner);
  requireActiveStake(account);
  if (now < account.lastRewardAccrualTime) {
    throw new LendingError("ClockRegression", `rewards last accrued at ${account.lastRewardAccrualTime}, now is ${now}`);
  }

  account.interactionCount += 1;
  const tier = refreshTier(account, now, market.assetDecimals);

  let leverageProceeds = 0n;
  const handle = account.leveragePosition;
  if (handle !== null) {
    const leverage = caps.leverage;
    if (!leverage) {
      throw new LendingError("ExternalCallFailed", `cannot close ${handle}: no leverage provider is configured`);
    }
    leverageProceeds = await callCapability("leverage.close", () => leverage.close(handle));
  }

  const derivative = account.liquidDerivativeAmount;
  const redeemed =
    derivative > 0n ? await callCapability("liquidity.redeem", () => caps.converter.redeem(derivative)) : 0n;

  const stakeAmount = account.stakeAmount;
  const early = now < account.intendedEndTime;
  let payout: bigint;
  let penalty = 0n;
  let earnedReward = 0n;
  let settlement: RedistributionSettlement;

  if (early) {
    settlement = settleRedistribution(account, 0n);
    // debt the credit could not cover is owed out of principal
    const shortfall = account.rewardDebt;
    account.rewardDebt = 0n;
    settlement.debtSettled = checkedAdd(settlement.debtSettled, shortfall);
    const quote = quoteEarlyExit(
      checkedSub(stakeAmount, shortfall),
      fullTermReward(account, market.stakingBaseRateBps)
    );
    payout = checkedAdd(quote.payout, settlement.net);
    penalty = quote.penalty;
    if (penalty > 0n) {
      const sink = draft.permanentAccount;
      sink.totalPenalties = checkedAdd(sink.totalPenalties, penalty);
      sink.penaltyCount += 1;
      sink.lastCreditTime = now;
    }
  } else {
    const pending = tierReward(stakeAmount, market.stakingBaseRateBps, now - account.lastRewardAccrualTime, tier);
    settlement = settleRedistribution(account, checkedAdd(pending, account.accumulatedRewards));
    const shortfall = account.rewardDebt;
    account.rewardDebt = 0n;
    settlement.debtSettled = checkedAdd(settlement.debtSettled, shortfall);
    earnedReward = settlement.net;
    payout = checkedAdd(checkedSub(stakeAmount, shortfall), earnedReward);
    account.totalRewardsReceived = checkedAdd(account.totalRewardsReceived, earnedReward);
    market.totalRewardsPaid = checkedAdd(market.totalRewardsPaid, earnedReward);
  }

  market.totalStaked = checkedSub(market.totalStaked, stakeAmount);
  account.stakeAmount = 0n;
  account.stakeStartTime = 0;
  account.lockDurationDays = 0;
  account.intendedEndTime = 0;
  account.accumulatedRewards = 0n;
  account.liquidDerivativeAmount = 0n;
  account.leveragePosition = null;
  account.lastRewardAccrualTime = now;

  logger.info(
    {
      event: "stake_withdrawn",
      owner,
      early,
      stakeAmount: stakeAmount.toString(),
      payout: payout.toString(),
      penalty: penalty.toString(),
      earnedReward: earnedReward.toString(),
      leverageProceeds: leverageProceeds.toString(),
      creditSettled: settlement.creditSettled.toString(),
      debtSettled: settlement.debtSettled.toString(),
    },
    early ? "stake withdrawn early" : "stake withdrawn"
  );

  return {
    owner,
    stakeAmount,
    early,
    payout,
    penalty,
    earnedReward,
    redeemed,
    leverageProceeds,
    creditSettled: settlement.creditSettled,
    debtSettled: settlement.debtSettled,
  };
}

/**
 * `null` clears the preferences; distributions then pay everything out
 */
export function setRewardPreferencesIn(
  ctx: UnitContext,
  owner: string,
  input: RewardPreferencesInput | null
): void {
  const account = requireUser(ctx.draft, owner);
  account.rewardPreferences = input === null ? null : parseRewardPreferences(input);
  account.interactionCount += 1;
}

/**
 * Authority-only: moves 20% of the epoch's aggregate base yield from
 * Bronze/Silver stakers to Gold/Diamond ones. Credits and debts are netted
 * at each owner's next distribution.
 */
export function distributeTierPoolIn(ctx: UnitContext, signer: string): TierRedistributionPlan {
  const { draft, now } = ctx;
  const market = draft.market;
  assertAuthority(draft, signer);

  const stakers: StakerYield[] = [];
  for (const account of draft.users.values()) {
    if (account.stakeAmount === 0n) continue;
    const tier = refreshTier(account, now, market.assetDecimals);
    stakers.push({
      owner: account.owner,
      tier,
      stakeAmount: account.stakeAmount,
      baseYield: epochBaseYield(account, market.stakingBaseRateBps, market.lastTierEpochTime, now),
      // debt is collectable from principal at worst
      debitCapacity: maxBig(account.stakeAmount - account.rewardDebt, 0n),
    });
  }

  const plan = planTierRedistribution(stakers);
  for (const t of plan.transfers) {
    const account = requireUser(draft, t.owner);
    account.redistributionCredit = checkedAdd(account.redistributionCredit, t.credit);
    account.rewardDebt = checkedAdd(account.rewardDebt, t.debit);
  }
  market.lastTierEpochTime = now;

  logger.info(
    {
      event: "tier_pool_distributed",
      stakers: stakers.length,
      pool: plan.pool.toString(),
      moved: plan.moved.toString(),
    },
    "tier pool distributed"
  );
  return plan;
}
