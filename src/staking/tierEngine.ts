import type { Tier, UserAccountState } from "../engine/types.js";
import { computeReward } from "./penalty.js";
import { checkedAdd, checkedSub, minBig, mulDiv } from "../math/checked.js";

/** Upper bound (inclusive) of each band; Diamond is open-ended */
const TIER_CEILINGS: ReadonlyArray<[Tier, bigint]> = [
  ["Bronze", 100n],
  ["Silver", 250n],
  ["Gold", 500n],
];

/** Share of aggregate base yield moved between tiers each epoch, percent */
export const REDISTRIBUTION_POOL_PCT = 20n;

/** Parts of the pool taken from (Bronze, Silver) and given to (Gold, Diamond) */
const FUNDING_PARTS: ReadonlyArray<[Tier, bigint]> = [
  ["Bronze", 40n],
  ["Silver", 30n],
];
const RECEIVING_PARTS: ReadonlyArray<[Tier, bigint]> = [
  ["Gold", 20n],
  ["Diamond", 10n],
];

export interface LoyaltyBreakdown {
  amountScore: bigint;
  timeScore: bigint;
  frequencyScore: bigint;
  rewardsScore: bigint;
  score: bigint;
}

/**
 * score = 2 * whole units staked + 3 * whole days staked + interactions
 *       + 2 * whole units of rewards received
 */
export function loyaltyScore(
  account: Pick<
    UserAccountState,
    "stakeAmount" | "stakeStartTime" | "interactionCount" | "totalRewardsReceived"
  >,
  now: number,
  assetDecimals: number
): LoyaltyBreakdown {
  const unit = 10n ** BigInt(assetDecimals);
  const amountScore = account.stakeAmount / unit;
  const timeScore =
    account.stakeAmount > 0n && now > account.stakeStartTime
      ? BigInt(Math.floor((now - account.stakeStartTime) / 86_400))
      : 0n;
  const frequencyScore = BigInt(account.interactionCount);
  const rewardsScore = account.totalRewardsReceived / unit;

  return {
    amountScore,
    timeScore,
    frequencyScore,
    rewardsScore,
    score: 2n * amountScore + 3n * timeScore + frequencyScore + 2n * rewardsScore,
  };
}

export function tierForScore(score: bigint): Tier {
  for (const [tier, ceiling] of TIER_CEILINGS) {
    if (score <= ceiling) return tier;
  }
  return "Diamond";
}

/**
 * Recomputes and stores the account's tier
 */
export function refreshTier(account: UserAccountState, now: number, assetDecimals: number): Tier {
  account.tier = tierForScore(loyaltyScore(account, now, assetDecimals).score);
  return account.tier;
}

// ---------------------------------------------------------------------------
// tier pool

export interface StakerYield {
  owner: string;
  tier: Tier;
  stakeAmount: bigint;
  /** Untiered reward earned over the epoch */
  baseYield: bigint;
  /** Most this staker can still be debited; unbounded when absent */
  debitCapacity?: bigint;
}

export interface TierTransfer {
  owner: string;
  tier: Tier;
  debit: bigint;
  credit: bigint;
}

export interface TierRedistributionPlan {
  aggregateBaseYield: bigint;
  pool: bigint;
  /** Σ debits == Σ credits */
  moved: bigint;
  transfers: TierTransfer[];
}

/**
 * Base yield of one staker over the epoch, at the untiered rate
 */
export function epochBaseYield(
  account: Pick<UserAccountState, "stakeAmount" | "stakeStartTime">,
  baseRateBps: number,
  epochStart: number,
  now: number
): bigint {
  const from = Math.max(epochStart, account.stakeStartTime);
  return computeReward(account.stakeAmount, baseRateBps, now - from, 100n);
}

function sumBy<T>(items: readonly T[], f: (item: T) => bigint): bigint {
  return items.reduce((acc, item) => checkedAdd(acc, f(item)), 0n);
}

/**
 * Zero-sum plan moving 20% of aggregate base yield from Bronze/Silver to
 * Gold/Diamond.
 *
 * Each funding tier owes its parts of the pool (40/70 and 30/70), capped at
 * that tier's own yield and split across its members by yield. A member is
 * never debited past its `debitCapacity`, so every debit stays collectable. What was
 * collected goes to Gold/Diamond 20:10, or entirely to whichever of them has
 * members, split by stake; flooring leftovers go to the first recipient by
 * address. No recipients means no transfers.
 */
export function planTierRedistribution(stakers: readonly StakerYield[]): TierRedistributionPlan {
  const aggregateBaseYield = sumBy(stakers, s => s.baseYield);
  const pool = (aggregateBaseYield * REDISTRIBUTION_POOL_PCT) / 100n;
  const empty: TierRedistributionPlan = { aggregateBaseYield, pool, moved: 0n, transfers: [] };

  const members = (tier: Tier) =>
    stakers.filter(s => s.tier === tier).sort((a, b) => (a.owner < b.owner ? -1 : a.owner > b.owner ? 1 : 0));

  const receiving = RECEIVING_PARTS.filter(([tier]) => members(tier).length > 0);
  if (pool === 0n || receiving.length === 0) return empty;

  const transfers = new Map<string, TierTransfer>();
  const entry = (s: StakerYield): TierTransfer => {
    let t = transfers.get(s.owner);
    if (!t) {
      t = { owner: s.owner, tier: s.tier, debit: 0n, credit: 0n };
      transfers.set(s.owner, t);
    }
    return t;
  };

  const fundingParts = sumBy(FUNDING_PARTS, ([, parts]) => parts);
  let moved = 0n;
  for (const [tier, parts] of FUNDING_PARTS) {
    const group = members(tier);
    const groupYield = sumBy(group, s => s.baseYield);
    if (groupYield === 0n) continue;
    const target = (pool * parts) / fundingParts;
    const owed = target < groupYield ? target : groupYield;
    for (const s of group) {
      const share = mulDiv(owed, s.baseYield, groupYield);
      const debit = s.debitCapacity === undefined ? share : minBig(share, s.debitCapacity);
      if (debit === 0n) continue;
      entry(s).debit = debit;
      moved = checkedAdd(moved, debit);
    }
  }
  if (moved === 0n) return empty;

  const receivingParts = sumBy(receiving, ([, parts]) => parts);
  let credited = 0n;
  let first: TierTransfer | undefined;
  for (const [tier, parts] of receiving) {
    const group = members(tier);
    const share = (moved * parts) / receivingParts;
    const groupStake = sumBy(group, s => s.stakeAmount);
    for (const s of group) {
      const credit = groupStake === 0n ? 0n : mulDiv(share, s.stakeAmount, groupStake);
      const t = entry(s);
      t.credit = credit;
      credited = checkedAdd(credited, credit);
      if (!first || t.owner < first.owner) first = t;
    }
  }
  if (first) {
    first.credit = checkedAdd(first.credit, checkedSub(moved, credited));
  }

  return {
    aggregateBaseYield,
    pool,
    moved,
    transfers: [...transfers.values()].sort((a, b) => (a.owner < b.owner ? -1 : a.owner > b.owner ? 1 : 0)),
  };
}
