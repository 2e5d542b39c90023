import { describe, it, expect } from "vitest";
import { epochBaseYield, loyaltyScore, planTierRedistribution, tierForScore } from "../staking/tierEngine.js";
import type { StakerYield, TierRedistributionPlan } from "../staking/tierEngine.js";
import type { Tier } from "../engine/types.js";

const SOL = 1_000_000_000n;
const DAY = 86_400;

function totals(plan: TierRedistributionPlan): { debits: bigint; credits: bigint } {
  return plan.transfers.reduce(
    (acc, t) => ({ debits: acc.debits + t.debit, credits: acc.credits + t.credit }),
    { debits: 0n, credits: 0n }
  );
}

describe("loyaltyScore", () => {
  it("combines stake, time, activity and rewards in whole units", () => {
    const s = loyaltyScore(
      { stakeAmount: 10n * SOL, stakeStartTime: 0, interactionCount: 3, totalRewardsReceived: 2n * SOL + 1n },
      10 * DAY + 5,
      9
    );
    expect(s).toEqual({ amountScore: 10n, timeScore: 10n, frequencyScore: 3n, rewardsScore: 2n, score: 57n });
  });

  it("gives no time score without an active stake", () => {
    const s = loyaltyScore({ stakeAmount: 0n, stakeStartTime: 0, interactionCount: 0, totalRewardsReceived: 0n }, 50 * DAY, 9);
    expect(s.score).toBe(0n);
  });
});

describe("tierForScore", () => {
  const bands: Array<[bigint, Tier]> = [
    [0n, "Bronze"],
    [100n, "Bronze"],
    [101n, "Silver"],
    [250n, "Silver"],
    [251n, "Gold"],
    [500n, "Gold"],
    [501n, "Diamond"],
  ];

  it.each(bands)("score %s is %s", (score, tier) => {
    expect(tierForScore(score)).toBe(tier);
  });
});

describe("epochBaseYield", () => {
  it("counts from the later of epoch start and stake start", () => {
    const account = { stakeAmount: 10n * SOL, stakeStartTime: 2 * DAY };
    expect(epochBaseYield(account, 1700, 0, 7 * DAY)).toBe(epochBaseYield(account, 1700, 2 * DAY, 7 * DAY));
    expect(epochBaseYield(account, 1700, 0, 7 * DAY)).toBe(23_287_671n);
  });
});

describe("planTierRedistribution", () => {
  it("moves 40/30 parts of the pool from Bronze/Silver to Gold/Diamond 20:10", () => {
    const stakers: StakerYield[] = [
      { owner: "a-bronze", tier: "Bronze", stakeAmount: 100n, baseYield: 1_000n },
      { owner: "b-silver", tier: "Silver", stakeAmount: 100n, baseYield: 1_000n },
      { owner: "c-gold", tier: "Gold", stakeAmount: 300n, baseYield: 1_000n },
      { owner: "d-diamond", tier: "Diamond", stakeAmount: 100n, baseYield: 1_000n },
    ];
    const plan = planTierRedistribution(stakers);

    expect(plan.aggregateBaseYield).toBe(4_000n);
    expect(plan.pool).toBe(800n);
    expect(plan.moved).toBe(799n);
    expect(plan.transfers).toEqual([
      { owner: "a-bronze", tier: "Bronze", debit: 457n, credit: 0n },
      { owner: "b-silver", tier: "Silver", debit: 342n, credit: 0n },
      // 532 plus the flooring remainder
      { owner: "c-gold", tier: "Gold", debit: 0n, credit: 533n },
      { owner: "d-diamond", tier: "Diamond", debit: 0n, credit: 266n },
    ]);
    expect(totals(plan)).toEqual({ debits: 799n, credits: 799n });
  });

  it("does nothing when no Gold or Diamond staker exists", () => {
    const plan = planTierRedistribution([
      { owner: "a", tier: "Bronze", stakeAmount: 100n, baseYield: 1_000n },
      { owner: "b", tier: "Silver", stakeAmount: 100n, baseYield: 1_000n },
    ]);
    expect(plan.moved).toBe(0n);
    expect(plan.transfers).toEqual([]);
  });

  it("gives everything to the only receiving tier", () => {
    const plan = planTierRedistribution([
      { owner: "a", tier: "Bronze", stakeAmount: 100n, baseYield: 1_000n },
      { owner: "d", tier: "Diamond", stakeAmount: 100n, baseYield: 1_000n },
    ]);
    expect(plan.pool).toBe(400n);
    expect(plan.moved).toBe(228n);
    expect(plan.transfers).toEqual([
      { owner: "a", tier: "Bronze", debit: 228n, credit: 0n },
      { owner: "d", tier: "Diamond", debit: 0n, credit: 228n },
    ]);
  });

  it("never debits a staker past its capacity", () => {
    const plan = planTierRedistribution([
      { owner: "a", tier: "Bronze", stakeAmount: 100n, baseYield: 1_000n, debitCapacity: 100n },
      { owner: "d", tier: "Diamond", stakeAmount: 100n, baseYield: 1_000n },
    ]);
    expect(plan.moved).toBe(100n);
    expect(plan.transfers).toEqual([
      { owner: "a", tier: "Bronze", debit: 100n, credit: 0n },
      { owner: "d", tier: "Diamond", debit: 0n, credit: 100n },
    ]);
    expect(totals(plan)).toEqual({ debits: 100n, credits: 100n });
  });

  it("caps a funding tier at its own yield", () => {
    const plan = planTierRedistribution([
      { owner: "a", tier: "Bronze", stakeAmount: 1n, baseYield: 10n },
      { owner: "d", tier: "Diamond", stakeAmount: 1_000n, baseYield: 10_000n },
    ]);
    expect(plan.pool).toBe(2_002n);
    expect(plan.moved).toBe(10n);
  });

  it("pro-rates within a tier and stays zero-sum", () => {
    const plan = planTierRedistribution([
      { owner: "a1", tier: "Bronze", stakeAmount: 3n, baseYield: 300n },
      { owner: "a2", tier: "Bronze", stakeAmount: 1n, baseYield: 100n },
      { owner: "g", tier: "Gold", stakeAmount: 1n, baseYield: 600n },
    ]);
    expect(plan.transfers).toEqual([
      { owner: "a1", tier: "Bronze", debit: 85n, credit: 0n },
      { owner: "a2", tier: "Bronze", debit: 28n, credit: 0n },
      { owner: "g", tier: "Gold", debit: 0n, credit: 113n },
    ]);
    expect(totals(plan)).toEqual({ debits: 113n, credits: 113n });
  });
});
