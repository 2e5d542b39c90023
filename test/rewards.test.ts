import { describe, it, expect, beforeEach } from "vitest";
import {
  DAY,
  SOL,
  T0,
  createMarket,
  expectLendingError,
  newAddress,
  type MarketFixture,
} from "./fixtures.js";

describe("distributeRewards", () => {
  let f: MarketFixture;
  let owner: string;

  beforeEach(async () => {
    f = createMarket();
    owner = newAddress();
    await f.market.stakeWithImmediateLiquidity(owner, 10n * SOL, 30);
  });

  it("reinvests 80% and compounds by default", async () => {
    f.clock.advanceDays(10);
    const receipt = await f.market.distributeRewards(owner);
    expect(receipt).toEqual({
      owner,
      tier: "Bronze",
      accrued: 34_931_506n,
      netReward: 34_931_506n,
      paid: 6_986_302n,
      reinvested: 27_945_204n,
      accumulated: 0n,
      creditSettled: 0n,
      debtSettled: 0n,
    });

    const account = f.market.getUserAccount(owner);
    expect(account?.stakeAmount).toBe(10n * SOL + 27_945_204n);
    expect(account?.liquidDerivativeAmount).toBe(10n * SOL + 27_945_204n);
    expect(account?.totalRewardsReceived).toBe(6_986_302n);
    // compound restarts the commitment window
    expect(account?.stakeStartTime).toBe(T0 + 10 * DAY);
    expect(account?.intendedEndTime).toBe(T0 + 40 * DAY);
    expect(f.market.getMarket().totalStaked).toBe(10n * SOL + 27_945_204n);
    expect(f.market.getMarket().totalRewardsPaid).toBe(6_986_302n);
    expect(f.converter.calls.at(-1)).toEqual({ kind: "convert", amount: 27_945_204n });
  });

  it("pays nothing twice for the same interval", async () => {
    f.clock.advanceDays(10);
    await f.market.distributeRewards(owner);
    const again = await f.market.distributeRewards(owner);
    expect(again.accrued).toBe(0n);
    expect(again.paid).toBe(0n);
    expect(again.reinvested).toBe(0n);
  });

  it("keeps the window under the simple strategy", async () => {
    await f.market.setRewardPreferences(owner, {
      mode: "RecurringInvestment",
      reinvestmentPercentage: 50,
      compoundStrategy: "Simple",
    });
    f.clock.advanceDays(10);
    const receipt = await f.market.distributeRewards(owner);
    expect(receipt.reinvested).toBe(17_465_753n);
    expect(receipt.paid).toBe(17_465_753n);
    expect(f.market.getUserAccount(owner)?.stakeStartTime).toBe(T0);
  });

  it("pays everything when preferences are cleared", async () => {
    await f.market.setRewardPreferences(owner, null);
    f.clock.advanceDays(1);
    const receipt = await f.market.distributeRewards(owner);
    expect(receipt.paid).toBe(3_493_150n);
    expect(receipt.reinvested).toBe(0n);
    expect(f.market.getUserAccount(owner)?.stakeAmount).toBe(10n * SOL);
  });

  it("batches until the size and cadence are met", async () => {
    await f.market.setRewardPreferences(owner, {
      mode: "RealTimeBatch",
      reinvestmentPercentage: 0,
      batchSize: 5_000_000n,
      batchFrequency: "Hourly",
    });

    f.clock.advanceDays(1);
    const first = await f.market.distributeRewards(owner);
    expect(first.paid).toBe(0n);
    expect(first.accumulated).toBe(3_493_150n);

    f.clock.advanceDays(1);
    const second = await f.market.distributeRewards(owner);
    expect(second.paid).toBe(6_986_300n);
    expect(second.accumulated).toBe(0n);
    expect(f.market.getUserAccount(owner)?.lastPayoutTime).toBe(T0 + 2 * DAY);
  });

  it("restakes a batch when autoCompound is set", async () => {
    await f.market.setRewardPreferences(owner, {
      mode: "RealTimeBatch",
      reinvestmentPercentage: 0,
      autoCompound: true,
    });
    f.clock.advanceDays(1);
    const receipt = await f.market.distributeRewards(owner);
    expect(receipt.paid).toBe(0n);
    expect(receipt.reinvested).toBe(3_493_150n);
    expect(f.market.getUserAccount(owner)?.stakeAmount).toBe(10n * SOL + 3_493_150n);
  });

  it("rejects invalid preferences", async () => {
    await expectLendingError(
      f.market.setRewardPreferences(owner, { mode: "RecurringInvestment", reinvestmentPercentage: 101 }),
      "InvalidParameter"
    );
  });

  it("rolls back when reinvestment cannot be converted", async () => {
    f.clock.advanceDays(10);
    f.converter.failNext();
    await expectLendingError(f.market.distributeRewards(owner), "ExternalCallFailed");
    const account = f.market.getUserAccount(owner);
    expect(account?.lastRewardAccrualTime).toBe(T0);
    expect(account?.totalRewardsReceived).toBe(0n);
  });

  it("requires an active stake", async () => {
    await f.market.withdrawWithImmediateLiquidity(owner);
    await expectLendingError(f.market.distributeRewards(owner), "NoActiveStake");
  });
});

describe("distributeTierPool", () => {
  let f: MarketFixture;
  let bronze: string;
  let gold: string;

  beforeEach(async () => {
    f = createMarket();
    bronze = newAddress();
    gold = newAddress();
    await f.market.stakeWithImmediateLiquidity(bronze, 10n * SOL, 30);
    await f.market.stakeWithImmediateLiquidity(gold, 120n * SOL, 30);
    f.clock.advanceDays(5);
  });

  it("moves Bronze yield to Gold", async () => {
    const plan = await f.market.distributeTierPool(f.authority);
    expect(plan.aggregateBaseYield).toBe(23_287_671n + 279_452_054n);
    expect(plan.pool).toBe(60_547_945n);
    // Bronze owes 40/70 of the pool, capped at its own yield
    expect(plan.moved).toBe(23_287_671n);
    expect(plan.transfers.find(t => t.owner === bronze)).toEqual({
      owner: bronze,
      tier: "Bronze",
      debit: 23_287_671n,
      credit: 0n,
    });
    expect(plan.transfers.find(t => t.owner === gold)).toEqual({
      owner: gold,
      tier: "Gold",
      debit: 0n,
      credit: 23_287_671n,
    });
    expect(f.market.getMarket().lastTierEpochTime).toBe(T0 + 5 * DAY);
  });

  it("nets credits and debts at the next distribution", async () => {
    await f.market.distributeTierPool(f.authority);

    const b = await f.market.distributeRewards(bronze);
    expect(b.accrued).toBe(17_465_753n);
    expect(b.netReward).toBe(0n);
    expect(f.market.getUserAccount(bronze)?.rewardDebt).toBe(5_821_918n);

    const g = await f.market.distributeRewards(gold);
    expect(g.tier).toBe("Gold");
    expect(g.accrued).toBe(349_315_068n);
    expect(g.netReward).toBe(372_602_739n);
    expect(g.reinvested).toBe(298_082_191n);
    expect(f.market.getUserAccount(gold)?.redistributionCredit).toBe(0n);
  });

  it("collects every debit it credits, even when the debtor leaves early", async () => {
    const plan = await f.market.distributeTierPool(f.authority);

    const b = await f.market.distributeRewards(bronze);
    expect(b.debtSettled).toBe(17_465_753n);
    expect(b.netReward).toBe(0n);

    // the remaining debt comes out of principal before the penalty
    const exit = await f.market.withdrawWithImmediateLiquidity(bronze);
    expect(exit.early).toBe(true);
    expect(exit.debtSettled).toBe(5_821_918n);
    expect(exit.penalty).toBe(104_794_520n);
    expect(exit.payout).toBe(9_889_383_562n);
    expect(f.market.getUserAccount(bronze)?.rewardDebt).toBe(0n);

    const g = await f.market.distributeRewards(gold);
    expect(g.creditSettled).toBe(23_287_671n);
    expect(g.netReward).toBe(372_602_739n);

    expect(b.debtSettled + exit.debtSettled).toBe(plan.moved);
    expect(g.creditSettled).toBe(plan.moved);
  });

  it("moves nothing without Gold or Diamond stakers", async () => {
    await f.market.withdrawWithImmediateLiquidity(gold);
    const plan = await f.market.distributeTierPool(f.authority);
    expect(plan.moved).toBe(0n);
    expect(plan.transfers).toEqual([]);
  });

  it("is restricted to the market authority", async () => {
    await expectLendingError(f.market.distributeTierPool(bronze), "Unauthorized");
  });
});
