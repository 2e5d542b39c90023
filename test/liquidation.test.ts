import { describe, it, expect, beforeEach } from "vitest";
import {
  SOL,
  addReserve,
  createMarket,
  expectLedgerInvariants,
  expectLendingError,
  newAddress,
  type MarketFixture,
} from "./fixtures.js";

const TIGHTER = { ltvRatioBps: 6000, liquidationThresholdBps: 7000, liquidationPenaltyBps: 500 };

describe("liquidation", () => {
  let f: MarketFixture;
  let reserve: string;
  let liquidator: string;
  let target: string;

  beforeEach(async () => {
    f = createMarket();
    reserve = await addReserve(f);
    liquidator = newAddress();
    target = newAddress();
    await f.market.deposit(liquidator, reserve, 1_000n * SOL);
    await f.market.deposit(target, reserve, 100n * SOL);
    await f.market.borrow(target, reserve, 75n * SOL);
  });

  it("refuses healthy positions", async () => {
    await expectLendingError(f.market.liquidate(liquidator, target, reserve, 10n * SOL), "NotLiquidatable");
  });

  it("repays part of the debt and moves collateral plus bonus to the liquidator", async () => {
    await f.market.updateReserveConfig(f.authority, reserve, TIGHTER);
    const before = f.market.getReserve(reserve);

    const result = await f.market.liquidate(liquidator, target, reserve, 20n * SOL);
    expect(result.repaid).toBe(20n * SOL);
    expect(result.seized).toBe(21n * SOL);
    expect(result.healthBefore.hasDebt && result.healthBefore.healthFactorWad).toBe(933_333_333_333_333_333n);
    expect(result.healthBefore.healthFactor).toBeCloseTo(0.9333, 4);
    expect(result.healthAfter.hasDebt && result.healthAfter.healthFactorWad).toBe(1_005_454_545_454_545_454n);

    const victim = f.market.getUserAccount(target);
    expect(victim?.deposits[0]?.principal).toBe(79n * SOL);
    expect(victim?.borrows[0]?.principal).toBe(55n * SOL);
    expect(f.market.getUserAccount(liquidator)?.deposits[0]?.principal).toBe(1_021n * SOL);

    const after = f.market.getReserve(reserve);
    expect(after?.totalDeposits).toBe(before?.totalDeposits);
    expect(after?.totalBorrows).toBe(55n * SOL);
    expectLedgerInvariants(f.market);
  });

  it("caps repayment at the debt and creates the liquidator's account", async () => {
    await f.market.updateReserveConfig(f.authority, reserve, TIGHTER);
    const newcomer = newAddress();
    const result = await f.market.liquidate(newcomer, target, reserve, 1_000n * SOL);
    expect(result.repaid).toBe(75n * SOL);
    expect(result.seized).toBe(78_750_000_000n);
    expect(result.healthAfter).toEqual({ hasDebt: false, healthFactor: Infinity });
    expect(f.market.getUserAccount(newcomer)?.deposits).toEqual([
      { reserve, principal: 78_750_000_000n, indexAtOpen: 1_000_000_000_000_000_000n },
    ]);
    expect(f.market.getUserAccount(target)?.borrows).toEqual([]);
  });

  it("strictly reduces the target's debt on every liquidation", async () => {
    await f.market.updateReserveConfig(f.authority, reserve, TIGHTER);
    let debt = 75n * SOL;
    // each round: collateral -5.25, debt -5; healthy again after the fourth
    for (let round = 0; round < 4; round++) {
      await f.market.liquidate(liquidator, target, reserve, 5n * SOL);
      const next = f.market.getUserAccount(target)?.borrows[0]?.principal;
      expect(next).toBe(debt - 5n * SOL);
      debt = debt - 5n * SOL;
    }
    expect(f.market.getUserAccount(target)?.deposits[0]?.principal).toBe(79n * SOL);
    await expectLendingError(f.market.liquidate(liquidator, target, reserve, SOL), "NotLiquidatable");
  });

  it("shrinks the bonus so the target's health factor never falls", async () => {
    // collateral 100 < debt 75 * 1.5: the full bonus would lower health
    await f.market.updateReserveConfig(f.authority, reserve, {
      ltvRatioBps: 7000,
      liquidationThresholdBps: 7400,
      liquidationPenaltyBps: 5000,
    });
    const result = await f.market.liquidate(liquidator, target, reserve, 10n * SOL);
    expect(result.repaid).toBe(10n * SOL);
    expect(result.seized).toBe(13_333_333_333n);

    const before = result.healthBefore.hasDebt ? result.healthBefore.healthFactorWad : 0n;
    const after = result.healthAfter.hasDebt ? result.healthAfter.healthFactorWad : 0n;
    expect(before).toBe(986_666_666_666_666_666n);
    expect(after).toBe(986_666_666_670_461_538n);
    expect(after >= before).toBe(true);
    expect(f.market.getUserAccount(target)?.deposits[0]?.principal).toBe(86_666_666_667n);
    expectLedgerInvariants(f.market);
  });

  it("rejects self-liquidation", async () => {
    await f.market.updateReserveConfig(f.authority, reserve, TIGHTER);
    await expectLendingError(f.market.liquidate(target, target, reserve, SOL), "InvalidParameter");
  });

  it("needs collateral in the liquidated reserve", async () => {
    const debtReserve = await addReserve(f);
    const other = newAddress();
    await f.market.deposit(liquidator, debtReserve, 1_000n * SOL);
    await f.market.deposit(other, reserve, 100n * SOL);
    await f.market.borrow(other, debtReserve, 72n * SOL);
    await f.market.updateReserveConfig(f.authority, reserve, TIGHTER);

    await expectLendingError(f.market.liquidate(liquidator, other, debtReserve, SOL), "NoDepositFound");
    await expectLendingError(f.market.liquidate(liquidator, other, reserve, SOL), "NoBorrowFound");
  });
});
