import { PublicKey } from "@solana/web3.js";
import { LendingMarket } from "../src/engine/lendingMarket.js";
import type { MarketParams } from "../src/engine/lendingMarket.js";
import { ManualClock } from "../src/engine/clock.js";
import { InMemoryLeverageProvider, InMemoryLiquidityConverter } from "../src/adapters/inMemory.js";
import type { Capabilities } from "../src/adapters/capabilities.js";
import type { ReserveConfigInput } from "../src/engine/lendingOps.js";
import { isLendingError } from "../src/engine/errors.js";
import type { LendingErrorCode } from "../src/engine/errors.js";
import { expect } from "vitest";

export const PROGRAM_ID = "Fg6PaFpoGXkYsidMpWTK6W2BeZ7FEfcYkg476zPFsLnS";
export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const SOL = 1_000_000_000n;

export const DEFAULT_RESERVE: ReserveConfigInput = {
  ltvRatioBps: 7500,
  liquidationThresholdBps: 8000,
  liquidationPenaltyBps: 500,
};

export interface MarketFixture {
  market: LendingMarket;
  clock: ManualClock;
  authority: string;
  converter: InMemoryLiquidityConverter;
  leverage: InMemoryLeverageProvider;
}

export function newAddress(): string {
  return PublicKey.unique().toBase58();
}

export function createMarket(
  overrides: Partial<Omit<MarketParams, "authority">> = {},
  capabilities?: Capabilities
): MarketFixture {
  const clock = new ManualClock(T0);
  const authority = newAddress();
  const converter = new InMemoryLiquidityConverter();
  const leverage = new InMemoryLeverageProvider();
  const market = LendingMarket.create(
    {
      authority,
      interestRateModel: { baseRateBps: 500, multiplierBps: 2000, jumpMultiplierBps: 5000, kinkBps: 8000 },
      reserveFactorBps: 1000,
      maxUsers: 100,
      stakingBaseRateBps: 1700,
      assetDecimals: 9,
      ...overrides,
    },
    { capabilities: capabilities ?? { converter, leverage }, clock, programId: PROGRAM_ID }
  );
  return { market, clock, authority, converter, leverage };
}

export async function addReserve(
  f: MarketFixture,
  config: ReserveConfigInput = DEFAULT_RESERVE
): Promise<string> {
  const reserve = await f.market.addReserve(f.authority, newAddress(), config);
  return reserve.address;
}

/**
 * Awaits a promise expected to reject with a LendingError of `code`
 */
export async function expectLendingError(promise: Promise<unknown>, code: LendingErrorCode): Promise<void> {
  let caught: unknown;
  try {
    await promise;
  } catch (err) {
    caught = err;
  }
  expect(isLendingError(caught) ? caught.code : caught).toBe(code);
}

/**
 * Σ reserve totals must equal market totals and borrows never exceed deposits
 */
export function expectLedgerInvariants(market: LendingMarket): void {
  const m = market.getMarket();
  const reserves = market.getReserves();
  const deposits = reserves.reduce((acc, r) => acc + r.totalDeposits, 0n);
  const borrows = reserves.reduce((acc, r) => acc + r.totalBorrows, 0n);
  expect(m.totalDeposits).toBe(deposits);
  expect(m.totalBorrows).toBe(borrows);
  for (const r of reserves) {
    expect(r.totalBorrows <= r.totalDeposits).toBe(true);
    expect(r.flashLoanOutstanding).toBe(0n);
  }
}
