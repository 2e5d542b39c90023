import type { InterestRateModel } from "../engine/types.js";
import { BPS } from "./checked.js";

export interface ReserveRates {
  /** Utilization in basis points, floored */
  utilizationBps: bigint;
  /** Annualized borrow rate, basis points */
  borrowRateBps: bigint;
  /** Annualized deposit rate, basis points */
  depositRateBps: bigint;
}

/**
 * Utilization = borrows / deposits, 0 when nothing is deposited
 */
export function computeUtilizationBps(totalBorrows: bigint, totalDeposits: bigint): bigint {
  if (totalDeposits <= 0n) return 0n;
  const u = (totalBorrows * BPS) / totalDeposits;
  return u > BPS ? BPS : u;
}

/**
 * Kinked rate model:
 *   borrow  = base + min(u, kink) * multiplier + max(u - kink, 0) * jump
 *   deposit = borrow * u * (1 - reserveFactor)
 *
 * Pure and deterministic so it can back both the engine and test oracles.
 */
export function computeRates(
  totalBorrows: bigint,
  totalDeposits: bigint,
  model: InterestRateModel,
  reserveFactorBps: number
): ReserveRates {
  const u = computeUtilizationBps(totalBorrows, totalDeposits);
  const kink = BigInt(model.kinkBps);

  const belowKink = u < kink ? u : kink;
  const aboveKink = u > kink ? u - kink : 0n;

  const borrowRateBps =
    BigInt(model.baseRateBps) +
    (belowKink * BigInt(model.multiplierBps)) / BPS +
    (aboveKink * BigInt(model.jumpMultiplierBps)) / BPS;

  const depositRateBps =
    (borrowRateBps * u * (BPS - BigInt(reserveFactorBps))) / (BPS * BPS);

  return { utilizationBps: u, borrowRateBps, depositRateBps };
}
