import type { HealthFactorResult, PositionValuation } from "./health.js";
import { BPS, U128_MAX, WAD, checkedMul, minBig, mulDiv } from "./checked.js";

/**
 * Determines if a position is liquidatable based on its health factor.
 *
 * The factor already weights collateral by each reserve's liquidation
 * threshold, so the position is liquidatable when it is below 1.0. Positions
 * without debt never are.
 */
export function isLiquidatable(health: HealthFactorResult): boolean {
  return health.hasDebt && health.healthFactorWad < WAD;
}

export interface SeizureQuote {
  /** Debt actually repaid by the liquidator */
  repaid: bigint;
  /** Collateral moved to the liquidator, bonus included */
  seized: bigint;
}

/**
 * Largest seizure from a reserve with `liquidationThresholdBps` that keeps the
 * health factor from falling when `repaid` of debt is cleared:
 *
 *   (T - s * t) / (B - r) >= T / B  <=>  s <= T * r / (t * B)
 *
 * where T is the threshold-weighted collateral and B the borrow value.
 */
export function healthPreservingSeizureCap(
  valuation: PositionValuation,
  repaid: bigint,
  liquidationThresholdBps: number
): bigint {
  if (valuation.borrowValue === 0n || liquidationThresholdBps === 0) return U128_MAX;
  return mulDiv(
    valuation.thresholdWeightedCollateral,
    repaid,
    checkedMul(BigInt(liquidationThresholdBps), valuation.borrowValue),
    U128_MAX
  );
}

/**
 * Repaid amount is capped at outstanding debt; seized collateral is
 * repaid * (1 + penalty), capped at the collateral held in the same reserve
 * and at `maxSeizure` when given.
 */
export function quoteSeizure(
  requested: bigint,
  outstandingDebt: bigint,
  availableCollateral: bigint,
  liquidationPenaltyBps: number,
  maxSeizure: bigint = U128_MAX
): SeizureQuote {
  const repaid = minBig(requested, outstandingDebt);
  const withBonus = mulDiv(repaid, BPS + BigInt(liquidationPenaltyBps), BPS);
  return { repaid, seized: minBig(minBig(withBonus, availableCollateral), maxSeizure) };
}
