import type { ReserveState, UserAccountState } from "../engine/types.js";
import { LendingError } from "../engine/errors.js";
import { positionValue } from "./accrual.js";
import { BPS, U128_MAX, WAD, checkedAdd, checkedMul } from "./checked.js";

/**
 * Collateral and debt of one account, valued at face amount (no oracle).
 */
export interface PositionValuation {
  /** Σ deposit values */
  collateralValue: bigint;
  /** Σ borrow values */
  borrowValue: bigint;
  /** Σ deposit_i * ltv_i, still scaled by 10000 */
  ltvWeightedCollateral: bigint;
  /** Σ deposit_i * liquidationThreshold_i, still scaled by 10000 */
  thresholdWeightedCollateral: bigint;
}

/**
 * Health factor result - discriminated on whether the account has any debt
 */
export type HealthFactorResult =
  | {
      hasDebt: true;
      /** threshold-weighted collateral / borrow value, WAD-scaled */
      healthFactorWad: bigint;
      /** Same value as a float for logs and display */
      healthFactor: number;
    }
  | {
      hasDebt: false;
      healthFactor: number;
    };

function reserveFor(reserves: Map<string, ReserveState>, address: string): ReserveState {
  const reserve = reserves.get(address);
  if (!reserve) {
    throw new LendingError("InvalidParameter", `unknown reserve ${address}`);
  }
  return reserve;
}

/**
 * Values every position of an account against the reserves' current indices.
 * Reserves must have been accrued to the operation timestamp beforehand.
 */
export function valuePositions(
  account: Pick<UserAccountState, "deposits" | "borrows">,
  reserves: Map<string, ReserveState>
): PositionValuation {
  let collateralValue = 0n;
  let borrowValue = 0n;
  let ltvWeightedCollateral = 0n;
  let thresholdWeightedCollateral = 0n;

  for (const deposit of account.deposits) {
    const reserve = reserveFor(reserves, deposit.reserve);
    const value = positionValue(deposit, reserve.depositIndex);
    collateralValue = checkedAdd(collateralValue, value, U128_MAX);
    ltvWeightedCollateral = checkedAdd(
      ltvWeightedCollateral,
      checkedMul(value, BigInt(reserve.ltvRatioBps)),
      U128_MAX
    );
    thresholdWeightedCollateral = checkedAdd(
      thresholdWeightedCollateral,
      checkedMul(value, BigInt(reserve.liquidationThresholdBps)),
      U128_MAX
    );
  }

  for (const borrow of account.borrows) {
    const reserve = reserveFor(reserves, borrow.reserve);
    borrowValue = checkedAdd(borrowValue, positionValue(borrow, reserve.borrowIndex), U128_MAX);
  }

  return { collateralValue, borrowValue, ltvWeightedCollateral, thresholdWeightedCollateral };
}

/**
 * borrowValue <= Σ deposit_i * ltv_i
 */
export function isWithinBorrowLimit(v: PositionValuation): boolean {
  return checkedMul(v.borrowValue, BPS) <= v.ltvWeightedCollateral;
}

/**
 * Borrow limit in base units (Σ deposit_i * ltv_i / 10000)
 */
export function borrowLimit(v: PositionValuation): bigint {
  return v.ltvWeightedCollateral / BPS;
}

/**
 * H = Σ deposit_i * threshold_i / borrowValue; infinite without debt
 */
export function computeHealthFactor(v: PositionValuation): HealthFactorResult {
  if (v.borrowValue === 0n) {
    return { hasDebt: false, healthFactor: Infinity };
  }
  const healthFactorWad = (v.thresholdWeightedCollateral * WAD) / (v.borrowValue * BPS);
  return {
    hasDebt: true,
    healthFactorWad,
    healthFactor: Number(healthFactorWad) / Number(WAD),
  };
}

/**
 * Post-mutation check for borrow: rejects with InsufficientCollateral
 */
export function assertCanBorrow(
  account: Pick<UserAccountState, "owner" | "deposits" | "borrows">,
  reserves: Map<string, ReserveState>
): PositionValuation {
  const v = valuePositions(account, reserves);
  if (!isWithinBorrowLimit(v)) {
    throw new LendingError(
      "InsufficientCollateral",
      `borrow value ${v.borrowValue} exceeds limit ${borrowLimit(v)}`,
      { details: { owner: account.owner, borrowValue: v.borrowValue.toString(), limit: borrowLimit(v).toString() } }
    );
  }
  return v;
}

/**
 * Post-mutation check for withdraw: rejects with InsufficientBalance
 */
export function assertCanWithdraw(
  account: Pick<UserAccountState, "owner" | "deposits" | "borrows">,
  reserves: Map<string, ReserveState>
): PositionValuation {
  const v = valuePositions(account, reserves);
  if (!isWithinBorrowLimit(v)) {
    throw new LendingError(
      "InsufficientBalance",
      `remaining collateral limit ${borrowLimit(v)} would not cover borrows ${v.borrowValue}`,
      { details: { owner: account.owner, borrowValue: v.borrowValue.toString(), limit: borrowLimit(v).toString() } }
    );
  }
  return v;
}
