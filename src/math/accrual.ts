import type { InterestRateModel, PositionEntry, ReserveState } from "../engine/types.js";
import { LendingError } from "../engine/errors.js";
import { computeRates } from "./interestRate.js";
import {
  BPS,
  SECONDS_PER_YEAR,
  U128_MAX,
  checkedAdd,
  checkedMul,
  checkedSub,
  minBig,
  mulDiv,
} from "./checked.js";

export interface AccrualResult {
  elapsedSeconds: number;
  borrowInterest: bigint;
  depositorInterest: bigint;
  protocolShare: bigint;
}

const NO_ACCRUAL: AccrualResult = {
  elapsedSeconds: 0,
  borrowInterest: 0n,
  depositorInterest: 0n,
  protocolShare: 0n,
};

/**
 * index' = index * (1 + rate * dt / year), rate in basis points
 */
export function growIndex(index: bigint, rateBps: bigint, elapsedSeconds: bigint): bigint {
  if (rateBps === 0n || elapsedSeconds === 0n) return index;
  const growth = checkedMul(checkedMul(index, rateBps), elapsedSeconds) / (BPS * SECONDS_PER_YEAR);
  return checkedAdd(index, growth, U128_MAX);
}

/**
 * Brings a reserve's indices and totals up to `now`, mutating it in place.
 *
 * Borrow interest grows both totals by the same amount; depositors receive
 * their share through depositIndex and the remainder lands in protocolFees.
 * Callers must apply the returned deltas to the market totals.
 */
export function accrueReserve(
  reserve: ReserveState,
  model: InterestRateModel,
  reserveFactorBps: number,
  now: number
): AccrualResult {
  if (now < reserve.lastAccrualTime) {
    throw new LendingError(
      "ClockRegression",
      `reserve ${reserve.address} last accrued at ${reserve.lastAccrualTime}, now is ${now}`,
      { details: { reserve: reserve.address, lastAccrualTime: reserve.lastAccrualTime, now } }
    );
  }
  const elapsed = now - reserve.lastAccrualTime;
  if (elapsed === 0) return NO_ACCRUAL;

  const dt = BigInt(elapsed);
  const rates = computeRates(reserve.totalBorrows, reserve.totalDeposits, model, reserveFactorBps);

  const newBorrowIndex = growIndex(reserve.borrowIndex, rates.borrowRateBps, dt);
  const newDepositIndex = growIndex(reserve.depositIndex, rates.depositRateBps, dt);

  const borrowInterest = checkedSub(
    mulDiv(reserve.totalBorrows, newBorrowIndex, reserve.borrowIndex),
    reserve.totalBorrows
  );
  const depositorBase = checkedSub(reserve.totalDeposits, reserve.protocolFees);
  const depositorInterest = minBig(
    checkedSub(mulDiv(depositorBase, newDepositIndex, reserve.depositIndex), depositorBase),
    borrowInterest
  );
  const protocolShare = borrowInterest - depositorInterest;

  reserve.totalBorrows = checkedAdd(reserve.totalBorrows, borrowInterest);
  reserve.totalDeposits = checkedAdd(reserve.totalDeposits, borrowInterest);
  reserve.protocolFees = checkedAdd(reserve.protocolFees, protocolShare);
  reserve.borrowIndex = newBorrowIndex;
  reserve.depositIndex = newDepositIndex;
  reserve.lastAccrualTime = now;

  return { elapsedSeconds: elapsed, borrowInterest, depositorInterest, protocolShare };
}

/**
 * Current value of a lazily accrued position: principal * index / indexAtOpen
 */
export function positionValue(position: PositionEntry, currentIndex: bigint): bigint {
  if (position.principal === 0n) return 0n;
  return mulDiv(position.principal, currentIndex, position.indexAtOpen);
}

/**
 * Folds accrued interest into the principal and re-bases it on the current index
 */
export function settlePosition(position: PositionEntry, currentIndex: bigint): bigint {
  const value = positionValue(position, currentIndex);
  position.principal = value;
  position.indexAtOpen = currentIndex;
  return value;
}
