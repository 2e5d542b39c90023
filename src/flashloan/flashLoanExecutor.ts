import type { ReserveState } from "../engine/types.js";
import type { UnitContext } from "../engine/unitOfWork.js";
import { LendingError } from "../engine/errors.js";
import {
  availableLiquidity,
  borrowIn,
  depositIn,
  getReserve,
  refreshReserves,
  repayIn,
  withdrawIn,
} from "../engine/lendingOps.js";
import type { PositionReceipt, RepayReceipt } from "../engine/lendingOps.js";
import { U128_MAX, U64_MAX, assertAmount, checkedAdd, checkedSub, mulDiv } from "../math/checked.js";
import { logger } from "../observability/logger.js";

/**
 * What a strategy can do while the loan is open. Every call runs inside the
 * same unit of work as the loan, so a later failure undoes it too.
 */
export interface FlashLoanScope {
  readonly borrower: string;
  readonly reserve: string;
  readonly amount: bigint;
  readonly fee: bigint;
  readonly now: number;
  deposit(owner: string, reserve: string, amount: bigint): PositionReceipt;
  borrow(owner: string, reserve: string, amount: bigint): PositionReceipt;
  repay(owner: string, reserve: string, amount: bigint): RepayReceipt;
  withdraw(owner: string, reserve: string, amount: bigint): PositionReceipt;
  /** Nested loan; rejected with ReentrantFlashLoan on a reserve that already has one open */
  flashLoan(reserve: string, amount: bigint, fee: bigint, strategy: FlashLoanStrategy): Promise<FlashLoanReceipt>;
}

/**
 * Receives the borrowed amount through the scope and resolves to the amount
 * it hands back. Anything below amount + fee fails the loan.
 */
export type FlashLoanStrategy = (scope: FlashLoanScope) => bigint | Promise<bigint>;

export interface FlashLoanReceipt {
  reserve: string;
  amount: bigint;
  fee: bigint;
  returned: bigint;
  depositsBefore: bigint;
  depositsAfter: bigint;
}

/**
 * Spreads the fee over depositors by growing depositIndex; with no depositor
 * base the fee goes to the protocol share.
 */
function creditFee(reserve: ReserveState, fee: bigint): void {
  if (fee === 0n) return;
  const base = checkedSub(reserve.totalDeposits, reserve.protocolFees);
  if (base === 0n) {
    reserve.protocolFees = checkedAdd(reserve.protocolFees, fee);
  } else {
    reserve.depositIndex = mulDiv(reserve.depositIndex, checkedAdd(base, fee), base, U128_MAX);
  }
  reserve.totalDeposits = checkedAdd(reserve.totalDeposits, fee);
}

function scopeFor(ctx: UnitContext, borrower: string, reserve: string, amount: bigint, fee: bigint): FlashLoanScope {
  return {
    borrower,
    reserve,
    amount,
    fee,
    now: ctx.now,
    deposit: (owner, r, a) => depositIn(ctx, owner, r, a),
    borrow: (owner, r, a) => borrowIn(ctx, owner, r, a),
    repay: (owner, r, a) => repayIn(ctx, owner, r, a),
    withdraw: (owner, r, a) => withdrawIn(ctx, owner, r, a),
    flashLoan: (r, a, f, strategy) => flashLoanIn(ctx, borrower, r, a, f, strategy),
  };
}

/**
 * Lends `amount` from a reserve for the duration of `strategy` and requires
 * amount + fee back before the unit can commit.
 */
export async function flashLoanIn(
  ctx: UnitContext,
  borrower: string,
  reserveAddress: string,
  amount: bigint,
  fee: bigint,
  strategy: FlashLoanStrategy
): Promise<FlashLoanReceipt> {
  const { draft, now } = ctx;
  assertAmount(amount, "flash loan amount");
  if (fee < 0n || fee > U64_MAX) {
    throw new LendingError("InvalidParameter", `flash loan fee ${fee} out of range`);
  }
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  if (reserve.flashLoanOutstanding > 0n) {
    throw new LendingError("ReentrantFlashLoan", `reserve ${reserve.address} already lent ${reserve.flashLoanOutstanding}`);
  }
  const free = availableLiquidity(reserve);
  if (amount > free) {
    throw new LendingError("InsufficientLiquidity", `flash loan ${amount} exceeds available ${free}`);
  }

  const depositsBefore = reserve.totalDeposits;
  const borrowsBefore = reserve.totalBorrows;
  const owed = checkedAdd(amount, fee);
  reserve.flashLoanOutstanding = amount;

  const returned = await strategy(scopeFor(ctx, borrower, reserve.address, amount, fee));
  if (returned < owed) {
    throw new LendingError("FlashLoanNotRepaid", `strategy returned ${returned}, owed ${owed}`, {
      details: { reserve: reserve.address, amount: amount.toString(), fee: fee.toString() },
    });
  }

  reserve.flashLoanOutstanding = 0n;
  creditFee(reserve, fee);
  draft.market.totalDeposits = checkedAdd(draft.market.totalDeposits, fee);

  const account = draft.users.get(borrower);
  if (account) account.interactionCount += 1;

  logger.info(
    {
      event: "flash_loan",
      borrower,
      reserve: reserve.address,
      amount: amount.toString(),
      fee: fee.toString(),
      borrowsDelta: (reserve.totalBorrows - borrowsBefore).toString(),
    },
    "flash loan repaid"
  );

  return {
    reserve: reserve.address,
    amount,
    fee,
    returned,
    depositsBefore,
    depositsAfter: reserve.totalDeposits,
  };
}
