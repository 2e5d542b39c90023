import type {
  LedgerState,
  PositionEntry,
  ReserveState,
  UserAccountState,
} from "./types.js";
import type { UnitContext } from "./unitOfWork.js";
import { LendingError } from "./errors.js";
import { accrueReserve, positionValue, settlePosition } from "../math/accrual.js";
import { assertCanBorrow, assertCanWithdraw, computeHealthFactor, valuePositions } from "../math/health.js";
import type { HealthFactorResult } from "../math/health.js";
import { healthPreservingSeizureCap, isLiquidatable, quoteSeizure } from "../math/liquidation.js";
import { WAD, assertAmount, checkedAdd, checkedSub, minBig } from "../math/checked.js";
import { deriveReserveAddress } from "../solana/address.js";
import { logger } from "../observability/logger.js";

export interface ReserveConfigInput {
  ltvRatioBps: number;
  liquidationThresholdBps: number;
  liquidationPenaltyBps: number;
}

export interface PositionReceipt {
  reserve: string;
  amount: bigint;
  /** Position value after the operation */
  positionValue: bigint;
}

export interface RepayReceipt {
  reserve: string;
  repaid: bigint;
  remainingDebt: bigint;
}

export interface LiquidationResult {
  target: string;
  liquidator: string;
  reserve: string;
  repaid: bigint;
  seized: bigint;
  healthBefore: HealthFactorResult;
  healthAfter: HealthFactorResult;
}

// ---------------------------------------------------------------------------
// lookups

export function getReserve(draft: LedgerState, address: string): ReserveState {
  const reserve = draft.reserves.get(address);
  if (!reserve) {
    throw new LendingError("InvalidParameter", `unknown reserve ${address}`);
  }
  return reserve;
}

export function requireUser(draft: LedgerState, owner: string): UserAccountState {
  const user = draft.users.get(owner);
  if (!user) {
    throw new LendingError("AccountNotFound", `no account for ${owner}`);
  }
  return user;
}

export function newUserAccount(owner: string, now: number): UserAccountState {
  return {
    owner,
    deposits: [],
    borrows: [],
    stakeAmount: 0n,
    stakeStartTime: 0,
    lockDurationDays: 0,
    intendedEndTime: 0,
    tier: "Bronze",
    accumulatedRewards: 0n,
    totalRewardsReceived: 0n,
    lastPayoutTime: 0,
    lastRewardAccrualTime: 0,
    redistributionCredit: 0n,
    rewardDebt: 0n,
    rewardPreferences: null,
    liquidDerivativeAmount: 0n,
    leveragePosition: null,
    interactionCount: 0,
    createdAt: now,
  };
}

export function getOrCreateUser(draft: LedgerState, owner: string, now: number): UserAccountState {
  const existing = draft.users.get(owner);
  if (existing) return existing;

  const market = draft.market;
  if (market.currentUsers >= market.maxUsers) {
    throw new LendingError("MarketCapacityReached", `market holds ${market.currentUsers}/${market.maxUsers} users`);
  }
  const account = newUserAccount(owner, now);
  draft.users.set(owner, account);
  market.currentUsers += 1;
  return account;
}

export function assertAuthority(draft: LedgerState, signer: string): void {
  if (draft.market.authority !== signer) {
    throw new LendingError("Unauthorized", `${signer} is not the market authority`);
  }
}

export function availableLiquidity(reserve: ReserveState): bigint {
  const free = reserve.totalDeposits - reserve.totalBorrows - reserve.flashLoanOutstanding;
  return free > 0n ? free : 0n;
}

// ---------------------------------------------------------------------------
// positions

export function findPosition(list: PositionEntry[], reserve: string): PositionEntry | undefined {
  return list.find(p => p.reserve === reserve);
}

/**
 * Returns the entry for `reserve`, inserting a zero entry in address order
 */
function upsertPosition(list: PositionEntry[], reserve: string, index: bigint): PositionEntry {
  const existing = findPosition(list, reserve);
  if (existing) return existing;

  const entry: PositionEntry = { reserve, principal: 0n, indexAtOpen: index };
  const at = list.findIndex(p => p.reserve > reserve);
  if (at === -1) list.push(entry);
  else list.splice(at, 0, entry);
  return entry;
}

function pruneEmpty(list: PositionEntry[]): void {
  for (let i = list.length - 1; i >= 0; i--) {
    if (list[i].principal === 0n) list.splice(i, 1);
  }
}

// ---------------------------------------------------------------------------
// accrual

/**
 * Accrues every reserve to `now` and mirrors the interest into market totals.
 * Runs at the start of every operation that touches reserve totals.
 */
export function refreshReserves(draft: LedgerState, now: number): void {
  const { market } = draft;
  const addresses = [...draft.reserves.keys()].sort();
  for (const address of addresses) {
    const reserve = getReserve(draft, address);
    const accrued = accrueReserve(reserve, market.interestRateModel, market.reserveFactorBps, now);
    if (accrued.borrowInterest > 0n) {
      market.totalBorrows = checkedAdd(market.totalBorrows, accrued.borrowInterest);
      market.totalDeposits = checkedAdd(market.totalDeposits, accrued.borrowInterest);
      logger.debug(
        {
          event: "reserve_accrued",
          reserve: address,
          elapsedSeconds: accrued.elapsedSeconds,
          borrowInterest: accrued.borrowInterest.toString(),
          protocolShare: accrued.protocolShare.toString(),
        },
        "reserve accrued"
      );
    }
  }
}

// ---------------------------------------------------------------------------
// reserves

export function validateReserveConfig(cfg: ReserveConfigInput): void {
  const { ltvRatioBps, liquidationThresholdBps, liquidationPenaltyBps } = cfg;
  const ints = [ltvRatioBps, liquidationThresholdBps, liquidationPenaltyBps].every(Number.isInteger);
  if (!ints || ltvRatioBps <= 0 || ltvRatioBps >= liquidationThresholdBps || liquidationThresholdBps >= 10_000) {
    throw new LendingError(
      "InvalidParameter",
      `require 0 < ltv (${ltvRatioBps}) < liquidation threshold (${liquidationThresholdBps}) < 10000`
    );
  }
  if (liquidationPenaltyBps < 0 || liquidationPenaltyBps >= 10_000) {
    throw new LendingError("InvalidParameter", `liquidation penalty ${liquidationPenaltyBps} out of range`);
  }
}

export function addReserveIn(
  ctx: UnitContext,
  signer: string,
  mint: string,
  cfg: ReserveConfigInput,
  programId: string
): ReserveState {
  const { draft, now } = ctx;
  assertAuthority(draft, signer);
  validateReserveConfig(cfg);

  const address = deriveReserveAddress(draft.market.address, mint, programId);
  if (draft.reserves.has(address)) {
    throw new LendingError("InvalidParameter", `reserve for mint ${mint} already exists`);
  }

  const reserve: ReserveState = {
    address,
    market: draft.market.address,
    mint,
    ltvRatioBps: cfg.ltvRatioBps,
    liquidationThresholdBps: cfg.liquidationThresholdBps,
    liquidationPenaltyBps: cfg.liquidationPenaltyBps,
    totalDeposits: 0n,
    totalBorrows: 0n,
    borrowIndex: WAD,
    depositIndex: WAD,
    protocolFees: 0n,
    flashLoanOutstanding: 0n,
    lastAccrualTime: now,
  };
  draft.reserves.set(address, reserve);
  return reserve;
}

export function updateReserveConfigIn(
  ctx: UnitContext,
  signer: string,
  reserveAddress: string,
  cfg: ReserveConfigInput
): ReserveState {
  const { draft, now } = ctx;
  assertAuthority(draft, signer);
  validateReserveConfig(cfg);
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  reserve.ltvRatioBps = cfg.ltvRatioBps;
  reserve.liquidationThresholdBps = cfg.liquidationThresholdBps;
  reserve.liquidationPenaltyBps = cfg.liquidationPenaltyBps;
  return reserve;
}

// ---------------------------------------------------------------------------
// deposit / borrow / repay / withdraw

export function depositIn(ctx: UnitContext, owner: string, reserveAddress: string, amount: bigint): PositionReceipt {
  const { draft, now } = ctx;
  assertAmount(amount, "deposit amount");
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  const user = getOrCreateUser(draft, owner, now);
  const position = upsertPosition(user.deposits, reserve.address, reserve.depositIndex);
  settlePosition(position, reserve.depositIndex);
  position.principal = checkedAdd(position.principal, amount);

  reserve.totalDeposits = checkedAdd(reserve.totalDeposits, amount);
  draft.market.totalDeposits = checkedAdd(draft.market.totalDeposits, amount);
  user.interactionCount += 1;

  return { reserve: reserve.address, amount, positionValue: position.principal };
}

export function borrowIn(ctx: UnitContext, owner: string, reserveAddress: string, amount: bigint): PositionReceipt {
  const { draft, now } = ctx;
  assertAmount(amount, "borrow amount");
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  const user = draft.users.get(owner);
  if (!user || user.deposits.length === 0) {
    throw new LendingError("InsufficientCollateral", `${owner} has no collateral`);
  }

  const free = availableLiquidity(reserve);
  if (amount > free) {
    throw new LendingError("InsufficientLiquidity", `requested ${amount}, available ${free}`);
  }

  const position = upsertPosition(user.borrows, reserve.address, reserve.borrowIndex);
  settlePosition(position, reserve.borrowIndex);
  position.principal = checkedAdd(position.principal, amount);

  reserve.totalBorrows = checkedAdd(reserve.totalBorrows, amount);
  draft.market.totalBorrows = checkedAdd(draft.market.totalBorrows, amount);
  user.interactionCount += 1;

  assertCanBorrow(user, draft.reserves);

  return { reserve: reserve.address, amount, positionValue: position.principal };
}

export function repayIn(ctx: UnitContext, owner: string, reserveAddress: string, amount: bigint): RepayReceipt {
  const { draft, now } = ctx;
  assertAmount(amount, "repay amount");
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  const user = requireUser(draft, owner);
  const position = findPosition(user.borrows, reserve.address);
  if (!position) {
    throw new LendingError("NoBorrowFound", `${owner} has no borrow in ${reserve.address}`);
  }

  const owed = settlePosition(position, reserve.borrowIndex);
  const repaid = amount < owed ? amount : owed;
  position.principal = checkedSub(owed, repaid);

  reserve.totalBorrows = checkedSub(reserve.totalBorrows, repaid);
  draft.market.totalBorrows = checkedSub(draft.market.totalBorrows, repaid);
  user.interactionCount += 1;
  pruneEmpty(user.borrows);

  return { reserve: reserve.address, repaid, remainingDebt: position.principal };
}

export function withdrawIn(ctx: UnitContext, owner: string, reserveAddress: string, amount: bigint): PositionReceipt {
  const { draft, now } = ctx;
  assertAmount(amount, "withdraw amount");
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  const user = requireUser(draft, owner);
  const position = findPosition(user.deposits, reserve.address);
  if (!position) {
    throw new LendingError("NoDepositFound", `${owner} has no deposit in ${reserve.address}`);
  }

  const value = settlePosition(position, reserve.depositIndex);
  if (amount > value) {
    throw new LendingError("InsufficientBalance", `withdraw ${amount} exceeds deposit ${value}`);
  }
  const free = availableLiquidity(reserve);
  if (amount > free) {
    throw new LendingError("InsufficientLiquidity", `requested ${amount}, available ${free}`);
  }

  position.principal = checkedSub(value, amount);
  reserve.totalDeposits = checkedSub(reserve.totalDeposits, amount);
  draft.market.totalDeposits = checkedSub(draft.market.totalDeposits, amount);
  user.interactionCount += 1;

  const remaining = position.principal;
  pruneEmpty(user.deposits);
  assertCanWithdraw(user, draft.reserves);

  return { reserve: reserve.address, amount, positionValue: remaining };
}

// ---------------------------------------------------------------------------
// liquidation

export function healthOf(draft: LedgerState, owner: string): HealthFactorResult {
  return computeHealthFactor(valuePositions(requireUser(draft, owner), draft.reserves));
}

/**
 * Liquidator repays part of the target's debt in `reserveAddress` and takes
 * the target's collateral in the same reserve, bonus included, into their own
 * deposit position. Collateral only moves between accounts, so reserve and
 * market deposit totals are unchanged; borrow totals drop by the repaid amount.
 * The bonus shrinks where paying it in full would lower the target's health
 * factor.
 */
export function liquidateIn(
  ctx: UnitContext,
  liquidator: string,
  target: string,
  reserveAddress: string,
  repayAmount: bigint
): LiquidationResult {
  const { draft, now } = ctx;
  assertAmount(repayAmount, "liquidation repay amount");
  if (liquidator === target) {
    throw new LendingError("InvalidParameter", "an account cannot liquidate itself");
  }
  const reserve = getReserve(draft, reserveAddress);
  refreshReserves(draft, now);

  const victim = requireUser(draft, target);
  const valuationBefore = valuePositions(victim, draft.reserves);
  const healthBefore = computeHealthFactor(valuationBefore);
  if (!isLiquidatable(healthBefore)) {
    throw new LendingError("NotLiquidatable", `health factor ${healthBefore.healthFactor} >= 1`, {
      details: { target, healthFactor: healthBefore.healthFactor },
    });
  }

  const borrow = findPosition(victim.borrows, reserve.address);
  if (!borrow) {
    throw new LendingError("NoBorrowFound", `${target} has no borrow in ${reserve.address}`);
  }
  const deposit = findPosition(victim.deposits, reserve.address);
  if (!deposit) {
    throw new LendingError("NoDepositFound", `${target} has no collateral in ${reserve.address}`);
  }

  const owed = settlePosition(borrow, reserve.borrowIndex);
  const collateral = settlePosition(deposit, reserve.depositIndex);
  const requestedRepay = minBig(repayAmount, owed);
  const { repaid, seized } = quoteSeizure(
    requestedRepay,
    owed,
    collateral,
    reserve.liquidationPenaltyBps,
    healthPreservingSeizureCap(valuationBefore, requestedRepay, reserve.liquidationThresholdBps)
  );

  borrow.principal = checkedSub(owed, repaid);
  deposit.principal = checkedSub(collateral, seized);

  const taker = getOrCreateUser(draft, liquidator, now);
  const credited = upsertPosition(taker.deposits, reserve.address, reserve.depositIndex);
  settlePosition(credited, reserve.depositIndex);
  credited.principal = checkedAdd(credited.principal, seized);
  taker.interactionCount += 1;

  reserve.totalBorrows = checkedSub(reserve.totalBorrows, repaid);
  draft.market.totalBorrows = checkedSub(draft.market.totalBorrows, repaid);

  pruneEmpty(victim.borrows);
  pruneEmpty(victim.deposits);

  const healthAfter = computeHealthFactor(valuePositions(victim, draft.reserves));
  logger.info(
    {
      event: "liquidation",
      target,
      liquidator,
      reserve: reserve.address,
      repaid: repaid.toString(),
      seized: seized.toString(),
      healthBefore: healthBefore.healthFactor,
      healthAfter: healthAfter.healthFactor,
    },
    "position liquidated"
  );

  return { target, liquidator, reserve: reserve.address, repaid, seized, healthBefore, healthAfter };
}

/**
 * Value of an account's position in one reserve at the draft's indices
 */
export function positionValueIn(
  draft: LedgerState,
  owner: string,
  reserveAddress: string,
  side: "deposit" | "borrow"
): bigint {
  const user = draft.users.get(owner);
  if (!user) return 0n;
  const reserve = getReserve(draft, reserveAddress);
  const list = side === "deposit" ? user.deposits : user.borrows;
  const position = findPosition(list, reserveAddress);
  if (!position) return 0n;
  return positionValue(position, side === "deposit" ? reserve.depositIndex : reserve.borrowIndex);
}
