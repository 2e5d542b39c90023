/**
 * Lending engine error codes
 *
 * Every rejected operation surfaces as a LendingError carrying one of these
 * codes. Numbers follow the 6000+ custom error range used by on-chain programs
 * so a failure can be matched against program logs.
 *
 * Usage:
 *   const msg = decodeLendingError(6000);
 *   // "InsufficientCollateral - Insufficient collateral for borrow"
 */

export type LendingErrorCode =
  | "InsufficientCollateral"
  | "InsufficientLiquidity"
  | "NoBorrowFound"
  | "NoDepositFound"
  | "InsufficientBalance"
  | "NotLiquidatable"
  | "ArithmeticOverflow"
  | "InvalidParameter"
  | "Unauthorized"
  | "ReentrantFlashLoan"
  | "FlashLoanNotRepaid"
  | "ExternalCallFailed"
  | "ClockRegression"
  | "MarketCapacityReached"
  | "NoActiveStake"
  | "AccountNotFound";

interface LendingErrorInfo {
  number: number;
  msg: string;
}

const LENDING_ERROR_MAP: Record<LendingErrorCode, LendingErrorInfo> = {
  InsufficientCollateral: { number: 6000, msg: "Insufficient collateral for borrow" },
  InsufficientLiquidity: { number: 6001, msg: "Insufficient liquidity in reserve" },
  NoBorrowFound: { number: 6002, msg: "No borrow found for this reserve" },
  NoDepositFound: { number: 6003, msg: "No deposit found for this reserve" },
  InsufficientBalance: { number: 6004, msg: "Insufficient balance for withdrawal" },
  NotLiquidatable: { number: 6005, msg: "Position is not liquidatable" },
  ArithmeticOverflow: { number: 6006, msg: "Checked arithmetic would overflow" },
  InvalidParameter: { number: 6007, msg: "Input parameter is invalid" },
  Unauthorized: { number: 6008, msg: "Signer is not allowed to perform this action" },
  ReentrantFlashLoan: { number: 6009, msg: "Reserve already has a flash loan outstanding" },
  FlashLoanNotRepaid: { number: 6010, msg: "Flash loan was not repaid with fee" },
  ExternalCallFailed: { number: 6011, msg: "Liquidity conversion or leverage provider call failed" },
  ClockRegression: { number: 6012, msg: "Operation timestamp is earlier than last accrual" },
  MarketCapacityReached: { number: 6013, msg: "Market user capacity reached" },
  NoActiveStake: { number: 6014, msg: "No active stake for this account" },
  AccountNotFound: { number: 6015, msg: "User account not found" },
};

function isLendingErrorCode(name: string): name is LendingErrorCode {
  return Object.prototype.hasOwnProperty.call(LENDING_ERROR_MAP, name);
}

const CODE_BY_NUMBER = new Map<number, LendingErrorCode>();
for (const [name, info] of Object.entries(LENDING_ERROR_MAP)) {
  if (isLendingErrorCode(name)) CODE_BY_NUMBER.set(info.number, name);
}

export class LendingError extends Error {
  readonly code: LendingErrorCode;
  readonly errorNumber: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: LendingErrorCode,
    detail?: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    const info = LENDING_ERROR_MAP[code];
    super(detail ? `${code}: ${detail}` : `${code}: ${info.msg}`, { cause: options?.cause });
    this.name = "LendingError";
    this.code = code;
    this.errorNumber = info.number;
    this.details = options?.details;
  }
}

export function isLendingError(err: unknown, code?: LendingErrorCode): err is LendingError {
  return err instanceof LendingError && (code === undefined || err.code === code);
}

/**
 * Decode a numeric error code into "Name - message"
 */
export function decodeLendingError(errorNumber: number): string {
  const code = CODE_BY_NUMBER.get(errorNumber);
  if (!code) {
    return `Unknown lending error code: ${errorNumber}`;
  }
  return `${code} - ${LENDING_ERROR_MAP[code].msg}`;
}

export function getLendingErrorNumber(code: LendingErrorCode): number {
  return LENDING_ERROR_MAP[code].number;
}
