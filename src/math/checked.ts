import { LendingError } from "../engine/errors.js";

/** Largest value an on-ledger amount may hold */
export const U64_MAX = (1n << 64n) - 1n;
/** Bound for intermediate products */
export const U128_MAX = (1n << 128n) - 1n;

export const BPS = 10_000n;
export const WAD = 10n ** 18n;
export const SECONDS_PER_DAY = 86_400n;
export const SECONDS_PER_YEAR = 31_536_000n; // 365 days

function overflow(op: string, a: bigint, b: bigint): never {
  throw new LendingError("ArithmeticOverflow", `${op}(${a}, ${b}) out of range`, {
    details: { op, a: a.toString(), b: b.toString() },
  });
}

/**
 * All helpers reject instead of wrapping: results must stay in [0, bound].
 * Amounts use the u64 bound, intermediate products the u128 bound.
 */
export function checkedAdd(a: bigint, b: bigint, bound: bigint = U64_MAX): bigint {
  const r = a + b;
  if (r < 0n || r > bound) overflow("add", a, b);
  return r;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  const r = a - b;
  if (r < 0n) overflow("sub", a, b);
  return r;
}

export function checkedMul(a: bigint, b: bigint, bound: bigint = U128_MAX): bigint {
  const r = a * b;
  if (r < 0n || r > bound) overflow("mul", a, b);
  return r;
}

export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) overflow("div", a, b);
  return a / b;
}

/**
 * floor(a * b / c) with the product bounded by u128 and the result by u64
 */
export function mulDiv(a: bigint, b: bigint, c: bigint, bound: bigint = U64_MAX): bigint {
  const r = checkedDiv(checkedMul(a, b), c);
  if (r > bound) overflow("mulDiv", a, b);
  return r;
}

export function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBig(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Validates a caller-supplied amount: integer base units in (0, u64]
 */
export function assertAmount(amount: bigint, ctx: string): bigint {
  if (amount <= 0n) {
    throw new LendingError("InvalidParameter", `${ctx} must be greater than zero`);
  }
  if (amount > U64_MAX) {
    throw new LendingError("ArithmeticOverflow", `${ctx} exceeds u64`);
  }
  return amount;
}
