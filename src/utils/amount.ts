import { Decimal } from "decimal.js";
import { LendingError } from "../engine/errors.js";
import { U64_MAX } from "../math/checked.js";

// u64 amounts have up to 20 significant digits; the default precision is 20
const Dec = Decimal.clone({ precision: 64 });

/**
 * Parse a UI amount ("100.5") into base units. More fractional digits than
 * the asset has is rejected rather than truncated.
 *
 * @example
 * parseUiAmount("1.5", 9) // 1500000000n
 */
export function parseUiAmount(amountUi: string, decimals: number): bigint {
  let value: Decimal;
  try {
    value = new Dec(amountUi.trim());
  } catch (err) {
    throw new LendingError("InvalidParameter", `${JSON.stringify(amountUi)} is not a number`, { cause: err });
  }
  if (!value.isFinite() || value.isNegative()) {
    throw new LendingError("InvalidParameter", `amount ${amountUi} must be a non-negative number`);
  }
  if (value.decimalPlaces() > decimals) {
    throw new LendingError("InvalidParameter", `amount ${amountUi} has more than ${decimals} decimals`);
  }
  const base = BigInt(value.mul(new Dec(10).pow(decimals)).toFixed(0));
  if (base > U64_MAX) {
    throw new LendingError("ArithmeticOverflow", `amount ${amountUi} exceeds u64`);
  }
  return base;
}

/**
 * Format base units for logs and display, trailing zeros trimmed
 *
 * @example
 * formatBaseUnits(75100000000n, 9) // "75.1"
 */
export function formatBaseUnits(amount: bigint, decimals: number): string {
  return new Dec(amount.toString()).div(new Dec(10).pow(decimals)).toFixed();
}
