import { LendingError } from "../engine/errors.js";

/**
 * Swaps the staked base asset into its liquid staking derivative and back.
 * Amounts are base units on both sides.
 */
export interface LiquidityConverter {
  /** base asset → derivative; resolves to derivative received */
  convert(amount: bigint): Promise<bigint>;
  /** derivative → base asset; resolves to base asset received */
  redeem(amount: bigint): Promise<bigint>;
}

/**
 * Opens and closes an external leveraged position backed by staked collateral
 */
export interface LeveragePositionProvider {
  /** Resolves to an opaque handle for the new position */
  open(owner: string, collateral: bigint): Promise<string>;
  /** Resolves to the base asset returned by unwinding the position */
  close(handle: string): Promise<bigint>;
}

export interface Capabilities {
  converter: LiquidityConverter;
  /** Absent when no leverage venue is configured */
  leverage?: LeveragePositionProvider;
}

/**
 * Non-2xx response from a capability endpoint
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number, statusText: string) {
    super(`${url} responded ${status} ${statusText}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/** Network errors, 429 and 5xx are worth another attempt; other statuses are not */
export function isTransient(err: Error): boolean {
  if (err instanceof HttpStatusError) {
    return err.status === 429 || err.status >= 500;
  }
  return err.name !== "ZodError";
}

/**
 * Awaits a capability call and rethrows any failure as ExternalCallFailed
 * with the original error as its cause.
 */
export async function callCapability<T>(name: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof LendingError && err.code === "ExternalCallFailed") throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new LendingError("ExternalCallFailed", `${name}: ${reason}`, { cause: err, details: { capability: name } });
  }
}
