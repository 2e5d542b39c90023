import { describe, it, expect } from "vitest";
import { LendingError, decodeLendingError, getLendingErrorNumber, isLendingError } from "../engine/errors.js";

describe("LendingError", () => {
  it("carries code, number and default message", () => {
    const err = new LendingError("NotLiquidatable");
    expect(err.code).toBe("NotLiquidatable");
    expect(err.errorNumber).toBe(6005);
    expect(err.message).toBe("NotLiquidatable: Position is not liquidatable");
    expect(err).toBeInstanceOf(Error);
  });

  it("prefers a specific detail and keeps the cause", () => {
    const cause = new Error("venue down");
    const err = new LendingError("ExternalCallFailed", "liquidity.convert: venue down", { cause });
    expect(err.message).toBe("ExternalCallFailed: liquidity.convert: venue down");
    expect(err.cause).toBe(cause);
  });

  it("narrows by code", () => {
    const err: unknown = new LendingError("Unauthorized");
    expect(isLendingError(err)).toBe(true);
    expect(isLendingError(err, "Unauthorized")).toBe(true);
    expect(isLendingError(err, "InvalidParameter")).toBe(false);
    expect(isLendingError(new Error("plain"))).toBe(false);
  });
});

describe("decodeLendingError", () => {
  it("renders known numbers", () => {
    expect(decodeLendingError(6000)).toBe("InsufficientCollateral - Insufficient collateral for borrow");
    expect(decodeLendingError(6009)).toBe("ReentrantFlashLoan - Reserve already has a flash loan outstanding");
  });

  it("reports unknown numbers", () => {
    expect(decodeLendingError(9999)).toBe("Unknown lending error code: 9999");
  });

  it("round-trips through getLendingErrorNumber", () => {
    expect(decodeLendingError(getLendingErrorNumber("AccountNotFound"))).toBe("AccountNotFound - User account not found");
  });
});
