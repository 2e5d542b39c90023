import { describe, it, expect } from "vitest";
import { loadEnv } from "../config/env.js";

describe("loadEnv", () => {
  it("fills every default from an empty environment", () => {
    const env = loadEnv({});
    expect(env.NODE_ENV).toBe("development");
    expect(env.INTEREST_BASE_RATE_BPS).toBe(500);
    expect(env.INTEREST_KINK_BPS).toBe(8000);
    expect(env.RESERVE_FACTOR_BPS).toBe(1000);
    expect(env.STAKING_BASE_RATE_BPS).toBe(1700);
    expect(env.ASSET_DECIMALS).toBe(9);
    expect(env.EXTERNAL_MAX_RETRIES).toBe(2);
    expect(env.LEVERAGE_API_URL).toBeUndefined();
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it("coerces numeric strings", () => {
    const env = loadEnv({ MARKET_MAX_USERS: "25", CONVERSION_SLIPPAGE_BPS: "100" });
    expect(env.MARKET_MAX_USERS).toBe(25);
    expect(env.CONVERSION_SLIPPAGE_BPS).toBe(100);
  });

  it("lists every invalid variable", () => {
    expect(() => loadEnv({ INTEREST_KINK_BPS: "0", LEVERAGE_API_URL: "not-a-url" })).toThrow(
      /^Invalid \.env:\nINTEREST_KINK_BPS: .*\nLEVERAGE_API_URL: /
    );
  });
});
