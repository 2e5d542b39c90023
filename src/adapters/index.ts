import type { Env } from "../config/env.js";
import type { Capabilities } from "./capabilities.js";
import { JupiterLiquidityConverter } from "./jupiterConverter.js";
import { HttpLeverageProvider } from "./httpLeverageProvider.js";

export * from "./capabilities.js";
export { JupiterLiquidityConverter } from "./jupiterConverter.js";
export { HttpLeverageProvider } from "./httpLeverageProvider.js";
export { InMemoryLeverageProvider, InMemoryLiquidityConverter } from "./inMemory.js";

/**
 * Network-backed capabilities from env. Leverage stays disabled unless
 * LEVERAGE_API_URL is set.
 */
export function createCapabilities(env: Env, fetchFn?: typeof fetch): Capabilities {
  const converter = new JupiterLiquidityConverter({
    quoteUrl: env.JUPITER_QUOTE_URL,
    baseMint: env.BASE_ASSET_MINT,
    derivativeMint: env.LIQUID_DERIVATIVE_MINT,
    slippageBps: env.CONVERSION_SLIPPAGE_BPS,
    maxRetries: env.EXTERNAL_MAX_RETRIES,
    fetchFn,
  });
  const leverage = env.LEVERAGE_API_URL
    ? new HttpLeverageProvider({ baseUrl: env.LEVERAGE_API_URL, maxRetries: env.EXTERNAL_MAX_RETRIES, fetchFn })
    : undefined;
  return { converter, leverage };
}
