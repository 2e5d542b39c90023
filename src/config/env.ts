import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

const bps = (fallback: number) => z.coerce.number().int().min(0).max(100_000).default(fallback);

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Program id used to derive market, reserve and permanent-account addresses
  PROGRAM_ID: z.string().min(32).max(44).default("Fg6PaFpoGXkYsidMpWTK6W2BeZ7FEfcYkg476zPFsLnS"),

  // Kinked interest model, annualized basis points
  INTEREST_BASE_RATE_BPS: bps(500),
  INTEREST_MULTIPLIER_BPS: bps(2000),
  INTEREST_JUMP_MULTIPLIER_BPS: bps(5000),
  INTEREST_KINK_BPS: z.coerce.number().int().min(1).max(10_000).default(8000),
  RESERVE_FACTOR_BPS: z.coerce.number().int().min(0).max(10_000).default(1000),

  // Staking: 17% APY base yield before the tier multiplier
  STAKING_BASE_RATE_BPS: bps(1700),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(9),
  MARKET_MAX_USERS: z.coerce.number().int().positive().default(10_000),

  BASE_ASSET_MINT: z.string().min(32).max(44).default("So11111111111111111111111111111111111111112"),
  LIQUID_DERIVATIVE_MINT: z.string().min(32).max(44).default("jupSoLaHXQiZZTSfEWMTRRgpnyFm8f6sZdosWBjx93v"),
  JUPITER_QUOTE_URL: z.string().url().default("https://quote-api.jup.ag/v6/quote"),
  CONVERSION_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(50),
  LEVERAGE_API_URL: z.string().url().optional(),
  EXTERNAL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(injectedEnv?: Record<string, string | undefined>): Env {
  // Load dotenv only when env is actually needed
  if (!injectedEnv) {
    dotenvConfig();
  }

  const envToValidate = injectedEnv ?? process.env;
  const parsed = EnvSchema.safeParse(envToValidate);
  if (!parsed.success) {
    const msg = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid .env:\n${msg}`);
  }

  return parsed.data;
}
