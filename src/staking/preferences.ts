import { z } from "zod";
import type { RewardPreferences } from "../engine/types.js";
import { LendingError } from "../engine/errors.js";
import { U64_MAX } from "../math/checked.js";

const amount = z.coerce
  .bigint()
  .refine(v => v >= 0n && v <= U64_MAX, { message: "must be within [0, 2^64-1]" });

export const RewardPreferencesSchema = z.object({
  mode: z.enum(["RecurringInvestment", "RealTimeBatch"]),
  reinvestmentPercentage: z.number().int().min(0).max(100),
  compoundStrategy: z.enum(["Simple", "Compound"]).default("Simple"),
  batchSize: amount.default(0n),
  batchFrequency: z.enum(["Instant", "Hourly", "Daily"]).default("Instant"),
  payoutThreshold: amount.default(0n),
  autoCompound: z.boolean().default(false),
});

export type RewardPreferencesInput = z.input<typeof RewardPreferencesSchema>;

/** Applied on stake when the owner has not chosen any */
export const DEFAULT_REWARD_PREFERENCES: RewardPreferences = {
  mode: "RecurringInvestment",
  reinvestmentPercentage: 80,
  compoundStrategy: "Compound",
  batchSize: 0n,
  batchFrequency: "Instant",
  payoutThreshold: 0n,
  autoCompound: false,
};

export const BATCH_CADENCE_SECONDS: Record<RewardPreferences["batchFrequency"], number> = {
  Instant: 0,
  Hourly: 3_600,
  Daily: 86_400,
};

export function parseRewardPreferences(input: RewardPreferencesInput): RewardPreferences {
  const parsed = RewardPreferencesSchema.safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new LendingError("InvalidParameter", `reward preferences: ${msg}`, { cause: parsed.error });
  }
  return parsed.data;
}
