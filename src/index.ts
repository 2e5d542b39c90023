export { LendingMarket, marketParamsFromEnv } from "./engine/lendingMarket.js";
export type { MarketDeps, MarketParams } from "./engine/lendingMarket.js";
export type {
  LiquidationResult,
  PositionReceipt,
  RepayReceipt,
  ReserveConfigInput,
} from "./engine/lendingOps.js";
export type * from "./engine/types.js";
export { LendingError, decodeLendingError, getLendingErrorNumber, isLendingError } from "./engine/errors.js";
export type { LendingErrorCode } from "./engine/errors.js";
export { ManualClock, systemClock } from "./engine/clock.js";
export type { Clock } from "./engine/clock.js";

export { computeRates, computeUtilizationBps } from "./math/interestRate.js";
export { computeHealthFactor, valuePositions } from "./math/health.js";
export type { HealthFactorResult, PositionValuation } from "./math/health.js";
export { isLiquidatable, quoteSeizure } from "./math/liquidation.js";

export type { FlashLoanReceipt, FlashLoanScope, FlashLoanStrategy } from "./flashloan/flashLoanExecutor.js";
export { multiplyStrategy } from "./flashloan/multiplyStrategy.js";

export { loyaltyScore, planTierRedistribution, tierForScore } from "./staking/tierEngine.js";
export type { TierRedistributionPlan, TierTransfer } from "./staking/tierEngine.js";
export { TIER_MULTIPLIER_PCT, computeReward, quoteEarlyExit } from "./staking/penalty.js";
export { DEFAULT_REWARD_PREFERENCES, RewardPreferencesSchema } from "./staking/preferences.js";
export type { RewardPreferencesInput } from "./staking/preferences.js";
export type { DistributionReceipt } from "./staking/rewardDistributor.js";
export type { StakeReceipt, StakeWithdrawalReceipt } from "./staking/stakingOps.js";

export * from "./adapters/index.js";
export { loadEnv } from "./config/env.js";
export type { Env } from "./config/env.js";
export { formatBaseUnits, parseUiAmount } from "./utils/amount.js";
