/**
 * Ledger state for the lending market and staking subsystem.
 *
 * Everything here is plain data (strings, numbers, bigints, arrays, Maps) so
 * a unit of work can deep-clone it with structuredClone and discard the draft
 * on failure. Addresses are base58 strings, amounts are base units.
 */

export type Tier = "Bronze" | "Silver" | "Gold" | "Diamond";

export type RewardMode = "RecurringInvestment" | "RealTimeBatch";
export type CompoundStrategy = "Simple" | "Compound";
export type BatchFrequency = "Instant" | "Hourly" | "Daily";

export interface RewardPreferences {
  mode: RewardMode;
  /** Share of each distribution reinvested into the stake (0-100) */
  reinvestmentPercentage: number;
  compoundStrategy: CompoundStrategy;
  /** Minimum accumulated rewards before a batch payout */
  batchSize: bigint;
  batchFrequency: BatchFrequency;
  payoutThreshold: bigint;
  autoCompound: boolean;
}

/** Kinked utilization model, annualized basis points */
export interface InterestRateModel {
  baseRateBps: number;
  multiplierBps: number;
  jumpMultiplierBps: number;
  kinkBps: number;
}

export interface MarketState {
  address: string;
  authority: string;
  totalDeposits: bigint;
  totalBorrows: bigint;
  interestRateModel: InterestRateModel;
  /** Share of borrow interest kept by the protocol, basis points */
  reserveFactorBps: number;
  permanentAccount: string;
  maxUsers: number;
  currentUsers: number;
  stakingBaseRateBps: number;
  /** Decimals of the staked asset, used for whole-unit loyalty scores */
  assetDecimals: number;
  totalStaked: bigint;
  totalRewardsPaid: bigint;
  lastTierEpochTime: number;
  createdAt: number;
}

export interface ReserveState {
  address: string;
  market: string;
  mint: string;
  ltvRatioBps: number;
  liquidationThresholdBps: number;
  liquidationPenaltyBps: number;
  /** Includes accrued interest and protocolFees */
  totalDeposits: bigint;
  totalBorrows: bigint;
  /** WAD-scaled, starts at 1.0 */
  borrowIndex: bigint;
  /** WAD-scaled, starts at 1.0 */
  depositIndex: bigint;
  /** Reserve-factor share of interest owned by the protocol sink */
  protocolFees: bigint;
  /** Non-zero only while a flash loan against this reserve is open */
  flashLoanOutstanding: bigint;
  lastAccrualTime: number;
}

export interface PositionEntry {
  reserve: string;
  principal: bigint;
  indexAtOpen: bigint;
}

export interface UserAccountState {
  owner: string;
  /** Ordered by reserve address, one entry per reserve */
  deposits: PositionEntry[];
  /** Ordered by reserve address, one entry per reserve */
  borrows: PositionEntry[];

  stakeAmount: bigint;
  stakeStartTime: number;
  lockDurationDays: number;
  intendedEndTime: number;
  tier: Tier;
  /** Batch accumulator for RealTimeBatch mode */
  accumulatedRewards: bigint;
  totalRewardsReceived: bigint;
  lastPayoutTime: number;
  lastRewardAccrualTime: number;
  /** Tier-pool credit awaiting the next distribution */
  redistributionCredit: bigint;
  /** Tier-pool contribution netted against future rewards */
  rewardDebt: bigint;
  rewardPreferences: RewardPreferences | null;
  liquidDerivativeAmount: bigint;
  leveragePosition: string | null;

  interactionCount: number;
  createdAt: number;
}

/**
 * Protocol-owned sink for early-exit penalties. The engine only ever credits
 * it; there is no operation that withdraws from it.
 */
export interface PermanentAccountState {
  address: string;
  totalPenalties: bigint;
  penaltyCount: number;
  lastCreditTime: number;
}

export interface LedgerState {
  market: MarketState;
  reserves: Map<string, ReserveState>;
  users: Map<string, UserAccountState>;
  permanentAccount: PermanentAccountState;
}
