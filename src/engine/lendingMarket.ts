import type { PublicKey } from "@solana/web3.js";
import type {
  InterestRateModel,
  LedgerState,
  MarketState,
  PermanentAccountState,
  ReserveState,
  UserAccountState,
} from "./types.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { UnitOfWork } from "./unitOfWork.js";
import type { RunOptions, UnitContext } from "./unitOfWork.js";
import { LendingError } from "./errors.js";
import {
  addReserveIn,
  borrowIn,
  depositIn,
  healthOf,
  liquidateIn,
  refreshReserves,
  repayIn,
  updateReserveConfigIn,
  withdrawIn,
} from "./lendingOps.js";
import type { LiquidationResult, PositionReceipt, RepayReceipt, ReserveConfigInput } from "./lendingOps.js";
import type { HealthFactorResult } from "../math/health.js";
import { flashLoanIn } from "../flashloan/flashLoanExecutor.js";
import type { FlashLoanReceipt, FlashLoanStrategy } from "../flashloan/flashLoanExecutor.js";
import { multiplyStrategy } from "../flashloan/multiplyStrategy.js";
import { distributeRewardsIn } from "../staking/rewardDistributor.js";
import type { DistributionReceipt } from "../staking/rewardDistributor.js";
import { distributeTierPoolIn, setRewardPreferencesIn, stakeIn, withdrawStakeIn } from "../staking/stakingOps.js";
import type { StakeReceipt, StakeWithdrawalReceipt } from "../staking/stakingOps.js";
import type { RewardPreferencesInput } from "../staking/preferences.js";
import type { TierRedistributionPlan } from "../staking/tierEngine.js";
import type { Capabilities } from "../adapters/capabilities.js";
import type { Env } from "../config/env.js";
import { addressSafe, deriveMarketAddress, derivePermanentAccountAddress } from "../solana/address.js";
import { logger } from "../observability/logger.js";

type Address = PublicKey | string;

/** A strategy reaching back into the market for another loan is re-entrancy */
const FLASH_LOAN_UNIT: RunOptions = { reentrantCode: "ReentrantFlashLoan" };

export interface MarketParams {
  authority: Address;
  interestRateModel: InterestRateModel;
  reserveFactorBps: number;
  maxUsers: number;
  stakingBaseRateBps: number;
  assetDecimals: number;
}

export interface MarketDeps {
  capabilities: Capabilities;
  clock?: Clock;
  programId: string;
}

export function marketParamsFromEnv(env: Env, authority: Address): MarketParams {
  return {
    authority,
    interestRateModel: {
      baseRateBps: env.INTEREST_BASE_RATE_BPS,
      multiplierBps: env.INTEREST_MULTIPLIER_BPS,
      jumpMultiplierBps: env.INTEREST_JUMP_MULTIPLIER_BPS,
      kinkBps: env.INTEREST_KINK_BPS,
    },
    reserveFactorBps: env.RESERVE_FACTOR_BPS,
    maxUsers: env.MARKET_MAX_USERS,
    stakingBaseRateBps: env.STAKING_BASE_RATE_BPS,
    assetDecimals: env.ASSET_DECIMALS,
  };
}

function validateParams(p: MarketParams): void {
  const m = p.interestRateModel;
  const bps = [m.baseRateBps, m.multiplierBps, m.jumpMultiplierBps, p.stakingBaseRateBps];
  if (!bps.every(v => Number.isInteger(v) && v >= 0)) {
    throw new LendingError("InvalidParameter", "interest and staking rates must be non-negative integer bps");
  }
  if (!Number.isInteger(m.kinkBps) || m.kinkBps < 1 || m.kinkBps > 10_000) {
    throw new LendingError("InvalidParameter", `kink ${m.kinkBps} outside [1, 10000]`);
  }
  if (!Number.isInteger(p.reserveFactorBps) || p.reserveFactorBps < 0 || p.reserveFactorBps > 10_000) {
    throw new LendingError("InvalidParameter", `reserve factor ${p.reserveFactorBps} outside [0, 10000]`);
  }
  if (!Number.isInteger(p.maxUsers) || p.maxUsers < 1) {
    throw new LendingError("InvalidParameter", `max users ${p.maxUsers} must be a positive integer`);
  }
  if (!Number.isInteger(p.assetDecimals) || p.assetDecimals < 0 || p.assetDecimals > 18) {
    throw new LendingError("InvalidParameter", `asset decimals ${p.assetDecimals} outside [0, 18]`);
  }
}

/**
 * Lending market with its reserves, user accounts, staking subsystem and
 * permanent penalty account.
 *
 * Every mutating method is one unit of work: it accrues all reserves to the
 * clock's current time, applies its changes to a private draft, and commits
 * only if nothing threw. Calls are served in the order they were made, and
 * every one of them settles as a resolved or rejected promise, bad addresses
 * included. Calls made from inside a running unit (e.g. by a flash-loan
 * strategy) are rejected; strategies act through their scope instead.
 */
export class LendingMarket {
  private readonly uow: UnitOfWork;
  private readonly clock: Clock;
  private readonly capabilities: Capabilities;
  private readonly programId: string;

  private constructor(initial: LedgerState, deps: MarketDeps) {
    this.uow = new UnitOfWork(initial);
    this.clock = deps.clock ?? systemClock;
    this.capabilities = deps.capabilities;
    this.programId = deps.programId;
  }

  static create(params: MarketParams, deps: MarketDeps): LendingMarket {
    validateParams(params);
    const programId = addressSafe(deps.programId, "programId");
    const authority = addressSafe(params.authority, "market.authority");
    const now = (deps.clock ?? systemClock).nowSeconds();

    const address = deriveMarketAddress(authority, programId);
    const permanentAccount = derivePermanentAccountAddress(address, programId);
    const market: MarketState = {
      address,
      authority,
      totalDeposits: 0n,
      totalBorrows: 0n,
      interestRateModel: { ...params.interestRateModel },
      reserveFactorBps: params.reserveFactorBps,
      permanentAccount,
      maxUsers: params.maxUsers,
      currentUsers: 0,
      stakingBaseRateBps: params.stakingBaseRateBps,
      assetDecimals: params.assetDecimals,
      totalStaked: 0n,
      totalRewardsPaid: 0n,
      lastTierEpochTime: now,
      createdAt: now,
    };

    logger.info({ event: "market_created", market: address, authority, permanentAccount }, "market created");

    return new LendingMarket(
      {
        market,
        reserves: new Map(),
        users: new Map(),
        permanentAccount: { address: permanentAccount, totalPenalties: 0n, penaltyCount: 0, lastCreditTime: 0 },
      },
      { ...deps, programId }
    );
  }

  private run<T>(label: string, fn: (ctx: UnitContext) => T | Promise<T>, opts?: RunOptions): Promise<T> {
    return this.uow.run(label, () => this.clock.nowSeconds(), fn, opts);
  }

  // ---------------------------------------------------------------------------
  // reserves (authority)

  async addReserve(authority: Address, mint: Address, config: ReserveConfigInput): Promise<ReserveState> {
    const signer = addressSafe(authority, "addReserve.authority");
    const mintAddress = addressSafe(mint, "addReserve.mint");
    return this.run("add_reserve", ctx => ({ ...addReserveIn(ctx, signer, mintAddress, config, this.programId) }));
  }

  async updateReserveConfig(authority: Address, reserve: Address, config: ReserveConfigInput): Promise<ReserveState> {
    const signer = addressSafe(authority, "updateReserveConfig.authority");
    const target = addressSafe(reserve, "updateReserveConfig.reserve");
    return this.run("update_reserve_config", ctx => ({ ...updateReserveConfigIn(ctx, signer, target, config) }));
  }

  // ---------------------------------------------------------------------------
  // lending

  async deposit(owner: Address, reserve: Address, amount: bigint): Promise<PositionReceipt> {
    const o = addressSafe(owner, "deposit.owner");
    const r = addressSafe(reserve, "deposit.reserve");
    return this.run("deposit", ctx => depositIn(ctx, o, r, amount));
  }

  async borrow(owner: Address, reserve: Address, amount: bigint): Promise<PositionReceipt> {
    const o = addressSafe(owner, "borrow.owner");
    const r = addressSafe(reserve, "borrow.reserve");
    return this.run("borrow", ctx => borrowIn(ctx, o, r, amount));
  }

  /** Repays up to the outstanding debt; the receipt holds what was applied */
  async repay(owner: Address, reserve: Address, amount: bigint): Promise<RepayReceipt> {
    const o = addressSafe(owner, "repay.owner");
    const r = addressSafe(reserve, "repay.reserve");
    return this.run("repay", ctx => repayIn(ctx, o, r, amount));
  }

  async withdraw(owner: Address, reserve: Address, amount: bigint): Promise<PositionReceipt> {
    const o = addressSafe(owner, "withdraw.owner");
    const r = addressSafe(reserve, "withdraw.reserve");
    return this.run("withdraw", ctx => withdrawIn(ctx, o, r, amount));
  }

  async liquidate(liquidator: Address, target: Address, reserve: Address, repayAmount: bigint): Promise<LiquidationResult> {
    const l = addressSafe(liquidator, "liquidate.liquidator");
    const t = addressSafe(target, "liquidate.target");
    const r = addressSafe(reserve, "liquidate.reserve");
    return this.run("liquidate", ctx => liquidateIn(ctx, l, t, r, repayAmount));
  }

  async flashLoan(
    borrower: Address,
    reserve: Address,
    amount: bigint,
    fee: bigint,
    strategy: FlashLoanStrategy
  ): Promise<FlashLoanReceipt> {
    const b = addressSafe(borrower, "flashLoan.borrower");
    const r = addressSafe(reserve, "flashLoan.reserve");
    return this.run("flash_loan", ctx => flashLoanIn(ctx, b, r, amount, fee, strategy), FLASH_LOAN_UNIT);
  }

  /**
   * Flash-funded leverage: +amount collateral and +(amount + fee) debt for
   * `owner` in one unit
   */
  async multiply(owner: Address, reserve: Address, amount: bigint, fee: bigint): Promise<FlashLoanReceipt> {
    const o = addressSafe(owner, "multiply.owner");
    const r = addressSafe(reserve, "multiply.reserve");
    return this.run("multiply", ctx => flashLoanIn(ctx, o, r, amount, fee, multiplyStrategy(o)), FLASH_LOAN_UNIT);
  }

  // ---------------------------------------------------------------------------
  // staking

  async stakeWithImmediateLiquidity(
    owner: Address,
    amount: bigint,
    lockDurationDays?: number,
    enableLeverage = false
  ): Promise<StakeReceipt> {
    const o = addressSafe(owner, "stake.owner");
    return this.run("stake_with_immediate_liquidity", ctx =>
      stakeIn(ctx, { owner: o, amount, lockDurationDays, enableLeverage }, this.capabilities)
    );
  }

  async withdrawWithImmediateLiquidity(owner: Address): Promise<StakeWithdrawalReceipt> {
    const o = addressSafe(owner, "withdrawStake.owner");
    return this.run("withdraw_with_immediate_liquidity", ctx => withdrawStakeIn(ctx, o, this.capabilities));
  }

  async setRewardPreferences(owner: Address, preferences: RewardPreferencesInput | null): Promise<void> {
    const o = addressSafe(owner, "setRewardPreferences.owner");
    return this.run("set_reward_preferences", ctx => setRewardPreferencesIn(ctx, o, preferences));
  }

  async distributeRewards(owner: Address): Promise<DistributionReceipt> {
    const o = addressSafe(owner, "distributeRewards.owner");
    return this.run("distribute_rewards", ctx => distributeRewardsIn(ctx, o, this.capabilities));
  }

  async distributeTierPool(authority: Address): Promise<TierRedistributionPlan> {
    const signer = addressSafe(authority, "distributeTierPool.authority");
    return this.run("distribute_tier_pool", ctx => distributeTierPoolIn(ctx, signer));
  }

  // ---------------------------------------------------------------------------
  // queries (committed state, copies)

  getMarket(): MarketState {
    return this.uow.read().market;
  }

  getReserve(address: Address): ReserveState | undefined {
    return this.uow.read().reserves.get(addressSafe(address, "reserve"));
  }

  getReserves(): ReserveState[] {
    return [...this.uow.read().reserves.values()];
  }

  getUserAccount(owner: Address): UserAccountState | undefined {
    return this.uow.read().users.get(addressSafe(owner, "owner"));
  }

  getPermanentAccount(): PermanentAccountState {
    return this.uow.read().permanentAccount;
  }

  /**
   * Health factor as of the clock's current time; accrues on a throwaway copy
   */
  healthOf(owner: Address): HealthFactorResult {
    const view = this.uow.read();
    refreshReserves(view, this.clock.nowSeconds());
    return healthOf(view, addressSafe(owner, "owner"));
  }

  get unitStats(): { committed: number; rejected: number } {
    return this.uow.stats;
  }
}
