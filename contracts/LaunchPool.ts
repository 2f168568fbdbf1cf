import { ensure, LaunchPoolError } from "./errors";
import type { LaunchPoolEventBus } from "./events";
import type { IAssetLedger } from "./interfaces/IAssetLedger";
import { NATIVE_ASSET } from "./interfaces/IAssetLedger";
import type { IClock } from "./interfaces/IClock";
import type { ILaunchPoolHost } from "./interfaces/ILaunchPoolHost";
import { sameAddress, toAddress } from "./libraries/AddressUtils";
import { ReentrancyGuard } from "./libraries/ReentrancyGuard";
import {
  advance,
  calculateRewardPerSecond,
  pendingOf,
  precisionFactorFor,
  rewardDebtOf,
  type RewardWindow,
} from "./libraries/RewardMath";
import { createLogger, type Logger } from "./logger";
import type { Address, DepositOptions, PoolVariant, ProjectTimes, UserInfo } from "./types";
import { ProjectStatus } from "./types";

export interface LaunchPoolDeps {
  address: Address;
  version: PoolVariant;
  host: ILaunchPoolHost;
  ledger: IAssetLedger;
  clock: IClock;
  events: LaunchPoolEventBus;
}

export interface LaunchPoolInitParams {
  projectId: bigint;
  stakedAsset: Address;
  poolRewardAmount: bigint;
  rewardPerSecond: bigint;
  /** 0 disables the per-user limit */
  poolLimitPerUser: bigint;
  minStakeAmount: bigint;
}

interface PoolConfig {
  projectId: bigint;
  stakedAsset: Address;
  poolRewardAmount: bigint;
  precisionFactor: bigint;
}

interface PoolState {
  rewardPerSecond: bigint;
  accRewardPerShare: bigint;
  lastRewardTime: number;
  hasUserLimit: boolean;
  poolLimitPerUser: bigint;
  minStakeAmount: bigint;
  totalStaked: bigint;
  totalRewardsPaid: bigint;
  /** Part of the commitment released to the owner by sweeps after the end */
  sweptCommitment: bigint;
  users: Map<Address, UserInfo>;
}

const DEPOSIT_STATUSES = [ProjectStatus.READY, ProjectStatus.ACTIVE] as const;
const WITHDRAW_STATUSES = [
  ProjectStatus.READY,
  ProjectStatus.ACTIVE,
  ProjectStatus.ENDED,
  ProjectStatus.PAUSED,
  ProjectStatus.DELISTED,
] as const;
const CLAIM_STATUSES = [ProjectStatus.ENDED] as const;
const EMERGENCY_STATUSES = [ProjectStatus.PAUSED, ProjectStatus.DELISTED] as const;
const CONFIG_STATUSES = [ProjectStatus.READY] as const;
const RECOVERY_STATUSES = [ProjectStatus.PAUSED, ProjectStatus.DELISTED] as const;
const STOP_STATUSES = [ProjectStatus.READY, ProjectStatus.ACTIVE] as const;
const EMERGENCY_REWARD_STATUSES = [ProjectStatus.PAUSED, ProjectStatus.DELISTED] as const;

/**
 * A single staking pool inside a project.
 *
 * Users stake `stakedAsset` and earn the project's reward asset at
 * `rewardPerSecond`, shared pro rata through `accRewardPerShare`. Every
 * balance change first advances the accumulator, then credits the caller's
 * pending rewards, then moves the balance, then resets `rewardDebt`; the
 * ledger is only touched once all of that is settled.
 *
 * Which operations are open depends on the project's display status (see
 * {@link ProjectStatus}); ownership is always the project's current owner.
 */
export class LaunchPool {
  readonly address: Address;
  readonly version: PoolVariant;

  private readonly host: ILaunchPoolHost;
  private readonly ledger: IAssetLedger;
  private readonly clock: IClock;
  private readonly events: LaunchPoolEventBus;
  private readonly guard: ReentrancyGuard<PoolState>;
  private readonly log: Logger;

  private config: PoolConfig | null = null;
  private state: PoolState = {
    rewardPerSecond: 0n,
    accRewardPerShare: 0n,
    lastRewardTime: 0,
    hasUserLimit: false,
    poolLimitPerUser: 0n,
    minStakeAmount: 0n,
    totalStaked: 0n,
    totalRewardsPaid: 0n,
    sweptCommitment: 0n,
    users: new Map(),
  };

  constructor(deps: LaunchPoolDeps) {
    this.address = deps.address;
    this.version = deps.version;
    this.host = deps.host;
    this.ledger = deps.ledger;
    this.clock = deps.clock;
    this.events = deps.events;
    this.guard = new ReentrancyGuard<PoolState>(
      () => structuredClone(this.state),
      (saved) => {
        this.state = saved;
      }
    );
    this.log = createLogger("LaunchPool", { pool: deps.address });
  }

  initialize(params: LaunchPoolInitParams): void {
    ensure(this.config === null, "AlreadyInitialized", "Already initialized");
    ensure(params.poolRewardAmount > 0n, "InvalidAmount", "Pool reward amount must be positive");
    ensure(params.rewardPerSecond > 0n, "InvalidAmount", "Reward per second must be positive");
    ensure(params.poolLimitPerUser >= 0n && params.minStakeAmount >= 0n, "InvalidAmount", "Negative limit");

    const rewardDecimals = this.ledger.decimalsOf(this.host.getProjectRewardAsset(params.projectId));
    let precisionFactor: bigint;
    try {
      precisionFactor = precisionFactorFor(rewardDecimals);
    } catch (error) {
      throw new LaunchPoolError("InvalidPrecision", "Reward asset has too many decimals", { cause: error });
    }

    const { startTime } = this.host.getProjectTimes(params.projectId);
    this.config = {
      projectId: params.projectId,
      stakedAsset: toAddress(params.stakedAsset, "stakedAsset"),
      poolRewardAmount: params.poolRewardAmount,
      precisionFactor,
    };
    this.state.rewardPerSecond = params.rewardPerSecond;
    this.state.lastRewardTime = startTime;
    this.state.hasUserLimit = params.poolLimitPerUser > 0n;
    this.state.poolLimitPerUser = params.poolLimitPerUser;
    this.state.minStakeAmount = params.minStakeAmount;

    this.log.debug(
      { projectId: params.projectId, rewardPerSecond: params.rewardPerSecond, precisionFactor },
      "pool initialized"
    );
  }

  // ---------------------------------------------------------------------------
  // User operations
  // ---------------------------------------------------------------------------

  /**
   * Stakes `amount`. A zero amount only checkpoints: pending rewards move into
   * the carry bucket and no limit applies.
   */
  deposit(caller: Address, amount: bigint, options: DepositOptions = {}): void {
    this.guard.run(() => {
      const user = toAddress(caller, "caller");
      this.requireStatus(DEPOSIT_STATUSES, "Pool not active");
      ensure(amount >= 0n, "InvalidAmount", "Negative amount");

      const value = options.value ?? 0n;
      if (this.isNativePool) {
        ensure(value === amount, "InvalidNativeValue", "Invalid ETH amount");
      } else {
        ensure(value === 0n, "InvalidNativeValue", "Not ETH pool");
      }

      const info = this.userInfoOf(user);
      if (amount > 0n) {
        ensure(amount >= this.state.minStakeAmount, "BelowMinStake", "Amount below minimum stake");
        if (this.state.hasUserLimit) {
          ensure(
            amount + info.amount <= this.state.poolLimitPerUser,
            "UserLimitExceeded",
            "User amount above limit"
          );
        }
      }

      const acc = this.updatePool();
      this.creditPending(info, acc);
      info.amount += amount;
      this.state.totalStaked += amount;
      info.rewardDebt = rewardDebtOf(info.amount, acc, this.requireConfig().precisionFactor);
      this.state.users.set(user, info);

      if (amount > 0n) {
        this.transfer(() => this.ledger.pull(this.stakedAsset, user, this.address, amount));
      }

      this.log.debug({ user, amount, totalStaked: this.state.totalStaked }, "deposit");
      this.guard.afterCommit(() => this.events.emit("Deposit", { pool: this.address, user, amount }));
    });
  }

  withdraw(caller: Address, amount: bigint): void {
    this.guard.run(() => {
      const user = toAddress(caller, "caller");
      this.requireStatus(WITHDRAW_STATUSES, "Pool not withdrawable");
      ensure(amount >= 0n, "InvalidAmount", "Negative amount");

      const info = this.userInfoOf(user);
      ensure(info.amount >= amount, "InsufficientBalance", "Amount to withdraw too high");

      const acc = this.updatePool();
      this.creditPending(info, acc);
      info.amount -= amount;
      this.state.totalStaked -= amount;
      info.rewardDebt = rewardDebtOf(info.amount, acc, this.requireConfig().precisionFactor);
      this.state.users.set(user, info);

      if (amount > 0n) {
        this.transfer(() => this.ledger.push(this.stakedAsset, this.address, user, amount));
      }

      this.log.debug({ user, amount, totalStaked: this.state.totalStaked }, "withdraw");
      this.guard.afterCommit(() => this.events.emit("Withdraw", { pool: this.address, user, amount }));
    });
  }

  /** Pays out carried and live rewards. Only once the project has ended. */
  claimReward(caller: Address): bigint {
    return this.guard.run(() => {
      const user = toAddress(caller, "caller");
      this.requireStatus(CLAIM_STATUSES, "Pool not ended");

      const info = this.userInfoOf(user);
      const acc = this.updatePool();
      this.creditPending(info, acc);
      const reward = info.pendingRewards;
      ensure(reward > 0n, "NoRewardsToClaim", "No rewards to claim");

      info.pendingRewards = 0n;
      info.rewardDebt = rewardDebtOf(info.amount, acc, this.requireConfig().precisionFactor);
      this.state.users.set(user, info);
      this.state.totalRewardsPaid += reward;

      this.transfer(() => this.ledger.push(this.rewardAsset, this.address, user, reward));

      this.log.info({ user, reward }, "reward claimed");
      this.guard.afterCommit(() => this.events.emit("RewardClaimed", { pool: this.address, user, amount: reward }));
      return reward;
    });
  }

  /** Returns the whole stake and forfeits every unclaimed reward. */
  emergencyWithdraw(caller: Address): bigint {
    return this.guard.run(() => {
      const user = toAddress(caller, "caller");
      this.requireStatus(EMERGENCY_STATUSES, "Pool not paused or delisted");

      const info = this.userInfoOf(user);
      const amount = info.amount;
      ensure(amount > 0n, "InsufficientBalance", "Nothing staked");

      // the shared accumulator still has to reflect this stake up to now
      this.updatePool();
      this.state.totalStaked -= amount;
      this.state.users.set(user, { amount: 0n, rewardDebt: 0n, pendingRewards: 0n });

      this.transfer(() => this.ledger.push(this.stakedAsset, this.address, user, amount));

      this.log.warn({ user, amount }, "emergency withdraw");
      this.guard.afterCommit(() => this.events.emit("EmergencyWithdraw", { pool: this.address, user, amount }));
      return amount;
    });
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  pendingReward(user: Address): bigint {
    const info = this.state.users.get(toAddress(user, "user"));
    if (!info) return 0n;
    const config = this.requireConfig();
    const { accRewardPerShare } = advance(
      { accRewardPerShare: this.state.accRewardPerShare, lastRewardTime: this.state.lastRewardTime },
      this.rewardWindow(),
      this.state.totalStaked,
      this.clock.now()
    );
    return pendingOf(info.amount, info.rewardDebt, info.pendingRewards, accRewardPerShare, config.precisionFactor);
  }

  getUserInfo(user: Address): UserInfo {
    return { ...this.userInfoOf(toAddress(user, "user")) };
  }

  /** Users that have ever interacted with the pool. */
  getUsers(): Address[] {
    return [...this.state.users.keys()];
  }

  getProjectTimes(): ProjectTimes {
    return this.host.getProjectTimes(this.projectId);
  }

  getStatus(): ProjectStatus {
    return this.host.getProjectStatus(this.projectId);
  }

  get isInitialized(): boolean {
    return this.config !== null;
  }

  get projectId(): bigint {
    return this.requireConfig().projectId;
  }

  get stakedAsset(): Address {
    return this.requireConfig().stakedAsset;
  }

  get rewardAsset(): Address {
    return this.host.getProjectRewardAsset(this.projectId);
  }

  get isNativePool(): boolean {
    return sameAddress(this.stakedAsset, NATIVE_ASSET);
  }

  get poolRewardAmount(): bigint {
    return this.requireConfig().poolRewardAmount;
  }

  get precisionFactor(): bigint {
    return this.requireConfig().precisionFactor;
  }

  get rewardPerSecond(): bigint {
    return this.state.rewardPerSecond;
  }

  get accRewardPerShare(): bigint {
    return this.state.accRewardPerShare;
  }

  get lastRewardTime(): number {
    return this.state.lastRewardTime;
  }

  get totalStaked(): bigint {
    return this.state.totalStaked;
  }

  get totalRewardsPaid(): bigint {
    return this.state.totalRewardsPaid;
  }

  get hasUserLimit(): boolean {
    return this.state.hasUserLimit;
  }

  get poolLimitPerUser(): bigint {
    return this.state.poolLimitPerUser;
  }

  get minStakeAmount(): bigint {
    return this.state.minStakeAmount;
  }

  /**
   * Reward the pool still has to be able to pay: the funded commitment (capped
   * by what the current window can emit) minus what has been paid out and
   * what sweeps handed back to the owner.
   */
  outstandingRewardCommitment(): bigint {
    const { startTime, endTime } = this.getProjectTimes();
    const emittable = endTime > startTime ? BigInt(endTime - startTime) * this.state.rewardPerSecond : 0n;
    const committed = emittable < this.poolRewardAmount ? emittable : this.poolRewardAmount;
    const settled = this.state.totalRewardsPaid + this.state.sweptCommitment;
    return committed > settled ? committed - settled : 0n;
  }

  /** Commitment handed back to the owner by sweeps after the end. */
  get sweptCommitment(): bigint {
    return this.state.sweptCommitment;
  }

  rewardBalance(): bigint {
    return this.ledger.balanceOf(this.rewardAsset, this.address);
  }

  isSolvent(): boolean {
    return this.rewardBalance() >= this.outstandingRewardCommitment();
  }

  /** Amount a funding transfer must bring to make the pool solvent. */
  requiredFunding(): bigint {
    const outstanding = this.outstandingRewardCommitment();
    const balance = this.rewardBalance();
    return outstanding > balance ? outstanding - balance : 0n;
  }

  // ---------------------------------------------------------------------------
  // Project owner operations
  // ---------------------------------------------------------------------------

  updateMinStakeAmount(caller: Address, minStakeAmount: bigint): void {
    this.guard.run(() => {
      this.requireProjectOwner(caller);
      this.requireStatus(CONFIG_STATUSES, "Pool not in ready state");
      ensure(minStakeAmount >= 0n, "InvalidAmount", "Negative minimum stake");

      this.state.minStakeAmount = minStakeAmount;
      this.log.info({ minStakeAmount }, "minimum stake updated");
      this.guard.afterCommit(() => this.events.emit("NewMinStakeAmount", { pool: this.address, minStakeAmount }));
    });
  }

  updatePoolLimitPerUser(caller: Address, hasUserLimit: boolean, poolLimitPerUser: bigint): void {
    this.guard.run(() => {
      this.requireProjectOwner(caller);
      this.requireStatus(CONFIG_STATUSES, "Pool not in ready state");

      if (hasUserLimit) {
        ensure(poolLimitPerUser > 0n, "InvalidAmount", "Limit must be positive");
        if (this.state.hasUserLimit) {
          ensure(poolLimitPerUser > this.state.poolLimitPerUser, "InvalidAmount", "New limit must be higher");
        }
        this.state.poolLimitPerUser = poolLimitPerUser;
      } else {
        this.state.poolLimitPerUser = 0n;
      }
      this.state.hasUserLimit = hasUserLimit;

      const limit = this.state.poolLimitPerUser;
      this.log.info({ hasUserLimit, poolLimitPerUser: limit }, "user limit updated");
      this.guard.afterCommit(() =>
        this.events.emit("NewPoolLimit", { pool: this.address, hasUserLimit, poolLimitPerUser: limit })
      );
    });
  }

  updateRewardPerSecond(caller: Address, rewardPerSecond: bigint): void {
    this.guard.run(() => {
      this.requireProjectOwner(caller);
      this.requireStatus(CONFIG_STATUSES, "Pool not in ready state");
      ensure(this.clock.now() < this.getProjectTimes().startTime, "PoolHasStarted", "Pool has started");
      ensure(rewardPerSecond > 0n, "InvalidAmount", "Reward per second must be positive");

      this.state.rewardPerSecond = rewardPerSecond;
      this.log.info({ rewardPerSecond }, "reward rate updated");
      this.guard.afterCommit(() => this.events.emit("NewRewardPerSecond", { pool: this.address, rewardPerSecond }));
    });
  }

  /** Sweeps an asset sent here by mistake; never the staked or the reward asset. */
  recoverWrongTokens(caller: Address, asset: Address, amount: bigint): void {
    this.guard.run(() => {
      const owner = this.requireProjectOwner(caller);
      this.requireStatus(RECOVERY_STATUSES, "Pool not paused or delisted");
      const token = toAddress(asset, "asset");
      ensure(
        !sameAddress(token, this.stakedAsset) && !sameAddress(token, this.rewardAsset),
        "InvalidAsset",
        "Cannot recover staked or reward token"
      );
      ensure(amount > 0n, "InvalidAmount", "Nothing to recover");

      this.transfer(() => this.ledger.push(token, this.address, owner, amount));

      this.log.info({ asset: token, amount }, "wrong tokens recovered");
      this.guard.afterCommit(() => this.events.emit("AdminTokenRecovery", { pool: this.address, asset: token, amount }));
    });
  }

  /**
   * Takes reward asset out of a paused or delisted pool. The commitment is
   * unchanged, so resuming the project reopens funding for what was taken.
   */
  emergencyRewardWithdraw(caller: Address, amount: bigint): void {
    this.guard.run(() => {
      const owner = this.requireProjectOwner(caller);
      this.requireStatus(EMERGENCY_REWARD_STATUSES, "Pool not paused or delisted");
      ensure(amount > 0n, "InvalidAmount", "Nothing to withdraw");

      this.transfer(() => this.ledger.push(this.rewardAsset, this.address, owner, amount));

      this.log.warn({ amount }, "emergency reward withdraw");
      this.guard.afterCommit(() => this.events.emit("EmergencyRewardWithdraw", { pool: this.address, amount }));
    });
  }

  /**
   * Re-reads the project window after it was moved before the start: the
   * checkpoint goes to the new start and the rate is derived again from the
   * pool reward. Does nothing once the window has started.
   */
  syncRewardWindow(): void {
    this.guard.run(() => {
      const { startTime, endTime } = this.getProjectTimes();
      if (this.clock.now() >= startTime || endTime <= startTime) return;

      const rewardPerSecond = calculateRewardPerSecond(this.poolRewardAmount, startTime, endTime);
      this.state.lastRewardTime = startTime;
      this.state.rewardPerSecond = rewardPerSecond;
      this.log.info({ startTime, endTime, rewardPerSecond }, "reward window moved");
    });
  }

  /** Ends the project's reward window now. Stakes stay in place. */
  stopReward(caller: Address): void {
    this.guard.run(() => {
      this.requireProjectOwner(caller);
      this.requireStatus(STOP_STATUSES, "Pool not ready or active");

      const now = this.clock.now();
      this.updatePool();
      this.host.stopProjectRewards(this.projectId, now);

      this.log.info({ endTime: now }, "rewards stopped");
      this.guard.afterCommit(() =>
        this.events.emit("RewardsStopped", { pool: this.address, projectId: this.projectId, endTime: now })
      );
    });
  }

  /**
   * After the end, sends the project owner every reward unit not owed to a
   * user: rounding dust, forfeited rewards and the unused part of a stopped
   * window.
   */
  withdrawRemainingRewards(caller: Address): bigint {
    return this.guard.run(() => {
      const owner = this.requireProjectOwner(caller);
      this.requireStatus(CLAIM_STATUSES, "Pool not ended");

      const acc = this.updatePool();
      const { precisionFactor } = this.requireConfig();
      let owed = 0n;
      for (const info of this.state.users.values()) {
        owed += pendingOf(info.amount, info.rewardDebt, info.pendingRewards, acc, precisionFactor);
      }

      const balance = this.rewardBalance();
      ensure(balance > owed, "NoRewardsToClaim", "No remaining rewards");
      const remaining = balance - owed;
      // only the committed part nobody is owed leaves the commitment
      const outstanding = this.outstandingRewardCommitment();
      if (outstanding > owed) {
        this.state.sweptCommitment += outstanding - owed;
      }

      this.transfer(() => this.ledger.push(this.rewardAsset, this.address, owner, remaining));

      this.log.info({ remaining, owed }, "remaining rewards withdrawn");
      this.guard.afterCommit(() =>
        this.events.emit("RemainingRewardsWithdrawn", { pool: this.address, amount: remaining })
      );
      return remaining;
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private requireConfig(): PoolConfig {
    if (!this.config) {
      throw new LaunchPoolError("PoolNotFound", `Pool ${this.address} is not initialized`);
    }
    return this.config;
  }

  private rewardWindow(): RewardWindow {
    const { startTime, endTime } = this.getProjectTimes();
    return {
      rewardPerSecond: this.state.rewardPerSecond,
      startTime,
      endTime,
      precisionFactor: this.requireConfig().precisionFactor,
      rewardCap: this.requireConfig().poolRewardAmount,
    };
  }

  /** Advances the accumulator to now and returns its new value. */
  private updatePool(): bigint {
    const next = advance(
      { accRewardPerShare: this.state.accRewardPerShare, lastRewardTime: this.state.lastRewardTime },
      this.rewardWindow(),
      this.state.totalStaked,
      this.clock.now()
    );
    this.state.accRewardPerShare = next.accRewardPerShare;
    this.state.lastRewardTime = next.lastRewardTime;
    return next.accRewardPerShare;
  }

  /** Moves everything accrued since the last checkpoint into the carry bucket. */
  private creditPending(info: UserInfo, acc: bigint): void {
    const { precisionFactor } = this.requireConfig();
    info.pendingRewards = pendingOf(info.amount, info.rewardDebt, info.pendingRewards, acc, precisionFactor);
    info.rewardDebt = rewardDebtOf(info.amount, acc, precisionFactor);
  }

  private userInfoOf(user: Address): UserInfo {
    const info = this.state.users.get(user);
    return info ? { ...info } : { amount: 0n, rewardDebt: 0n, pendingRewards: 0n };
  }

  private requireStatus(allowed: readonly ProjectStatus[], reason: string): void {
    const status = this.getStatus();
    ensure(allowed.includes(status), "InvalidStatus", `${reason} (status ${ProjectStatus[status]})`);
  }

  private requireProjectOwner(caller: Address): Address {
    const owner = this.host.getProjectOwner(this.projectId);
    ensure(sameAddress(toAddress(caller, "caller"), owner), "NotProjectOwner", "Not project owner");
    return owner;
  }

  private transfer(move: () => void): void {
    try {
      move();
    } catch (error) {
      if (error instanceof LaunchPoolError) throw error;
      throw new LaunchPoolError("TransferFailed", error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
  }
}
