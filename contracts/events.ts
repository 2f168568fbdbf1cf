import { EventEmitter } from "node:events";
import type { Address, FactoryPolicy, PoolVariant, ProjectMetadata, ProjectStatus } from "./types";

/**
 * Notifications for external indexers. Listeners run synchronously after the
 * emitting operation has committed; no component reads them back.
 */
export interface LaunchPoolEvents {
  OwnershipTransferred: { previousOwner: Address; newOwner: Address };
  FactoryUpgraded: { previousVersion: number; policy: FactoryPolicy };
  ProjectCreated: { projectId: bigint; rewardAsset: Address; owner: Address; totalRewardAmount: bigint; startTime: number; endTime: number };
  ProjectStatusUpdated: { projectId: bigint; previousStatus: ProjectStatus; newStatus: ProjectStatus };
  ProjectMetadataUpdated: { projectId: bigint; metadata: ProjectMetadata };
  ProjectOwnershipTransferred: { projectId: bigint; previousOwner: Address; newOwner: Address };
  PoolCreated: { projectId: bigint; pool: Address; stakedAsset: Address; poolRewardAmount: bigint; rewardPerSecond: bigint; version: PoolVariant };
  PoolFunded: { projectId: bigint; pool: Address; amount: bigint };
  PoolUnfunded: { projectId: bigint; pool: Address };
  Deposit: { pool: Address; user: Address; amount: bigint };
  Withdraw: { pool: Address; user: Address; amount: bigint };
  RewardClaimed: { pool: Address; user: Address; amount: bigint };
  EmergencyWithdraw: { pool: Address; user: Address; amount: bigint };
  NewMinStakeAmount: { pool: Address; minStakeAmount: bigint };
  NewPoolLimit: { pool: Address; hasUserLimit: boolean; poolLimitPerUser: bigint };
  NewRewardPerSecond: { pool: Address; rewardPerSecond: bigint };
  RewardsStopped: { pool: Address; projectId: bigint; endTime: number };
  AdminTokenRecovery: { pool: Address; asset: Address; amount: bigint };
  RemainingRewardsWithdrawn: { pool: Address; amount: bigint };
  EmergencyRewardWithdraw: { pool: Address; amount: bigint };
  NewStartAndEndTimes: { projectId: bigint; startTime: number; endTime: number };
}

export type LaunchPoolEventName = keyof LaunchPoolEvents;

export class LaunchPoolEventBus {
  private readonly emitter = new EventEmitter();

  on<E extends LaunchPoolEventName>(event: E, listener: (payload: LaunchPoolEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends LaunchPoolEventName>(event: E, listener: (payload: LaunchPoolEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends LaunchPoolEventName>(event: E, listener: (payload: LaunchPoolEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit<E extends LaunchPoolEventName>(event: E, payload: LaunchPoolEvents[E]): void {
    this.emitter.emit(event, payload);
  }
}
