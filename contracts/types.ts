/**
 * Shared types for projects, pools and the factory.
 *
 * Amounts are raw base units (`bigint`), timestamps are unix seconds (`number`),
 * identities are checksummed hex addresses.
 */

export type Address = string;

/** Stored project status. Numeric values are part of the public interface. */
export enum ProjectStatus {
  STAGING = 0,
  READY = 1,
  DELISTED = 2,
  PAUSED = 3,
  // Display-only, derived from READY and the clock
  ACTIVE = 4,
  ENDED = 5,
}

export type StoredProjectStatus =
  | ProjectStatus.STAGING
  | ProjectStatus.READY
  | ProjectStatus.DELISTED
  | ProjectStatus.PAUSED;

/** Pool implementation variants; the numeric value is the version tag. */
export enum PoolVariant {
  V1 = 1,
  V2 = 2,
}

export interface ProjectMetadata {
  projectName: string;
  website: string;
  logo: string;
  discord: string;
  twitter: string;
  telegram: string;
  tokenInfo: string;
}

export interface UserInfo {
  amount: bigint;
  rewardDebt: bigint;
  pendingRewards: bigint;
}

export interface InitialPoolParams {
  stakedAsset: Address;
  poolRewardAmount: bigint;
  /** 0 disables the per-user limit */
  poolLimitPerUser: bigint;
  minStakeAmount: bigint;
}

export interface CreateProjectParams {
  rewardAsset: Address;
  totalRewardAmount: bigint;
  startTime: number;
  endTime: number;
  metadata: ProjectMetadata;
  initialPools: InitialPoolParams[];
  projectOwner: Address;
}

export interface ProjectTimes {
  startTime: number;
  endTime: number;
}

export interface PoolInfo {
  poolAddress: Address;
  version: PoolVariant;
  stakedAsset: Address;
  poolRewardAmount: bigint;
  isFunded: boolean;
}

export interface ProjectInfo {
  id: bigint;
  owner: Address;
  rewardAsset: Address;
  totalRewardAmount: bigint;
  allocatedRewardAmount: bigint;
  startTime: number;
  endTime: number;
  status: ProjectStatus;
  storedStatus: StoredProjectStatus;
  metadata: ProjectMetadata;
  poolCount: number;
  fundedPoolCount: number;
}

export interface DepositOptions {
  /** Native value attached to the call; must equal `amount` for native pools, 0 otherwise. */
  value?: bigint;
}

/**
 * Factory policy. Each upgrade replaces the whole record; `version` must increase.
 */
export interface FactoryPolicy {
  version: number;
  /** 0 means unlimited */
  maxProjectsPerOwner: number;
  poolVariant: PoolVariant;
  /** Minimum gap in seconds between the start times of one owner's projects; 0 disables */
  minProjectInterval: number;
}
