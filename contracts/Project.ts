import { z } from "zod";
import { ensure, LaunchPoolError } from "./errors";
import { calculateRewardPerSecond } from "./libraries/RewardMath";
import type { Address, ProjectInfo, ProjectMetadata, StoredProjectStatus } from "./types";
import { ProjectStatus } from "./types";

export const projectMetadataSchema = z.object({
  projectName: z.string().trim().min(1, "projectName is required"),
  website: z.string(),
  logo: z.string(),
  discord: z.string(),
  twitter: z.string(),
  telegram: z.string(),
  tokenInfo: z.string(),
});

export function parseProjectMetadata(metadata: ProjectMetadata): ProjectMetadata {
  const parsed = projectMetadataSchema.safeParse(metadata);
  if (!parsed.success) {
    throw new LaunchPoolError("InvalidMetadata", parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}

/** Persisted project row. Pools are referenced by identity only. */
export interface ProjectRecord {
  id: bigint;
  owner: Address;
  rewardAsset: Address;
  totalRewardAmount: bigint;
  allocatedRewardAmount: bigint;
  startTime: number;
  endTime: number;
  status: StoredProjectStatus;
  metadata: ProjectMetadata;
  pools: Address[];
  fundedPools: Set<Address>;
}

export interface StatusTransitionResult {
  previousStatus: StoredProjectStatus;
  status: StoredProjectStatus;
  /** Pools that lost their funded mark because they could not cover their commitment */
  unfundedPools: Address[];
}

/**
 * Display status: READY splits into READY/ACTIVE/ENDED by the clock. A window
 * stopped before its start is ENDED straight away.
 */
export function displayStatus(status: StoredProjectStatus, startTime: number, endTime: number, now: number): ProjectStatus {
  if (status !== ProjectStatus.READY) return status;
  if (now >= endTime) return ProjectStatus.ENDED;
  if (now < startTime) return ProjectStatus.READY;
  if (now < endTime) return ProjectStatus.ACTIVE;
  return ProjectStatus.ENDED;
}

/**
 * Funding ledger and status machine of one project, operating on its
 * {@link ProjectRecord} in place.
 *
 * STAGING → READY once every pool is funded and the pools' commitments add
 * up to `totalRewardAmount`. READY ⇄ PAUSED, where resuming re-checks each
 * pool's reward balance and sends the project back to STAGING (un-funding the
 * short pools) if any falls short. STAGING/READY → DELISTED is final.
 */
export class Project {
  constructor(private readonly record: ProjectRecord) {}

  get id(): bigint {
    return this.record.id;
  }

  get owner(): Address {
    return this.record.owner;
  }

  get rewardAsset(): Address {
    return this.record.rewardAsset;
  }

  get startTime(): number {
    return this.record.startTime;
  }

  get endTime(): number {
    return this.record.endTime;
  }

  get storedStatus(): StoredProjectStatus {
    return this.record.status;
  }

  get pools(): readonly Address[] {
    return this.record.pools;
  }

  get fundedPoolCount(): number {
    return this.record.fundedPools.size;
  }

  statusAt(now: number): ProjectStatus {
    return displayStatus(this.record.status, this.record.startTime, this.record.endTime, now);
  }

  calculateRewardPerSecond(poolRewardAmount: bigint): bigint {
    ensure(this.record.endTime > this.record.startTime, "InvalidTimes", "Reward window has ended");
    return calculateRewardPerSecond(poolRewardAmount, this.record.startTime, this.record.endTime);
  }

  hasPool(pool: Address): boolean {
    return this.record.pools.includes(pool);
  }

  isPoolFunded(pool: Address): boolean {
    return this.record.fundedPools.has(pool);
  }

  /** Every pool funded and the allocation matches the project total exactly. */
  isFullyFunded(): boolean {
    return (
      this.record.fundedPools.size === this.record.pools.length &&
      this.record.allocatedRewardAmount === this.record.totalRewardAmount
    );
  }

  registerPool(pool: Address, poolRewardAmount: bigint): void {
    ensure(this.record.status === ProjectStatus.STAGING, "InvalidStatus", "Project not in staging");
    ensure(poolRewardAmount > 0n, "InvalidAmount", "Pool reward amount must be positive");
    const allocated = this.record.allocatedRewardAmount + poolRewardAmount;
    ensure(allocated <= this.record.totalRewardAmount, "AllocationExceeded", "Pool rewards exceed project total");

    this.record.pools.push(pool);
    this.record.allocatedRewardAmount = allocated;
  }

  /** Marks `pool` funded; returns true when this completed the project's funding. */
  markFunded(pool: Address): boolean {
    ensure(this.record.status === ProjectStatus.STAGING, "InvalidStatus", "Project not in staging");
    ensure(this.hasPool(pool), "PoolNotFound", "Pool not in project");
    ensure(!this.record.fundedPools.has(pool), "PoolAlreadyFunded", "Pool already funded");

    this.record.fundedPools.add(pool);
    if (this.isFullyFunded()) {
      this.record.status = ProjectStatus.READY;
      return true;
    }
    return false;
  }

  transitionTo(target: ProjectStatus, isSolvent: (pool: Address) => boolean): StatusTransitionResult {
    const from = this.record.status;
    const reject = (): never => {
      throw new LaunchPoolError(
        "InvalidStatusTransition",
        `Invalid status transition ${ProjectStatus[from]} -> ${ProjectStatus[target]}`
      );
    };

    switch (target) {
      case ProjectStatus.READY:
        if (from === ProjectStatus.STAGING) {
          ensure(this.isFullyFunded(), "InvalidStatusTransition", "Pools not fully funded");
          return this.commit(from, ProjectStatus.READY, []);
        }
        if (from === ProjectStatus.PAUSED) {
          const shortPools = this.record.pools.filter((pool) => !isSolvent(pool));
          if (shortPools.length === 0) {
            return this.commit(from, ProjectStatus.READY, []);
          }
          return this.commit(from, ProjectStatus.STAGING, shortPools);
        }
        return reject();

      case ProjectStatus.PAUSED:
        if (from === ProjectStatus.READY) {
          return this.commit(from, ProjectStatus.PAUSED, []);
        }
        return reject();

      case ProjectStatus.STAGING:
        if (from === ProjectStatus.PAUSED) {
          const shortPools = this.record.pools.filter((pool) => !isSolvent(pool));
          ensure(shortPools.length > 0, "InvalidStatusTransition", "All pools are sufficiently funded");
          return this.commit(from, ProjectStatus.STAGING, shortPools);
        }
        return reject();

      case ProjectStatus.DELISTED:
        if (from === ProjectStatus.STAGING || from === ProjectStatus.READY) {
          return this.commit(from, ProjectStatus.DELISTED, []);
        }
        return reject();

      default:
        // ACTIVE and ENDED are derived from READY and cannot be set
        return reject();
    }
  }

  /** Moves a window that has not started yet. */
  reschedule(startTime: number, endTime: number, now: number): void {
    ensure(
      this.record.status === ProjectStatus.STAGING || this.record.status === ProjectStatus.READY,
      "InvalidStatus",
      "Project not in staging or ready"
    );
    ensure(now < this.record.startTime && now < this.record.endTime, "PoolHasStarted", "Pool has started");
    ensure(Number.isSafeInteger(startTime) && Number.isSafeInteger(endTime), "InvalidTimes", "Times must be whole seconds");
    ensure(startTime > now, "InvalidTimes", "Start time must be in future");
    ensure(endTime > startTime, "InvalidTimes", "End time must be after start time");

    this.record.startTime = startTime;
    this.record.endTime = endTime;
  }

  /** Ends the reward window at `now`. */
  stopRewards(now: number): void {
    this.record.endTime = now;
  }

  setMetadata(metadata: ProjectMetadata): void {
    this.record.metadata = parseProjectMetadata(metadata);
  }

  setOwner(newOwner: Address): void {
    this.record.owner = newOwner;
  }

  info(now: number): ProjectInfo {
    const record = this.record;
    return {
      id: record.id,
      owner: record.owner,
      rewardAsset: record.rewardAsset,
      totalRewardAmount: record.totalRewardAmount,
      allocatedRewardAmount: record.allocatedRewardAmount,
      startTime: record.startTime,
      endTime: record.endTime,
      status: this.statusAt(now),
      storedStatus: record.status,
      metadata: { ...record.metadata },
      poolCount: record.pools.length,
      fundedPoolCount: record.fundedPools.size,
    };
  }

  private commit(
    previousStatus: StoredProjectStatus,
    status: StoredProjectStatus,
    unfundedPools: Address[]
  ): StatusTransitionResult {
    for (const pool of unfundedPools) {
      this.record.fundedPools.delete(pool);
    }
    this.record.status = status;
    return { previousStatus, status, unfundedPools };
  }
}
