import { loadConfig } from "./config";
import { ensure, LaunchPoolError } from "./errors";
import { LaunchPoolEventBus } from "./events";
import type { IAssetLedger } from "./interfaces/IAssetLedger";
import { NATIVE_ASSET } from "./interfaces/IAssetLedger";
import type { IClock } from "./interfaces/IClock";
import { systemClock } from "./interfaces/IClock";
import type { ILaunchPoolHost } from "./interfaces/ILaunchPoolHost";
import { LaunchPool } from "./LaunchPool";
import { sameAddress, toAddress } from "./libraries/AddressUtils";
import { computePoolAddress } from "./libraries/PoolAddress";
import { ReentrancyGuard } from "./libraries/ReentrancyGuard";
import { createLogger, type Logger } from "./logger";
import { parseProjectMetadata, Project, type ProjectRecord } from "./Project";
import type {
  Address,
  CreateProjectParams,
  FactoryPolicy,
  InitialPoolParams,
  PoolInfo,
  ProjectInfo,
  ProjectMetadata,
  ProjectTimes,
} from "./types";
import { PoolVariant, ProjectStatus } from "./types";

const ONE_DAY = 24 * 60 * 60;

/** Initial release: no per-owner limits, V1 pools. */
export const FACTORY_POLICY_V1: FactoryPolicy = {
  version: 1,
  maxProjectsPerOwner: 0,
  poolVariant: PoolVariant.V1,
  minProjectInterval: 0,
};

/** Caps projects per owner; V2 pools available but not enabled. */
export const FACTORY_POLICY_V2: FactoryPolicy = {
  version: 2,
  maxProjectsPerOwner: 2,
  poolVariant: PoolVariant.V1,
  minProjectInterval: 0,
};

/** Adds a one-day gap between the start times of one owner's projects. */
export const FACTORY_POLICY_V3: FactoryPolicy = {
  version: 3,
  maxProjectsPerOwner: 2,
  poolVariant: PoolVariant.V1,
  minProjectInterval: ONE_DAY,
};

export interface LaunchPoolFactoryOptions {
  owner: Address;
  ledger: IAssetLedger;
  clock?: IClock;
  /** Registry identity used for pool address derivation; defaults to FACTORY_ADDRESS */
  address?: Address;
  policy?: FactoryPolicy;
  events?: LaunchPoolEventBus;
}

interface FactoryState {
  owner: Address;
  policy: FactoryPolicy;
  nextProjectId: bigint;
  deploymentNonce: bigint;
  projects: Map<bigint, ProjectRecord>;
  poolVersions: Map<Address, PoolVariant>;
  projectCountByOwner: Map<Address, number>;
  lastProjectStartByOwner: Map<Address, number>;
}

interface FactorySnapshot {
  state: FactoryState;
  pools: Map<Address, LaunchPool>;
}

/**
 * Creates projects and their pools, keeps the registry of pool identities
 * and versions, and drives project funding and status changes.
 *
 * Pools are plain objects registered by identity; the factory is their host
 * for project lookups. Behaviour that used to come from upgraded factory
 * implementations is a {@link FactoryPolicy} record swapped in by
 * {@link LaunchPoolFactory.upgradeTo}.
 */
export class LaunchPoolFactory {
  readonly address: Address;
  readonly events: LaunchPoolEventBus;

  private readonly ledger: IAssetLedger;
  private readonly clock: IClock;
  private readonly guard: ReentrancyGuard<FactorySnapshot>;
  private readonly host: ILaunchPoolHost;
  private readonly log: Logger;

  private state: FactoryState;
  private pools = new Map<Address, LaunchPool>();

  constructor(options: LaunchPoolFactoryOptions) {
    this.address = toAddress(options.address ?? loadConfig().factoryAddress, "factory address");
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new LaunchPoolEventBus();

    const policy = options.policy ?? FACTORY_POLICY_V1;
    validatePolicy(policy);
    this.state = {
      owner: toAddress(options.owner, "owner"),
      policy: { ...policy },
      nextProjectId: 0n,
      deploymentNonce: 0n,
      projects: new Map(),
      poolVersions: new Map(),
      projectCountByOwner: new Map(),
      lastProjectStartByOwner: new Map(),
    };

    this.guard = new ReentrancyGuard<FactorySnapshot>(
      () => ({ state: structuredClone(this.state), pools: new Map(this.pools) }),
      (saved) => {
        this.state = saved.state;
        this.pools = saved.pools;
      }
    );
    this.host = {
      getProjectOwner: (projectId) => this.project(projectId).owner,
      getProjectStatus: (projectId) => this.getProjectStatus(projectId),
      getProjectTimes: (projectId) => this.getProjectTimes(projectId),
      getProjectRewardAsset: (projectId) => this.project(projectId).rewardAsset,
      stopProjectRewards: (projectId, now) => this.stopProjectRewards(projectId, now),
    };
    this.log = createLogger("LaunchPoolFactory", { factory: this.address });
  }

  // ---------------------------------------------------------------------------
  // Factory administration
  // ---------------------------------------------------------------------------

  get owner(): Address {
    return this.state.owner;
  }

  get policy(): FactoryPolicy {
    return { ...this.state.policy };
  }

  get version(): number {
    return this.state.policy.version;
  }

  get nextProjectId(): bigint {
    return this.state.nextProjectId;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.guard.run(() => {
      this.requireOwner(caller);
      const previousOwner = this.state.owner;
      this.state.owner = toAddress(newOwner, "newOwner");

      this.log.info({ previousOwner, newOwner: this.state.owner }, "factory ownership transferred");
      const payload = { previousOwner, newOwner: this.state.owner };
      this.guard.afterCommit(() => this.events.emit("OwnershipTransferred", payload));
    });
  }

  /** Replaces the policy record. Versions only move forward. */
  upgradeTo(caller: Address, policy: FactoryPolicy): void {
    this.guard.run(() => {
      this.requireOwner(caller);
      validatePolicy(policy);
      const previousVersion = this.state.policy.version;
      ensure(policy.version > previousVersion, "InvalidPolicy", "Policy version must increase");
      this.state.policy = { ...policy };

      this.log.info({ previousVersion, policy }, "factory upgraded");
      const payload = { previousVersion, policy: { ...policy } };
      this.guard.afterCommit(() => this.events.emit("FactoryUpgraded", payload));
    });
  }

  /** Switches the variant used for new pools. Needs a policy of version 2 or later. */
  setPoolVariant(caller: Address, variant: PoolVariant): void {
    this.guard.run(() => {
      this.requireOwner(caller);
      ensure(this.state.policy.version >= 2, "InvalidPolicy", "Pool variants need policy version 2");
      ensure(Object.values(PoolVariant).includes(variant), "InvalidPolicy", `Unknown pool variant ${variant}`);
      this.state.policy = { ...this.state.policy, poolVariant: variant };
      this.log.info({ variant }, "pool variant changed");
    });
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  createProject(caller: Address, params: CreateProjectParams): bigint {
    return this.guard.run(() => {
      this.requireOwner(caller);

      const rewardAsset = toAddress(params.rewardAsset, "rewardAsset");
      ensure(!sameAddress(rewardAsset, NATIVE_ASSET), "InvalidAsset", "Reward asset cannot be native");
      const projectOwner = toAddress(params.projectOwner, "projectOwner");
      ensure(params.totalRewardAmount > 0n, "InvalidAmount", "Total reward amount must be positive");
      ensure(
        Number.isSafeInteger(params.startTime) && Number.isSafeInteger(params.endTime),
        "InvalidTimes",
        "Times must be whole seconds"
      );
      ensure(params.startTime > this.clock.now(), "InvalidTimes", "Start time must be in future");
      ensure(params.endTime > params.startTime, "InvalidTimes", "End time must be after start time");
      const metadata = parseProjectMetadata(params.metadata);

      this.enforceOwnerPolicy(projectOwner, params.startTime);

      const projectId = this.state.nextProjectId;
      this.state.nextProjectId += 1n;
      const record: ProjectRecord = {
        id: projectId,
        owner: projectOwner,
        rewardAsset,
        totalRewardAmount: params.totalRewardAmount,
        allocatedRewardAmount: 0n,
        startTime: params.startTime,
        endTime: params.endTime,
        status: ProjectStatus.STAGING,
        metadata,
        pools: [],
        fundedPools: new Set(),
      };
      this.state.projects.set(projectId, record);
      this.state.projectCountByOwner.set(projectOwner, (this.state.projectCountByOwner.get(projectOwner) ?? 0) + 1);
      this.state.lastProjectStartByOwner.set(projectOwner, params.startTime);

      this.log.info({ projectId, projectOwner, rewardAsset, totalRewardAmount: params.totalRewardAmount }, "project created");
      const created = {
        projectId,
        rewardAsset,
        owner: projectOwner,
        totalRewardAmount: params.totalRewardAmount,
        startTime: params.startTime,
        endTime: params.endTime,
      };
      this.guard.afterCommit(() => this.events.emit("ProjectCreated", created));

      for (const pool of params.initialPools) {
        this.deployPool(new Project(record), pool);
      }
      return projectId;
    });
  }

  /** Adds a pool to a project that is still in STAGING. */
  addPool(caller: Address, projectId: bigint, params: InitialPoolParams): Address {
    return this.guard.run(() => {
      const project = this.project(projectId);
      this.requireProjectOwner(project, caller);
      return this.deployPool(project, params);
    });
  }

  /**
   * Moves the pool's reward commitment from the project owner into the pool.
   * The amount must match exactly; funding the last pool makes the project READY.
   */
  fundPool(caller: Address, projectId: bigint, poolAddress: Address, amount: bigint): void {
    this.guard.run(() => {
      const project = this.project(projectId);
      const owner = this.requireProjectOwner(project, caller);
      const pool = this.getPool(poolAddress);
      ensure(project.hasPool(pool.address), "PoolNotFound", "Pool not in project");
      ensure(project.storedStatus === ProjectStatus.STAGING, "InvalidStatus", "Project not in staging");
      ensure(!project.isPoolFunded(pool.address), "PoolAlreadyFunded", "Pool already funded");

      const required = pool.requiredFunding();
      ensure(amount === required, "InvalidFundingAmount", `Funding must equal ${required}`);

      const becameReady = project.markFunded(pool.address);
      if (amount > 0n) {
        try {
          this.ledger.pull(project.rewardAsset, owner, pool.address, amount);
        } catch (error) {
          if (error instanceof LaunchPoolError) throw error;
          throw new LaunchPoolError("TransferFailed", error instanceof Error ? error.message : String(error), {
            cause: error,
          });
        }
      }

      this.log.info({ projectId, pool: pool.address, amount, becameReady }, "pool funded");
      this.guard.afterCommit(() => {
        this.events.emit("PoolFunded", { projectId, pool: pool.address, amount });
        if (becameReady) {
          this.events.emit("ProjectStatusUpdated", {
            projectId,
            previousStatus: ProjectStatus.STAGING,
            newStatus: ProjectStatus.READY,
          });
        }
      });
    });
  }

  /**
   * Requests a status change and returns the stored status that resulted,
   * which is STAGING when resuming a paused project with short pools.
   */
  updateProjectStatus(caller: Address, projectId: bigint, status: ProjectStatus): ProjectStatus {
    return this.guard.run(() => {
      const project = this.project(projectId);
      this.requireProjectOwner(project, caller);

      const result = project.transitionTo(status, (pool) => this.getPool(pool).isSolvent());

      if (result.unfundedPools.length > 0) {
        this.log.warn({ projectId, pools: result.unfundedPools }, "pools under-collateralized, funding reopened");
      }
      this.log.info(
        { projectId, from: ProjectStatus[result.previousStatus], to: ProjectStatus[result.status] },
        "project status updated"
      );
      this.guard.afterCommit(() => {
        for (const pool of result.unfundedPools) {
          this.events.emit("PoolUnfunded", { projectId, pool });
        }
        this.events.emit("ProjectStatusUpdated", {
          projectId,
          previousStatus: result.previousStatus,
          newStatus: result.status,
        });
      });
      return result.status;
    });
  }

  /**
   * Moves the reward window of a project that has not started. Every pool
   * re-derives its rate from its pool reward over the new window.
   */
  updateStartAndEndTimes(caller: Address, projectId: bigint, startTime: number, endTime: number): void {
    this.guard.run(() => {
      const project = this.project(projectId);
      this.requireProjectOwner(project, caller);
      project.reschedule(startTime, endTime, this.clock.now());
      for (const pool of project.pools) {
        this.getPool(pool).syncRewardWindow();
      }

      this.log.info({ projectId, startTime, endTime }, "project window moved");
      this.guard.afterCommit(() => this.events.emit("NewStartAndEndTimes", { projectId, startTime, endTime }));
    });
  }

  updateProjectMetadata(caller: Address, projectId: bigint, metadata: ProjectMetadata): void {
    this.guard.run(() => {
      const project = this.project(projectId);
      this.requireProjectOwner(project, caller);
      project.setMetadata(metadata);

      const updated = project.info(this.clock.now()).metadata;
      this.guard.afterCommit(() => this.events.emit("ProjectMetadataUpdated", { projectId, metadata: updated }));
    });
  }

  transferProjectOwnership(caller: Address, projectId: bigint, newOwner: Address): void {
    this.guard.run(() => {
      const project = this.project(projectId);
      const previousOwner = this.requireProjectOwner(project, caller);
      const owner = toAddress(newOwner, "newOwner");
      project.setOwner(owner);

      this.log.info({ projectId, previousOwner, newOwner: owner }, "project ownership transferred");
      this.guard.afterCommit(() =>
        this.events.emit("ProjectOwnershipTransferred", { projectId, previousOwner, newOwner: owner })
      );
    });
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  calculateRewardPerSecond(projectId: bigint, poolRewardAmount: bigint): bigint {
    return this.project(projectId).calculateRewardPerSecond(poolRewardAmount);
  }

  getProjectInfo(projectId: bigint): ProjectInfo {
    return this.project(projectId).info(this.clock.now());
  }

  getProjectStatus(projectId: bigint): ProjectStatus {
    return this.project(projectId).statusAt(this.clock.now());
  }

  getProjectOwner(projectId: bigint): Address {
    return this.project(projectId).owner;
  }

  getProjectTimes(projectId: bigint): ProjectTimes {
    const project = this.project(projectId);
    return { startTime: project.startTime, endTime: project.endTime };
  }

  getProjectPools(projectId: bigint): PoolInfo[] {
    const project = this.project(projectId);
    return project.pools.map((address) => {
      const pool = this.getPool(address);
      return {
        poolAddress: address,
        version: pool.version,
        stakedAsset: pool.stakedAsset,
        poolRewardAmount: pool.poolRewardAmount,
        isFunded: project.isPoolFunded(address),
      };
    });
  }

  getProjectCount(owner: Address): number {
    return this.state.projectCountByOwner.get(toAddress(owner, "owner")) ?? 0;
  }

  getPool(address: Address): LaunchPool {
    const pool = this.pools.get(toAddress(address, "pool"));
    if (!pool) {
      throw new LaunchPoolError("PoolNotFound", `Unknown pool ${address}`);
    }
    return pool;
  }

  /** Version tag of a pool created here, or 0 for identities this factory never produced. */
  getPoolVersion(address: Address): number {
    return this.state.poolVersions.get(toAddress(address, "pool")) ?? 0;
  }

  isPoolFromFactory(address: Address): boolean {
    return this.getPoolVersion(address) !== 0;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private project(projectId: bigint): Project {
    const record = this.state.projects.get(projectId);
    if (!record) {
      throw new LaunchPoolError("ProjectNotFound", `Unknown project ${projectId}`);
    }
    return new Project(record);
  }

  private deployPool(project: Project, params: InitialPoolParams): Address {
    const stakedAsset = toAddress(params.stakedAsset, "stakedAsset");
    ensure(!sameAddress(stakedAsset, project.rewardAsset), "InvalidAsset", "Tokens must be different");
    ensure(params.poolLimitPerUser >= 0n, "InvalidAmount", "Negative user limit");
    ensure(params.minStakeAmount >= 0n, "InvalidAmount", "Negative minimum stake");

    const nonce = this.state.deploymentNonce;
    this.state.deploymentNonce += 1n;
    const variant = this.state.policy.poolVariant;
    const address = computePoolAddress(
      this.address,
      { projectId: project.id, stakedAsset, rewardAsset: project.rewardAsset, startTime: project.startTime, nonce },
      variant
    );
    ensure(!this.pools.has(address), "InvalidAddress", `Pool identity collision at ${address}`);

    project.registerPool(address, params.poolRewardAmount);
    const rewardPerSecond = project.calculateRewardPerSecond(params.poolRewardAmount);

    const pool = new LaunchPool({
      address,
      version: variant,
      host: this.host,
      ledger: this.ledger,
      clock: this.clock,
      events: this.events,
    });
    this.pools.set(address, pool);
    this.state.poolVersions.set(address, variant);
    pool.initialize({
      projectId: project.id,
      stakedAsset,
      poolRewardAmount: params.poolRewardAmount,
      rewardPerSecond,
      poolLimitPerUser: params.poolLimitPerUser,
      minStakeAmount: params.minStakeAmount,
    });

    this.log.info({ projectId: project.id, pool: address, stakedAsset, rewardPerSecond, version: variant }, "pool created");
    const created = {
      projectId: project.id,
      pool: address,
      stakedAsset,
      poolRewardAmount: params.poolRewardAmount,
      rewardPerSecond,
      version: variant,
    };
    this.guard.afterCommit(() => this.events.emit("PoolCreated", created));
    return address;
  }

  private stopProjectRewards(projectId: bigint, now: number): void {
    const project = this.project(projectId);
    project.stopRewards(now);
    this.log.info({ projectId, endTime: now }, "project rewards stopped");
  }

  private enforceOwnerPolicy(projectOwner: Address, startTime: number): void {
    const { maxProjectsPerOwner, minProjectInterval } = this.state.policy;
    if (maxProjectsPerOwner > 0) {
      const count = this.state.projectCountByOwner.get(projectOwner) ?? 0;
      ensure(count < maxProjectsPerOwner, "TooManyProjects", "Too many projects");
    }
    if (minProjectInterval > 0) {
      const lastStart = this.state.lastProjectStartByOwner.get(projectOwner);
      ensure(
        lastStart === undefined || startTime >= lastStart + minProjectInterval,
        "ProjectIntervalNotElapsed",
        "Must wait before creating new project"
      );
    }
  }

  private requireOwner(caller: Address): void {
    ensure(sameAddress(toAddress(caller, "caller"), this.state.owner), "NotOwner", "Ownable: caller is not the owner");
  }

  private requireProjectOwner(project: Project, caller: Address): Address {
    ensure(sameAddress(toAddress(caller, "caller"), project.owner), "NotProjectOwner", "Not project owner");
    return project.owner;
  }
}

function validatePolicy(policy: FactoryPolicy): void {
  ensure(Number.isSafeInteger(policy.version) && policy.version > 0, "InvalidPolicy", "Policy version must be positive");
  ensure(
    Number.isSafeInteger(policy.maxProjectsPerOwner) && policy.maxProjectsPerOwner >= 0,
    "InvalidPolicy",
    "maxProjectsPerOwner must be a non-negative integer"
  );
  ensure(
    Number.isSafeInteger(policy.minProjectInterval) && policy.minProjectInterval >= 0,
    "InvalidPolicy",
    "minProjectInterval must be a non-negative integer"
  );
  ensure(Object.values(PoolVariant).includes(policy.poolVariant), "InvalidPolicy", `Unknown pool variant ${policy.poolVariant}`);
}
