import { getAddress, id, parseEther } from "ethers";
import { LaunchPoolFactory } from "../../contracts/LaunchPoolFactory";
import type { LaunchPool } from "../../contracts/LaunchPool";
import { MockClock } from "../../contracts/mocks/MockClock";
import { MockLedger } from "../../contracts/mocks/MockLedger";
import type { Address, FactoryPolicy, InitialPoolParams, ProjectMetadata } from "../../contracts/types";

export const GENESIS_TIME = 1_700_000_000;
export const FACTORY_ADDRESS = "0x5FbDB2315678afecb367f032d93F642f64180aa3";

/** Deterministic test identity derived from a label. */
export function addressOf(label: string): Address {
  return getAddress(id(label).slice(0, 42));
}

export function getSigners() {
  return {
    owner: addressOf("owner"),
    projectOwner: addressOf("project-owner"),
    user1: addressOf("user-1"),
    user2: addressOf("user-2"),
    user3: addressOf("user-3"),
  };
}

export const defaultMetadata: ProjectMetadata = {
  projectName: "Test Project",
  website: "https://test.com",
  logo: "https://test.com/logo.png",
  discord: "https://discord.gg/test",
  twitter: "https://twitter.com/test",
  telegram: "https://t.me/test",
  tokenInfo: "Test Token Info",
};

export interface Environment {
  clock: MockClock;
  ledger: MockLedger;
  factory: LaunchPoolFactory;
  rewardToken: Address;
  testToken: Address;
  otherToken: Address;
  signers: ReturnType<typeof getSigners>;
}

export interface EnvironmentOptions {
  ledger?: MockLedger;
  policy?: FactoryPolicy;
}

export function deployEnvironment({ ledger = new MockLedger(), policy }: EnvironmentOptions = {}): Environment {
  const signers = getSigners();
  const clock = new MockClock(GENESIS_TIME);
  const rewardToken = ledger.deploy(addressOf("reward-token"), "Reward Token", "RWD", 18);
  const testToken = ledger.deploy(addressOf("test-token"), "Test Token", "TST", 18);
  const otherToken = ledger.deploy(addressOf("other-token"), "Other Token", "OTH", 6);
  const factory = new LaunchPoolFactory({
    owner: signers.owner,
    ledger,
    clock,
    address: FACTORY_ADDRESS,
    policy,
  });
  return { clock, ledger, factory, rewardToken, testToken, otherToken, signers };
}

export interface ProjectFixture extends Environment {
  projectId: bigint;
  launchPool: LaunchPool;
  startTime: number;
  endTime: number;
}

export const POOL_REWARD = parseEther("360");
export const USER_BALANCE = parseEther("1000");

/**
 * One project with one pool: 360 reward tokens over one hour (0.1/s),
 * 100 token user limit, 10 token minimum stake, window opening in 100s.
 * Funded (and so READY) unless `fund` is false.
 */
export function deployProjectFixture({
  fund = true,
  pool,
  ledger: ledgerOption,
}: { fund?: boolean; pool?: Partial<InitialPoolParams>; ledger?: MockLedger } = {}): ProjectFixture {
  const env = deployEnvironment({ ledger: ledgerOption });
  const { clock, ledger, factory, rewardToken, testToken, signers } = env;

  const startTime = clock.now() + 100;
  const endTime = startTime + 3600;
  const projectId = factory.createProject(signers.owner, {
    rewardAsset: rewardToken,
    totalRewardAmount: POOL_REWARD,
    startTime,
    endTime,
    metadata: defaultMetadata,
    initialPools: [
      {
        stakedAsset: testToken,
        poolRewardAmount: POOL_REWARD,
        poolLimitPerUser: parseEther("100"),
        minStakeAmount: parseEther("10"),
        ...pool,
      },
    ],
    projectOwner: signers.projectOwner,
  });
  const [poolInfo] = factory.getProjectPools(projectId);
  const launchPool = factory.getPool(poolInfo.poolAddress);

  for (const user of [signers.user1, signers.user2, signers.user3]) {
    ledger.mint(testToken, user, USER_BALANCE);
    ledger.approve(testToken, user, launchPool.address, USER_BALANCE);
  }

  if (fund) {
    fundAll(env, projectId);
  }

  return { ...env, projectId, launchPool, startTime, endTime };
}

/** Mints and funds every unfunded pool of the project from its owner. */
export function fundAll(env: Environment, projectId: bigint): void {
  const { factory, ledger, rewardToken } = env;
  const owner = factory.getProjectOwner(projectId);
  for (const info of factory.getProjectPools(projectId)) {
    if (info.isFunded) continue;
    const pool = factory.getPool(info.poolAddress);
    const amount = pool.requiredFunding();
    ledger.mint(rewardToken, owner, amount);
    ledger.approve(rewardToken, owner, info.poolAddress, amount);
    factory.fundPool(owner, projectId, info.poolAddress, amount);
  }
}
