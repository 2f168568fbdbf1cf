import { formatEther, getAddress, id, parseEther } from "ethers";
import { NATIVE_ASSET } from "../contracts/interfaces/IAssetLedger";
import type { LaunchPool } from "../contracts/LaunchPool";
import { LaunchPoolFactory } from "../contracts/LaunchPoolFactory";
import { createLogger } from "../contracts/logger";
import { MockClock } from "../contracts/mocks/MockClock";
import { MockLedger } from "../contracts/mocks/MockLedger";
import { ProjectStatus } from "../contracts/types";

/**
 * LAUNCH SIMULATION: one project, a token pool and a native pool, many users.
 *
 * Project Configuration:
 * - Reward: 100,000 RWD over 30 days, split 60,000 / 40,000 between the pools
 * - Token pool: stake LST, 10 LST minimum, 5,000 LST per user
 * - Native pool: stake ETH, no limit
 *
 * Simulation:
 * - N users (default 200, first CLI argument) join at random times over
 *   the first 20 days, some leave early, the rest stay to the end
 * - Everyone claims after the end, then the owner sweeps what is left
 *
 * Validation Checks:
 * 1. totalStaked equals the sum of user stakes at every step
 * 2. Rewards paid never exceed the pool reward
 * 3. Undistributed rewards are only rounding dust and forfeited gaps
 */

const DAY = 24 * 60 * 60;
const TOTAL_REWARD = parseEther("100000");
const TOKEN_POOL_REWARD = parseEther("60000");
const NATIVE_POOL_REWARD = parseEther("40000");
const DURATION = 30 * DAY;

const log = createLogger("simulate-launch");

function addressOf(label: string): string {
  return getAddress(id(label).slice(0, 42));
}

/** Deterministic pseudo-random numbers so runs can be compared. */
function random(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max) => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state % max;
  };
}

interface SimUser {
  address: string;
  pool: LaunchPool;
  native: boolean;
  stake: bigint;
  joinAt: number;
  leaveAt: number | null;
}

type Action = { at: number; user: SimUser; kind: "join" | "leave" };

async function main() {
  const userCount = Number(process.argv[2] ?? 200);
  if (!Number.isInteger(userCount) || userCount <= 0) {
    throw new Error(`user count must be a positive integer, got ${process.argv[2]}`);
  }
  const next = random(20240101);

  console.log(`\n🚀 Starting ${userCount}-user launch simulation...\n`);

  // ===================================================================
  // STEP 1: Deploy ledger, clock and factory
  // ===================================================================

  const clock = new MockClock(Math.floor(Date.now() / 1000));
  const ledger = new MockLedger();
  const owner = addressOf("sim-owner");
  const projectOwner = addressOf("sim-project-owner");
  const rewardToken = ledger.deploy(addressOf("sim-reward"), "Reward Token", "RWD", 18);
  const stakeToken = ledger.deploy(addressOf("sim-stake"), "Launch Stake Token", "LST", 18);
  const factory = new LaunchPoolFactory({ owner, ledger, clock });
  console.log(`✅ Factory deployed at ${factory.address}\n`);

  // ===================================================================
  // STEP 2: Create and fund the project
  // ===================================================================

  console.log("🏊 Creating project...");
  const startTime = clock.now() + DAY;
  const endTime = startTime + DURATION;
  const projectId = factory.createProject(owner, {
    rewardAsset: rewardToken,
    totalRewardAmount: TOTAL_REWARD,
    startTime,
    endTime,
    metadata: {
      projectName: "Simulated Launch",
      website: "https://launch.example",
      logo: "https://launch.example/logo.png",
      discord: "",
      twitter: "",
      telegram: "",
      tokenInfo: "LST staking launch",
    },
    initialPools: [
      { stakedAsset: stakeToken, poolRewardAmount: TOKEN_POOL_REWARD, poolLimitPerUser: parseEther("5000"), minStakeAmount: parseEther("10") },
      { stakedAsset: NATIVE_ASSET, poolRewardAmount: NATIVE_POOL_REWARD, poolLimitPerUser: 0n, minStakeAmount: 0n },
    ],
    projectOwner,
  });
  const [tokenPool, nativePool] = factory.getProjectPools(projectId).map((info) => factory.getPool(info.poolAddress));

  console.log("💰 Funding pools...");
  for (const pool of [tokenPool, nativePool]) {
    const amount = pool.requiredFunding();
    ledger.mint(rewardToken, projectOwner, amount);
    ledger.approve(rewardToken, projectOwner, pool.address, amount);
    factory.fundPool(projectOwner, projectId, pool.address, amount);
  }
  console.log(`✅ Project ${projectId} is ${ProjectStatus[factory.getProjectStatus(projectId)]}\n`);

  console.log("📊 Project Configuration:");
  console.log(`   - Total Rewards: ${formatEther(TOTAL_REWARD)} RWD over ${DURATION / DAY} days`);
  console.log(`   - Token pool: ${formatEther(tokenPool.rewardPerSecond)} RWD/s`);
  console.log(`   - Native pool: ${formatEther(nativePool.rewardPerSecond)} RWD/s\n`);

  // ===================================================================
  // STEP 3: Generate users
  // ===================================================================

  const users: SimUser[] = [];
  for (let i = 0; i < userCount; i++) {
    const native = next(3) === 0;
    const pool = native ? nativePool : tokenPool;
    const stake = native ? parseEther(String(1 + next(20))) : parseEther(String(10 + next(4991)));
    const joinAt = startTime - DAY + next(21 * DAY);
    const leavesEarly = next(4) === 0;
    const leaveAt = leavesEarly ? joinAt + 1 + next(Math.max(1, endTime - joinAt - 1)) : null;
    const address = addressOf(`sim-user-${i}`);

    if (native) {
      ledger.mint(NATIVE_ASSET, address, stake);
    } else {
      ledger.mint(stakeToken, address, stake);
      ledger.approve(stakeToken, address, pool.address, stake);
    }
    users.push({ address, pool, native, stake, joinAt, leaveAt });
  }

  const actions: Action[] = [];
  for (const user of users) {
    actions.push({ at: user.joinAt, user, kind: "join" });
    if (user.leaveAt !== null) {
      actions.push({ at: user.leaveAt, user, kind: "leave" });
    }
  }
  actions.sort((a, b) => a.at - b.at || (a.kind === b.kind ? 0 : a.kind === "join" ? -1 : 1));

  // ===================================================================
  // STEP 4: Replay deposits and withdrawals
  // ===================================================================

  console.log("📈 Replaying user activity...");
  let earlyExits = 0;
  for (const action of actions) {
    if (action.at > clock.now()) {
      clock.increaseTo(action.at);
    }
    const { user } = action;
    if (action.kind === "join") {
      user.pool.deposit(user.address, user.stake, user.native ? { value: user.stake } : {});
    } else {
      user.pool.withdraw(user.address, user.stake);
      earlyExits++;
    }

    for (const pool of [tokenPool, nativePool]) {
      const sum = pool.getUsers().reduce((total, address) => total + pool.getUserInfo(address).amount, 0n);
      if (sum !== pool.totalStaked) {
        throw new Error(`totalStaked drifted in ${pool.address}: ${pool.totalStaked} != ${sum}`);
      }
    }
  }
  console.log(`✅ ${users.length} deposits, ${earlyExits} early withdrawals\n`);

  // ===================================================================
  // STEP 5: Claim after the end and sweep the rest
  // ===================================================================

  clock.increaseTo(endTime);
  console.log(`⏱️  Project is ${ProjectStatus[factory.getProjectStatus(projectId)]}, claiming...`);

  const summary: Array<Record<string, string | number>> = [];
  for (const [name, pool, reward] of [
    ["token", tokenPool, TOKEN_POOL_REWARD],
    ["native", nativePool, NATIVE_POOL_REWARD],
  ] as const) {
    let claimed = 0n;
    for (const address of pool.getUsers()) {
      if (pool.pendingReward(address) > 0n) {
        claimed += pool.claimReward(address);
      }
    }
    if (claimed > reward) {
      throw new Error(`${name} pool paid ${claimed}, more than its ${reward} reward`);
    }
    const swept = pool.rewardBalance() > 0n ? pool.withdrawRemainingRewards(projectOwner) : 0n;
    summary.push({
      pool: name,
      stakers: pool.getUsers().length,
      claimed: formatEther(claimed),
      swept: formatEther(swept),
      distributed: `${Number((claimed * 10_000n) / reward) / 100}%`,
    });
  }

  console.log("\n📊 Simulation Summary:");
  console.table(summary);
  log.info({ projectId, users: userCount, earlyExits }, "simulation finished");
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("\n❌ Simulation failed:");
    console.error(error);
    process.exit(1);
  });
