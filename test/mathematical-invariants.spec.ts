import { expect } from "chai";
import { parseEther } from "ethers";
import { deployProjectFixture, POOL_REWARD, type ProjectFixture } from "./helpers/fixtures";

/** Small deterministic generator so runs are reproducible. */
function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    return state;
  };
}

describe("Mathematical Invariants", function () {
  let fixture: ProjectFixture;
  let users: string[];

  beforeEach(function () {
    fixture = deployProjectFixture();
    users = [fixture.signers.user1, fixture.signers.user2, fixture.signers.user3];
  });

  /**
   * Random deposits and withdrawals through the whole window. user1 keeps a
   * stake from before the start, so no interval is forfeited.
   */
  function runRandomActivity(seed: number, check: () => void): void {
    const { launchPool, clock, endTime } = fixture;
    const next = lcg(seed);
    launchPool.deposit(users[0], parseEther("10"));

    while (clock.now() + 300 < endTime) {
      clock.increase(60 + (next() % 240));
      const user = users[next() % users.length];
      const staked = launchPool.getUserInfo(user).amount;
      const amount = parseEther(String(10 * (1 + (next() % 4))));

      if (next() % 2 === 0 && staked + amount <= launchPool.poolLimitPerUser) {
        launchPool.deposit(user, amount);
      } else if (user !== users[0] && staked > 0n) {
        launchPool.withdraw(user, staked >= amount ? amount : staked);
      } else {
        launchPool.deposit(user, 0n);
      }
      check();
    }
    clock.increaseTo(endTime);
  }

  it("Should keep the staked balance equal to the sum of stakes", function () {
    const { launchPool, ledger, testToken } = fixture;
    runRandomActivity(1, () => {
      const sum = users.reduce((total, user) => total + launchPool.getUserInfo(user).amount, 0n);
      expect(launchPool.totalStaked).to.equal(sum);
      expect(ledger.balanceOf(testToken, launchPool.address)).to.equal(sum);
    });
  });

  it("Should never decrease the accumulator", function () {
    const { launchPool } = fixture;
    let previous = launchPool.accRewardPerShare;
    let previousTime = launchPool.lastRewardTime;
    runRandomActivity(7, () => {
      expect(launchPool.accRewardPerShare >= previous).to.equal(true);
      expect(launchPool.lastRewardTime >= previousTime).to.equal(true);
      previous = launchPool.accRewardPerShare;
      previousTime = launchPool.lastRewardTime;
    });
  });

  it("Should never promise more than the pool reward", function () {
    const { launchPool } = fixture;
    runRandomActivity(42, () => {
      const promised = users.reduce((total, user) => total + launchPool.pendingReward(user), 0n);
      expect(promised <= POOL_REWARD).to.equal(true);
    });
  });

  it("Should pay out the pool reward up to rounding dust", function () {
    const { launchPool, ledger, rewardToken } = fixture;
    runRandomActivity(2024, () => undefined);

    let paid = 0n;
    for (const user of users) {
      if (launchPool.pendingReward(user) > 0n) {
        paid += launchPool.claimReward(user);
      }
    }

    expect(paid).to.equal(launchPool.totalRewardsPaid);
    expect(paid <= POOL_REWARD).to.equal(true);
    expect(POOL_REWARD - paid < 1_000_000_000_000n).to.equal(true);
    expect(ledger.balanceOf(rewardToken, launchPool.address)).to.equal(POOL_REWARD - paid);
    for (const user of users) {
      expect(launchPool.pendingReward(user)).to.equal(0n);
    }
  });

  it("Should pay the same regardless of how often users checkpoint", function () {
    const { launchPool, clock, startTime, endTime, signers } = fixture;
    launchPool.deposit(signers.user1, parseEther("25"));
    launchPool.deposit(signers.user2, parseEther("25"));

    for (let t = startTime + 100; t < endTime; t += 100) {
      clock.increaseTo(t);
      launchPool.deposit(signers.user1, 0n);
    }
    clock.increaseTo(endTime);

    expect(launchPool.claimReward(signers.user1)).to.equal(parseEther("180"));
    expect(launchPool.claimReward(signers.user2)).to.equal(parseEther("180"));
  });

  it("Should leave only unowed rewards to the owner", function () {
    const { launchPool, clock, startTime, signers } = fixture;
    clock.increaseTo(startTime + 600);
    launchPool.deposit(signers.user1, parseEther("20"));
    clock.increaseTo(startTime + 2400);
    launchPool.stopReward(signers.projectOwner);

    const owed = launchPool.pendingReward(signers.user1);
    expect(owed).to.equal(parseEther("180"));
    const swept = launchPool.withdrawRemainingRewards(signers.projectOwner);

    expect(swept + owed).to.equal(POOL_REWARD);
    expect(launchPool.claimReward(signers.user1)).to.equal(owed);
    expect(launchPool.rewardBalance()).to.equal(0n);
  });
});
