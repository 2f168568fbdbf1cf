import { expect } from "chai";
import { parseEther } from "ethers";
import {
  advance,
  calculateRewardPerSecond,
  ceilDiv,
  overlap,
  pendingOf,
  precisionFactorFor,
  releasedAt,
  rewardDebtOf,
  type RewardWindow,
} from "../contracts/libraries/RewardMath";

describe("Reward Math", function () {
  const window: RewardWindow = {
    rewardPerSecond: parseEther("0.1"),
    startTime: 1_000,
    endTime: 4_600,
    precisionFactor: 10n ** 12n,
    rewardCap: parseEther("360"),
  };
  const staked = parseEther("50");

  describe("advance", function () {
    it("Should do nothing when time has not moved", function () {
      const state = { accRewardPerShare: 5n, lastRewardTime: 2_000 };
      expect(advance(state, window, staked, 2_000)).to.equal(state);
      expect(advance(state, window, staked, 1_999)).to.equal(state);
    });

    it("Should only move the checkpoint before the start", function () {
      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 0 }, window, staked, 500);
      expect(next).to.deep.equal({ accRewardPerShare: 0n, lastRewardTime: 1_000 });
    });

    it("Should do nothing once the checkpoint reached the end", function () {
      const state = { accRewardPerShare: 7n, lastRewardTime: 4_600 };
      expect(advance(state, window, staked, 9_000)).to.equal(state);
    });

    it("Should forfeit an interval with nothing staked", function () {
      const next = advance({ accRewardPerShare: 3n, lastRewardTime: 1_000 }, window, 0n, 2_000);
      expect(next).to.deep.equal({ accRewardPerShare: 3n, lastRewardTime: 2_000 });
    });

    it("Should accrue elapsed time times rate over the stake", function () {
      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 1_000 }, window, staked, 1_900);
      expect(next).to.deep.equal({ accRewardPerShare: 1_800_000_000_000n, lastRewardTime: 1_900 });
    });

    it("Should clamp accrual to the window", function () {
      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 1_000 }, window, staked, 10_000);
      expect(next).to.deep.equal({ accRewardPerShare: 7_200_000_000_000n, lastRewardTime: 4_600 });
    });

    it("Should count only the part of an interval inside the window", function () {
      // checkpoint left before the start, e.g. by a window moved later
      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 400 }, window, staked, 1_100);
      expect(next).to.deep.equal({ accRewardPerShare: 200_000_000_000n, lastRewardTime: 1_100 });
    });

    it("Should truncate the per-share increment", function () {
      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 1_000 }, window, 3n, 1_001);
      // 0.1e18 * 1e12 / 3
      expect(next.accRewardPerShare).to.equal(33_333_333_333_333_333_333_333_333_333n);
    });
  });

  describe("reward cap", function () {
    const fast: RewardWindow = { ...window, rewardPerSecond: parseEther("1") };

    it("Should release rate times elapsed up to the cap", function () {
      expect(releasedAt(fast, 500)).to.equal(0n);
      expect(releasedAt(fast, 1_100)).to.equal(parseEther("100"));
      expect(releasedAt(fast, 1_360)).to.equal(parseEther("360"));
      expect(releasedAt(fast, 4_600)).to.equal(parseEther("360"));
    });

    it("Should stop accruing once the cap is released", function () {
      const capped = advance({ accRewardPerShare: 0n, lastRewardTime: 1_000 }, fast, staked, 2_000);
      expect(capped).to.deep.equal({ accRewardPerShare: 7_200_000_000_000n, lastRewardTime: 2_000 });

      const after = advance(capped, fast, staked, 3_000);
      expect(after).to.deep.equal({ accRewardPerShare: 7_200_000_000_000n, lastRewardTime: 3_000 });
    });

    it("Should not release the rounding excess of a ceiling rate", function () {
      const uneven: RewardWindow = {
        ...window,
        rewardPerSecond: calculateRewardPerSecond(100n, 1_000, 4_600),
        rewardCap: 100n,
      };
      expect(uneven.rewardPerSecond).to.equal(1n);
      expect(releasedAt(uneven, 1_050)).to.equal(50n);
      expect(releasedAt(uneven, 4_600)).to.equal(100n);

      const next = advance({ accRewardPerShare: 0n, lastRewardTime: 1_000 }, uneven, 10n, 4_600);
      expect(pendingOf(10n, 0n, 0n, next.accRewardPerShare, uneven.precisionFactor)).to.equal(100n);
    });
  });

  describe("overlap", function () {
    it("Should measure the intersection with the window", function () {
      expect(overlap(0, 500, 1_000, 4_600)).to.equal(0);
      expect(overlap(900, 1_100, 1_000, 4_600)).to.equal(100);
      expect(overlap(1_000, 4_600, 1_000, 4_600)).to.equal(3_600);
      expect(overlap(4_000, 9_000, 1_000, 4_600)).to.equal(600);
      expect(overlap(5_000, 9_000, 1_000, 4_600)).to.equal(0);
    });
  });

  describe("pending and debt", function () {
    it("Should add carried rewards to the live share", function () {
      const acc = 2_700_000_000_000n;
      const debt = rewardDebtOf(staked, 1_800_000_000_000n, window.precisionFactor);
      expect(debt).to.equal(parseEther("90"));
      expect(pendingOf(staked, debt, parseEther("1"), acc, window.precisionFactor)).to.equal(parseEther("46"));
    });

    it("Should refuse a debt above the accrued share", function () {
      expect(() => pendingOf(staked, parseEther("91"), 0n, 1_800_000_000_000n, window.precisionFactor)).to.throw(
        RangeError,
        "stale checkpoint"
      );
    });
  });

  describe("calculateRewardPerSecond", function () {
    it("Should round up so the window emits at least the amount", function () {
      const cases: Array<[bigint, number]> = [
        [parseEther("360"), 3_600],
        [parseEther("100"), 3_600],
        [1n, 86_400],
        [10n ** 18n + 1n, 7],
        [parseEther("1000000"), 30 * 24 * 3600],
      ];
      for (const [amount, duration] of cases) {
        const rate = calculateRewardPerSecond(amount, 0, duration);
        const total = rate * BigInt(duration);
        expect(total >= amount, `${amount} over ${duration}s`).to.equal(true);
        expect(total - amount < BigInt(duration), `${amount} over ${duration}s`).to.equal(true);
      }
    });

    it("Should be exact when the amount divides evenly", function () {
      expect(calculateRewardPerSecond(parseEther("360"), 100, 3_700)).to.equal(parseEther("0.1"));
    });

    it("Should reject an empty window", function () {
      expect(() => calculateRewardPerSecond(1n, 10, 10)).to.throw(RangeError);
    });
  });

  describe("ceilDiv", function () {
    it("Should round up", function () {
      expect(ceilDiv(0n, 3n)).to.equal(0n);
      expect(ceilDiv(1n, 3n)).to.equal(1n);
      expect(ceilDiv(3n, 3n)).to.equal(1n);
      expect(ceilDiv(4n, 3n)).to.equal(2n);
      expect(() => ceilDiv(1n, 0n)).to.throw(RangeError);
    });
  });

  describe("precisionFactorFor", function () {
    it("Should scale to 30 digits", function () {
      expect(precisionFactorFor(18)).to.equal(10n ** 12n);
      expect(precisionFactorFor(6)).to.equal(10n ** 24n);
      expect(precisionFactorFor(0)).to.equal(10n ** 30n);
      expect(precisionFactorFor(29)).to.equal(10n);
    });

    it("Should reject 30 decimals or more", function () {
      expect(() => precisionFactorFor(30)).to.throw(RangeError);
      expect(() => precisionFactorFor(36)).to.throw(RangeError);
      expect(() => precisionFactorFor(-1)).to.throw(RangeError);
    });
  });
});
