/**
 * Reward-per-share accounting.
 *
 * The accumulator tracks the reward earned by one unit of stake since the
 * pool started, scaled by a precision factor. A user's share is
 * `amount * accRewardPerShare / precision - rewardDebt`, where `rewardDebt`
 * is the same product taken at the user's last checkpoint.
 *
 * All division truncates, so the accumulator can only under-distribute.
 * The rate is rounded up, so cumulative release is also capped at the
 * window's `rewardCap`: the window never releases more than was funded.
 */

/** Reward assets with this many decimals or more are rejected. */
export const PRECISION_CEILING_DIGITS = 30;

export interface AccumulatorState {
  accRewardPerShare: bigint;
  lastRewardTime: number;
}

export interface RewardWindow {
  rewardPerSecond: bigint;
  startTime: number;
  endTime: number;
  precisionFactor: bigint;
  /** Most the window may ever release */
  rewardCap: bigint;
}

/** Reward released by the window from its start up to `time`. */
export function releasedAt(window: RewardWindow, time: number): bigint {
  const elapsed = overlap(window.startTime, time, window.startTime, window.endTime);
  const released = BigInt(elapsed) * window.rewardPerSecond;
  return released < window.rewardCap ? released : window.rewardCap;
}

/**
 * Advances the accumulator to `now`. Returns the input object when nothing
 * changes so callers can cheaply detect a no-op.
 */
export function advance(
  state: AccumulatorState,
  window: RewardWindow,
  totalStaked: bigint,
  now: number
): AccumulatorState {
  const { accRewardPerShare, lastRewardTime } = state;

  if (now <= lastRewardTime) {
    return state;
  }
  if (now < window.startTime) {
    return { accRewardPerShare, lastRewardTime: window.startTime };
  }
  if (lastRewardTime >= window.endTime) {
    return state;
  }

  const newLastRewardTime = Math.min(now, window.endTime);
  if (totalStaked === 0n) {
    // Nobody staked during the interval: its rewards are forfeited
    return { accRewardPerShare, lastRewardTime: newLastRewardTime };
  }

  const reward = releasedAt(window, now) - releasedAt(window, lastRewardTime);
  return {
    accRewardPerShare: accRewardPerShare + (reward * window.precisionFactor) / totalStaked,
    lastRewardTime: newLastRewardTime,
  };
}

/** Length of `[from, to]` ∩ `[startTime, endTime]`, never negative. */
export function overlap(from: number, to: number, startTime: number, endTime: number): number {
  const lower = Math.max(from, startTime);
  const upper = Math.min(to, endTime);
  return upper > lower ? upper - lower : 0;
}

export function pendingOf(
  amount: bigint,
  rewardDebt: bigint,
  pendingRewards: bigint,
  accRewardPerShare: bigint,
  precisionFactor: bigint
): bigint {
  const accrued = (amount * accRewardPerShare) / precisionFactor;
  if (accrued < rewardDebt) {
    throw new RangeError(`reward debt ${rewardDebt} exceeds accrued ${accrued}: stale checkpoint`);
  }
  return accrued - rewardDebt + pendingRewards;
}

export function rewardDebtOf(amount: bigint, accRewardPerShare: bigint, precisionFactor: bigint): bigint {
  return (amount * accRewardPerShare) / precisionFactor;
}

export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new RangeError("ceilDiv: denominator must be positive");
  }
  if (numerator === 0n) return 0n;
  return (numerator - 1n) / denominator + 1n;
}

/**
 * Per-second rate that distributes at least `poolRewardAmount` over the
 * window. Rounds up, so `rate * duration >= poolRewardAmount`.
 */
export function calculateRewardPerSecond(poolRewardAmount: bigint, startTime: number, endTime: number): bigint {
  if (endTime <= startTime) {
    throw new RangeError(`invalid reward window [${startTime}, ${endTime})`);
  }
  return ceilDiv(poolRewardAmount, BigInt(endTime - startTime));
}

/** `10^(30 - decimals)`; throws for reward assets at or above the ceiling. */
export function precisionFactorFor(rewardDecimals: number): bigint {
  if (!Number.isInteger(rewardDecimals) || rewardDecimals < 0 || rewardDecimals >= PRECISION_CEILING_DIGITS) {
    throw new RangeError(`reward asset decimals must be in [0, ${PRECISION_CEILING_DIGITS}), got ${rewardDecimals}`);
  }
  return 10n ** BigInt(PRECISION_CEILING_DIGITS - rewardDecimals);
}
