/**
 * Error taxonomy. Every rejected operation throws a {@link LaunchPoolError}
 * whose `code` names the violated precondition, mirroring custom errors on a
 * contract (`revertedWithCustomError(pool, "BelowMinStake")`).
 */

export type LaunchPoolErrorCode =
  | "NotOwner"
  | "NotProjectOwner"
  | "InvalidStatus"
  | "InvalidStatusTransition"
  | "ZeroAddress"
  | "InvalidAddress"
  | "InvalidAsset"
  | "InvalidTimes"
  | "InvalidAmount"
  | "BelowMinStake"
  | "UserLimitExceeded"
  | "InsufficientBalance"
  | "NoRewardsToClaim"
  | "PoolNotFound"
  | "ProjectNotFound"
  | "PoolAlreadyFunded"
  | "InvalidFundingAmount"
  | "AllocationExceeded"
  | "InvalidPrecision"
  | "AlreadyInitialized"
  | "InvalidNativeValue"
  | "TooManyProjects"
  | "ProjectIntervalNotElapsed"
  | "InvalidPolicy"
  | "InvalidMetadata"
  | "PoolHasStarted"
  | "ReentrancyGuardReentrantCall"
  | "TransferFailed";

export class LaunchPoolError extends Error {
  readonly code: LaunchPoolErrorCode;
  readonly reason: string;

  constructor(code: LaunchPoolErrorCode, reason: string, options?: { cause?: unknown }) {
    super(`${code}: ${reason}`, options);
    this.name = "LaunchPoolError";
    this.code = code;
    this.reason = reason;
  }
}

/** Throws `code` unless `condition` holds. */
export function ensure(condition: boolean, code: LaunchPoolErrorCode, reason: string): asserts condition {
  if (!condition) {
    throw new LaunchPoolError(code, reason);
  }
}

export function isLaunchPoolError(error: unknown, code?: LaunchPoolErrorCode): error is LaunchPoolError {
  return error instanceof LaunchPoolError && (code === undefined || error.code === code);
}
