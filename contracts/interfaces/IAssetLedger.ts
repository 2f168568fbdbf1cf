import type { Address } from "../types";

/** Sentinel identity for the chain's native asset (value-attached deposits). */
export const NATIVE_ASSET: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

/**
 * Fungible-asset ledger. Calls are synchronous and atomic; a failed move
 * throws and leaves every balance untouched.
 */
export interface IAssetLedger {
  /** Moves `amount` of `asset` from `from` to `to` on behalf of `to` (allowance-based pull). */
  pull(asset: Address, from: Address, to: Address, amount: bigint): void;
  /** Moves `amount` of `asset` held by `from` to `to`. */
  push(asset: Address, from: Address, to: Address, amount: bigint): void;
  balanceOf(asset: Address, holder: Address): bigint;
  decimalsOf(asset: Address): number;
}
