import { getAddress, getCreate2Address, id, solidityPackedKeccak256 } from "ethers";
import type { Address } from "../types";
import { PoolVariant } from "../types";

export interface PoolIdentityParams {
  projectId: bigint;
  stakedAsset: Address;
  rewardAsset: Address;
  startTime: number;
  /** Factory-wide deployment counter */
  nonce: bigint;
}

/** Stand-in for the init code hash of each pool implementation. */
export function poolInitCodeHash(variant: PoolVariant): string {
  return id(`LaunchPool.v${variant}`);
}

export function poolSalt(params: PoolIdentityParams): string {
  return solidityPackedKeccak256(
    ["uint256", "address", "address", "uint256", "uint256"],
    [params.projectId, params.stakedAsset, params.rewardAsset, params.startTime, params.nonce]
  );
}

/**
 * CREATE2-style pool identity. Anyone holding the factory address and the
 * creation parameters can recompute it.
 */
export function computePoolAddress(factory: Address, params: PoolIdentityParams, variant: PoolVariant): Address {
  return getAddress(getCreate2Address(factory, poolSalt(params), poolInitCodeHash(variant)));
}
