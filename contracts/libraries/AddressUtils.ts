import { getAddress, isAddress, ZeroAddress } from "ethers";
import { LaunchPoolError } from "../errors";
import type { Address } from "../types";

/** Checksums `value`; rejects malformed input and, unless allowed, the zero address. */
export function toAddress(value: string, label: string, { allowZero = false } = {}): Address {
  if (!isAddress(value)) {
    throw new LaunchPoolError("InvalidAddress", `${label} is not an address: ${value}`);
  }
  const address = getAddress(value);
  if (!allowZero && address === ZeroAddress) {
    throw new LaunchPoolError("ZeroAddress", `${label} is the zero address`);
  }
  return address;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
