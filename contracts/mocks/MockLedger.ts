import { getAddress } from "ethers";
import type { IAssetLedger } from "../interfaces/IAssetLedger";
import { NATIVE_ASSET } from "../interfaces/IAssetLedger";
import type { Address } from "../types";

interface MockAsset {
  name: string;
  symbol: string;
  decimals: number;
  balances: Map<Address, bigint>;
  allowances: Map<string, bigint>;
}

/**
 * In-memory fungible ledger for tests and simulations, ERC-20 flavoured:
 * pulls need an allowance from the holder to the receiving address, and
 * failures throw with the usual ERC-20 error names. The native asset is
 * pre-registered with 18 decimals and needs no allowance.
 */
export class MockLedger implements IAssetLedger {
  private readonly assets = new Map<Address, MockAsset>();

  constructor() {
    this.assets.set(getAddress(NATIVE_ASSET), {
      name: "Ether",
      symbol: "ETH",
      decimals: 18,
      balances: new Map(),
      allowances: new Map(),
    });
  }

  /** Registers an asset and returns its identity. */
  deploy(address: Address, name: string, symbol: string, decimals = 18): Address {
    const asset = getAddress(address);
    if (this.assets.has(asset)) {
      throw new Error(`asset ${asset} already deployed`);
    }
    this.assets.set(asset, { name, symbol, decimals, balances: new Map(), allowances: new Map() });
    return asset;
  }

  mint(asset: Address, to: Address, amount: bigint): void {
    const token = this.asset(asset);
    const holder = getAddress(to);
    token.balances.set(holder, (token.balances.get(holder) ?? 0n) + amount);
  }

  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.asset(asset).allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.asset(asset).allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /** Holder-initiated transfer, for tests that send tokens somewhere directly. */
  transfer(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.move(this.asset(asset), getAddress(from), getAddress(to), amount);
  }

  pull(asset: Address, from: Address, to: Address, amount: bigint): void {
    const token = this.asset(asset);
    const isNative = getAddress(asset) === getAddress(NATIVE_ASSET);
    if (!isNative) {
      const key = allowanceKey(from, to);
      const allowed = token.allowances.get(key) ?? 0n;
      if (allowed < amount) {
        throw new Error(`ERC20InsufficientAllowance(${getAddress(to)}, ${allowed}, ${amount})`);
      }
      this.move(token, getAddress(from), getAddress(to), amount);
      token.allowances.set(key, allowed - amount);
      return;
    }
    this.move(token, getAddress(from), getAddress(to), amount);
  }

  push(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.move(this.asset(asset), getAddress(from), getAddress(to), amount);
  }

  balanceOf(asset: Address, holder: Address): bigint {
    return this.asset(asset).balances.get(getAddress(holder)) ?? 0n;
  }

  decimalsOf(asset: Address): number {
    return this.asset(asset).decimals;
  }

  symbolOf(asset: Address): string {
    return this.asset(asset).symbol;
  }

  private asset(address: Address): MockAsset {
    const token = this.assets.get(getAddress(address));
    if (!token) {
      throw new Error(`unknown asset ${address}`);
    }
    return token;
  }

  private move(token: MockAsset, from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`negative transfer amount ${amount}`);
    }
    const balance = token.balances.get(from) ?? 0n;
    if (balance < amount) {
      throw new Error(`ERC20InsufficientBalance(${from}, ${balance}, ${amount})`);
    }
    token.balances.set(from, balance - amount);
    token.balances.set(to, (token.balances.get(to) ?? 0n) + amount);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${getAddress(owner)}:${getAddress(spender)}`;
}
