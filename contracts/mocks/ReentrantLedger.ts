import type { Address } from "../types";
import { MockLedger } from "./MockLedger";

/**
 * Ledger whose transfers call back into caller-supplied code before moving
 * funds, standing in for a token with transfer hooks.
 */
export class ReentrantLedger extends MockLedger {
  private hook: ((kind: "pull" | "push", to: Address) => void) | null = null;

  onTransfer(hook: ((kind: "pull" | "push", to: Address) => void) | null): void {
    this.hook = hook;
  }

  override pull(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.hook?.("pull", to);
    super.pull(asset, from, to, amount);
  }

  override push(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.hook?.("push", to);
    super.push(asset, from, to, amount);
  }
}
