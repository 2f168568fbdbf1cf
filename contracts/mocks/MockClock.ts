import type { IClock } from "../interfaces/IClock";

/** Settable clock, used the way hardhat's `time` helpers are used against a node. */
export class MockClock implements IClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  increase(seconds: number): number {
    if (seconds < 0) {
      throw new Error(`cannot move time backwards by ${seconds}s`);
    }
    this.current += seconds;
    return this.current;
  }

  increaseTo(timestamp: number): number {
    if (timestamp < this.current) {
      throw new Error(`timestamp ${timestamp} is lower than the current time ${this.current}`);
    }
    this.current = timestamp;
    return this.current;
  }
}
