import { LaunchPoolError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("ReentrancyGuard");

/**
 * Scoped non-reentrant section with all-or-nothing semantics.
 *
 * `run` takes the lock, snapshots the guarded state, runs the body and
 * releases the lock on every exit path. If the body throws, the snapshot is
 * written back before the error propagates. Callbacks registered with
 * `afterCommit` (event emission) run only once the body has succeeded and
 * the lock is free; a callback that throws is logged and does not change the
 * outcome of the committed body.
 */
export class ReentrancyGuard<S> {
  private entered = false;
  private deferred: Array<() => void> = [];

  constructor(
    private readonly snapshot: () => S,
    private readonly restore: (state: S) => void
  ) {}

  get locked(): boolean {
    return this.entered;
  }

  run<T>(body: () => T): T {
    if (this.entered) {
      throw new LaunchPoolError("ReentrancyGuardReentrantCall", "reentrant call");
    }
    const result = this.runLocked(body);

    const callbacks = this.deferred;
    this.deferred = [];
    for (const callback of callbacks) {
      try {
        callback();
      } catch (error) {
        log.error({ err: error }, "after-commit callback failed");
      }
    }
    return result;
  }

  private runLocked<T>(body: () => T): T {
    this.entered = true;
    const saved = this.snapshot();
    try {
      return body();
    } catch (error) {
      this.restore(saved);
      this.deferred = [];
      throw error;
    } finally {
      this.entered = false;
    }
  }

  afterCommit(callback: () => void): void {
    if (!this.entered) {
      callback();
      return;
    }
    this.deferred.push(callback);
  }
}
