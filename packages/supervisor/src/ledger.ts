/**
 * RestartLedger -- restart timestamps over a rolling window.
 *
 * Every append and every count prunes first, so the length of the ledger
 * is always the number of restarts within `[now - windowMs, now]`.
 */

import { DAY_MS } from './strategies.js';

export class RestartLedger {
  readonly windowMs: number;
  private timestamps: number[] = [];

  constructor(windowMs: number = DAY_MS) {
    this.windowMs = windowMs;
  }

  /** Drop entries that fell out of the window. Returns the remaining count. */
  prune(now: number = Date.now()): number {
    const cutoff = now - this.windowMs;
    this.timestamps = this.timestamps.filter((ts) => ts > cutoff);
    return this.timestamps.length;
  }

  /** Append a restart at `now`. Returns the pruned count including it. */
  record(now: number = Date.now()): number {
    this.prune(now);
    this.timestamps.push(now);
    return this.timestamps.length;
  }

  /** Restarts within the window ending at `now`. */
  count(now: number = Date.now()): number {
    return this.prune(now);
  }

  clear(): void {
    this.timestamps = [];
  }

  entries(): readonly number[] {
    return [...this.timestamps];
  }
}
