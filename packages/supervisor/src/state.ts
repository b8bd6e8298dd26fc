/**
 * SupervisorState -- everything the restart controller mutates, in one place.
 *
 * Owns the restart ledger, the handle of the (at most one) live child, and
 * the termination flag. Other components, the health server in particular,
 * read it only through `snapshot()`, which returns an immutable copy.
 */

import { SupervisorError } from '@botkeeper/core';
import { RestartLedger } from './ledger.js';
import type { ChildExit, ChildHandle } from './process-supervisor.js';

export type ChildStatus = 'not_started' | 'running' | 'exited' | 'stopped';

export interface SupervisorSnapshot {
  readonly childId: string;
  readonly childStatus: ChildStatus;
  readonly pid?: number;
  readonly restartCount: number;
  readonly totalSpawns: number;
  readonly lastExitCode: number | null;
  readonly lastExitSignal: string | null;
  readonly lastExitAt?: Date;
  readonly coolingDown: boolean;
  readonly terminationRequested: boolean;
  readonly startedAt: Date;
}

/** Read-only view handed to the health server. */
export interface SupervisorStateReader {
  snapshot(): SupervisorSnapshot;
  readonly terminationSignal: AbortSignal;
}

export interface SupervisorStateOptions {
  childId?: string;
  windowMs?: number;
  now?: () => number;
}

export class SupervisorState implements SupervisorStateReader {
  readonly childId: string;
  readonly ledger: RestartLedger;
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly termination = new AbortController();

  private handle: ChildHandle | null = null;
  private status: ChildStatus = 'not_started';
  private spawns = 0;
  private lastExit: (ChildExit & { at: number }) | null = null;
  private coolingDown = false;

  constructor(options: SupervisorStateOptions = {}) {
    this.childId = options.childId ?? 'bot';
    this.ledger = new RestartLedger(options.windowMs);
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  // ── Termination flag ─────────────────────────────────────────────────

  get terminationRequested(): boolean {
    return this.termination.signal.aborted;
  }

  get terminationSignal(): AbortSignal {
    return this.termination.signal;
  }

  /** Set the flag. Returns false if it was already set. */
  requestTermination(reason: string): boolean {
    if (this.termination.signal.aborted) return false;
    this.termination.abort(reason);
    return true;
  }

  // ── Child handle ─────────────────────────────────────────────────────

  get currentHandle(): ChildHandle | null {
    return this.handle;
  }

  get childStatus(): ChildStatus {
    return this.status;
  }

  get totalSpawns(): number {
    return this.spawns;
  }

  /** Track a freshly spawned child. Throws if another child is still live. */
  attach(handle: ChildHandle): void {
    if (this.handle && this.handle.isAlive()) {
      throw new SupervisorError(
        `Child "${this.childId}" is already running (pid ${this.handle.pid ?? 'unknown'})`,
        this.childId,
        { livePid: this.handle.pid, newPid: handle.pid },
      );
    }
    this.handle = handle;
    this.status = 'running';
    this.spawns += 1;
  }

  /** Record the exit of the current child and discard its handle. */
  detach(exit: ChildExit): void {
    this.handle = null;
    this.status = 'exited';
    this.lastExit = { ...exit, at: this.now() };
  }

  markStopped(): void {
    this.handle = null;
    this.status = 'stopped';
  }

  setCoolingDown(value: boolean): void {
    this.coolingDown = value;
  }

  // ── Snapshot ─────────────────────────────────────────────────────────

  snapshot(): SupervisorSnapshot {
    return Object.freeze({
      childId: this.childId,
      childStatus: this.status,
      pid: this.handle?.pid,
      restartCount: this.ledger.count(this.now()),
      totalSpawns: this.spawns,
      lastExitCode: this.lastExit?.code ?? null,
      lastExitSignal: this.lastExit?.signal ?? null,
      lastExitAt: this.lastExit ? new Date(this.lastExit.at) : undefined,
      coolingDown: this.coolingDown,
      terminationRequested: this.terminationRequested,
      startedAt: new Date(this.startedAt),
    });
  }
}
