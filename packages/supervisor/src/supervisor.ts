/**
 * BotSupervisor -- the restart controller for a single child process.
 *
 * Loop: enforce the daily cap, spawn, wait for exit, compute a backoff from
 * the restart ledger, sleep, repeat. Only one child is ever live. A clean
 * exit (code 0) ends the loop without touching the ledger; any other exit
 * records one restart and schedules one retry. Every sleep is tied to the
 * termination flag, so `stop()` takes effect immediately.
 */

import { EventEmitter } from 'node:events';
import {
  SupervisorError,
  toError,
  type HostStatsSnapshot,
  type ISupervisorObserver,
} from '@botkeeper/core';
import { type RestartPolicy, DEFAULT_RESTART_POLICY, backoffDelay } from './strategies.js';
import { SupervisorState } from './state.js';
import { interruptibleSleep } from './sleep.js';
import type { ChildExit, ChildHandle, ChildLauncher } from './process-supervisor.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface SupervisorRunResult {
  reason: 'terminated' | 'clean_exit';
  restartCount: number;
  totalSpawns: number;
}

export interface SupervisorEvents {
  'child:started': [handle: ChildHandle, attempt: number];
  'child:exited': [exit: ChildExit];
  'child:spawn_failed': [error: Error];
  'restart:scheduled': [delayMs: number, restartCount: number];
  'restart:cooldown': [restartCount: number, cooldownMs: number];
  'supervisor:started': [];
  'supervisor:stopped': [result: SupervisorRunResult];
}

export interface BotSupervisorOptions {
  launcher: ChildLauncher;
  policy?: Partial<RestartPolicy>;
  observer?: ISupervisorObserver;
  /** Shared state; created from `policy.windowMs` when omitted. */
  state?: SupervisorState;
  /** Port of the health server, reported in the start event. */
  healthPort?: number;
  /** Sampled before every spawn and attached to the spawned event. */
  sampleHostStats?: () => Promise<HostStatsSnapshot | undefined>;
  now?: () => number;
}

// ── BotSupervisor ────────────────────────────────────────────────────────

export class BotSupervisor extends EventEmitter<SupervisorEvents> {
  readonly state: SupervisorState;
  readonly policy: RestartPolicy;

  private readonly launcher: ChildLauncher;
  private readonly observer?: ISupervisorObserver;
  private readonly healthPort?: number;
  private readonly sampleHostStats?: () => Promise<HostStatsSnapshot | undefined>;
  private readonly now: () => number;

  private runPromise: Promise<SupervisorRunResult> | null = null;
  private terminating: Promise<void> | null = null;

  constructor(options: BotSupervisorOptions) {
    super();
    this.policy = { ...DEFAULT_RESTART_POLICY, ...options.policy };
    this.launcher = options.launcher;
    this.observer = options.observer;
    this.healthPort = options.healthPort;
    this.sampleHostStats = options.sampleHostStats;
    this.now = options.now ?? Date.now;
    this.state =
      options.state ?? new SupervisorState({ windowMs: this.policy.windowMs, now: this.now });
  }

  get childId(): string {
    return this.state.childId;
  }

  get isRunning(): boolean {
    return this.runPromise !== null;
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /**
   * Run the restart loop until termination is requested or the child exits
   * cleanly. Rejects if the loop is already running.
   */
  async run(): Promise<SupervisorRunResult> {
    if (this.runPromise) {
      throw new SupervisorError(`Supervisor for "${this.childId}" is already running`, this.childId);
    }
    this.runPromise = this.loop();
    try {
      return await this.runPromise;
    } finally {
      this.runPromise = null;
    }
  }

  /**
   * Set the termination flag, shut the live child down (SIGTERM, grace
   * period, SIGKILL) and wait for the loop to finish.
   */
  async stop(reason = 'stop requested'): Promise<void> {
    this.state.requestTermination(reason);
    await this.stopChild(reason);
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  // ── Restart loop ─────────────────────────────────────────────────────

  private async loop(): Promise<SupervisorRunResult> {
    const startedAt = this.now();
    const { command, args } = this.launcher.describe();
    const signal = this.state.terminationSignal;

    this.observer?.onSupervisorStart({
      pid: process.pid,
      command,
      args,
      healthPort: this.healthPort,
      startedAt: new Date(startedAt),
    });
    this.emit('supervisor:started');

    let reason: SupervisorRunResult['reason'] = 'terminated';
    let attempt = 0;

    while (!this.state.terminationRequested) {
      if (!(await this.enforceDailyCap())) break;

      attempt += 1;
      const handle = await this.spawnChild(attempt);
      if (!handle) {
        if (!(await interruptibleSleep(this.policy.spawnRetryDelayMs, signal))) break;
        continue;
      }

      const exit = await this.waitForExit(handle);
      if (this.state.terminationRequested) break;

      if (exit.code === 0 && exit.signal === null) {
        reason = 'clean_exit';
        break;
      }

      const delay = this.computeBackoff(exit);
      if (!(await interruptibleSleep(delay, signal))) break;
    }

    await this.stopChild('supervisor exiting');
    this.state.markStopped();

    const result: SupervisorRunResult = {
      reason,
      restartCount: this.state.ledger.count(this.now()),
      totalSpawns: this.state.totalSpawns,
    };
    this.observer?.onSupervisorStop({ ...result, uptimeMs: this.now() - startedAt });
    this.emit('supervisor:stopped', result);
    return result;
  }

  // ── Steps ────────────────────────────────────────────────────────────

  /** Launch a child. Returns null (after logging) if it could not start. */
  async spawnChild(attempt = 1): Promise<ChildHandle | null> {
    const hostStats = await this.collectHostStats();

    let handle: ChildHandle;
    try {
      handle = await this.launcher.launch();
    } catch (err) {
      const error = toError(err);
      this.observer?.onChildEvent({ type: 'spawn_failed', childId: this.childId, error });
      this.emit('child:spawn_failed', error);
      return null;
    }

    this.state.attach(handle);
    this.observer?.onChildEvent({
      type: 'spawned',
      childId: this.childId,
      pid: handle.pid,
      attempt,
      hostStats,
    });
    this.emit('child:started', handle, attempt);

    // stop() may have run while the launch was in flight.
    if (this.state.terminationRequested) {
      await this.stopChild('termination requested during spawn');
    }
    return handle;
  }

  /** Block until the child exits, then record the exit. */
  async waitForExit(handle: ChildHandle): Promise<ChildExit> {
    const exit = await handle.wait();
    this.state.detach(exit);
    this.observer?.onChildEvent({
      type: 'exited',
      childId: this.childId,
      pid: handle.pid,
      code: exit.code,
      signal: exit.signal,
      uptimeMs: exit.uptimeMs,
      requested: this.state.terminationRequested,
    });
    this.emit('child:exited', exit);
    return exit;
  }

  /** Record a restart in the ledger and return the delay before it. */
  computeBackoff(exit?: ChildExit): number {
    const count = this.state.ledger.record(this.now());
    const delayMs = backoffDelay(count, this.policy);
    this.observer?.onRestartEvent({
      type: 'scheduled',
      childId: this.childId,
      delayMs,
      restartCount: count,
      exitCode: exit?.code ?? null,
    });
    this.emit('restart:scheduled', delayMs, count);
    return delayMs;
  }

  /**
   * If the window holds `maxRestarts` restarts, sleep for the cooldown and
   * clear the ledger. Returns false if termination interrupted the wait.
   */
  async enforceDailyCap(): Promise<boolean> {
    const count = this.state.ledger.count(this.now());
    if (count < this.policy.maxRestarts) return true;

    this.state.setCoolingDown(true);
    this.observer?.onRestartEvent({
      type: 'cooldown',
      childId: this.childId,
      restartCount: count,
      maxRestarts: this.policy.maxRestarts,
      cooldownMs: this.policy.cooldownMs,
    });
    this.emit('restart:cooldown', count, this.policy.cooldownMs);

    const completed = await interruptibleSleep(this.policy.cooldownMs, this.state.terminationSignal);
    this.state.setCoolingDown(false);
    if (!completed) return false;

    this.state.ledger.clear();
    this.observer?.onRestartEvent({ type: 'cooldown_finished', childId: this.childId });
    return true;
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private stopChild(reason: string): Promise<void> {
    if (!this.terminating) {
      this.terminating = this.terminateChild(reason).finally(() => {
        this.terminating = null;
      });
    }
    return this.terminating;
  }

  private async terminateChild(reason: string): Promise<void> {
    const handle = this.state.currentHandle;
    if (!handle || !handle.isAlive()) return;

    this.observer?.onChildEvent({
      type: 'terminating',
      childId: this.childId,
      pid: handle.pid,
      reason,
    });

    try {
      const outcome = await handle.terminate(this.policy.shutdownGraceMs);
      if (outcome === 'killed') {
        this.observer?.onChildEvent({
          type: 'killed',
          childId: this.childId,
          pid: handle.pid,
          graceMs: this.policy.shutdownGraceMs,
        });
      }
    } catch (err) {
      this.observer?.onError(toError(err), { childId: this.childId, action: 'terminate' });
    }
  }

  private async collectHostStats(): Promise<HostStatsSnapshot | undefined> {
    if (!this.sampleHostStats) return undefined;
    try {
      return await this.sampleHostStats();
    } catch (err) {
      this.observer?.onError(toError(err), { childId: this.childId, action: 'host_stats' });
      return undefined;
    }
  }
}
