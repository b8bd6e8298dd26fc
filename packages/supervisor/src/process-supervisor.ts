/**
 * ProcessLauncher -- spawns the bot as a child OS process.
 *
 * Stdout and stderr are each drained by their own line reader and forwarded
 * to the observer tagged `OUT` / `ERR`, so child output lands in the
 * supervisor's log sinks line by line. The returned handle exposes only what
 * the restart controller needs: liveness, the exit result, and a
 * terminate-then-kill shutdown.
 *
 * Exit is taken from the process `exit` event, not from stream EOF: a
 * grandchild that inherited the pipes can hold them open long after the bot
 * itself is gone. Remaining output gets `drainTimeoutMs` to arrive, then the
 * streams are destroyed.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { ISupervisorObserver, OutputStream } from '@botkeeper/core';

// ── Types ────────────────────────────────────────────────────────────────

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  uptimeMs: number;
}

export type TerminateOutcome = 'exited' | 'killed' | 'not_running';

export interface ChildHandle {
  id: string;
  pid?: number;
  startedAt: number;
  isAlive: () => boolean;
  /** Resolves once the child has exited and its output is drained. */
  wait: () => Promise<ChildExit>;
  /** SIGTERM, wait up to `graceMs`, then SIGKILL. Resolves after exit. */
  terminate: (graceMs: number) => Promise<TerminateOutcome>;
}

export interface ChildLauncher {
  describe(): { command: string; args: string[] };
  /** Start a new child. Rejects if the executable cannot be launched. */
  launch(): Promise<ChildHandle>;
}

export interface ProcessChildSpec {
  id: string;
  /** Command to execute (e.g. 'node'). */
  command: string;
  /** Arguments passed to the command. */
  args?: string[];
  /** Options forwarded to child_process.spawn. */
  spawnOptions?: SpawnOptions;
  /** How long to wait for stdio EOF after the child exits. Default 1000. */
  drainTimeoutMs?: number;
}

export const DEFAULT_DRAIN_TIMEOUT_MS = 1_000;

// ── ProcessChildHandle ───────────────────────────────────────────────────

class ProcessChildHandle implements ChildHandle {
  readonly id: string;
  readonly startedAt = Date.now();
  readonly spawned: Promise<void>;
  private readonly exitStatus: Promise<ChildExit>;
  private readonly closed: Promise<void>;
  private readonly finished: Promise<ChildExit>;
  private started = false;

  constructor(
    id: string,
    private readonly proc: ChildProcess,
    private readonly drainTimeoutMs: number,
    private readonly observer?: ISupervisorObserver,
  ) {
    this.id = id;

    this.spawned = new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        cleanup();
        this.started = true;
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const cleanup = () => {
        proc.off('spawn', onSpawn);
        proc.off('error', onError);
      };
      proc.once('spawn', onSpawn);
      proc.once('error', onError);
    });

    this.exitStatus = new Promise<ChildExit>((resolve) => {
      proc.once('exit', (code, signal) => {
        resolve({ code, signal, uptimeMs: Date.now() - this.startedAt });
      });
    });
    this.closed = new Promise<void>((resolve) => {
      proc.once('close', () => resolve());
    });
    this.finished = this.exitStatus.then(async (exit) => {
      await this.drain();
      return exit;
    });

    // Launch failures are reported by the controller; later ones (a failed
    // kill, a broken pipe) go straight to the observer.
    proc.on('error', (err) => {
      if (this.started) {
        this.observer?.onError(err, { childId: id, pid: proc.pid });
      }
    });

    this.attachReader(proc.stdout, 'OUT');
    this.attachReader(proc.stderr, 'ERR');
  }

  get pid(): number | undefined {
    return this.proc.pid;
  }

  isAlive(): boolean {
    return this.proc.exitCode === null && this.proc.signalCode === null;
  }

  wait(): Promise<ChildExit> {
    return this.finished;
  }

  async terminate(graceMs: number): Promise<TerminateOutcome> {
    if (!this.isAlive()) {
      return 'not_running';
    }

    this.proc.kill('SIGTERM');
    if (await this.exitsWithin(graceMs)) {
      return 'exited';
    }

    this.proc.kill('SIGKILL');
    await this.exitStatus;
    return 'killed';
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private exitsWithin(ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exitStatus.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  /** Wait for stdio EOF up to the drain timeout, then drop the pipes. */
  private async drain(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.drainTimeoutMs);
    });
    await Promise.race([this.closed, timedOut]);
    clearTimeout(timer);
    this.proc.stdout?.destroy();
    this.proc.stderr?.destroy();
  }

  private attachReader(stream: Readable | null, tag: OutputStream): void {
    if (!stream) return;
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on('line', (line) => {
      this.observer?.onChildOutput({
        childId: this.id,
        stream: tag,
        line: line.trimEnd(),
        timestamp: new Date(),
      });
    });
  }
}

// ── ProcessLauncher ──────────────────────────────────────────────────────

export class ProcessLauncher implements ChildLauncher {
  constructor(
    private readonly spec: ProcessChildSpec,
    private readonly observer?: ISupervisorObserver,
  ) {}

  describe(): { command: string; args: string[] } {
    return { command: this.spec.command, args: [...(this.spec.args ?? [])] };
  }

  async launch(): Promise<ChildHandle> {
    const proc = spawn(this.spec.command, this.spec.args ?? [], {
      ...this.spec.spawnOptions,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const handle = new ProcessChildHandle(
      this.spec.id,
      proc,
      this.spec.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS,
      this.observer,
    );
    await handle.spawned;
    return handle;
  }
}
