import { vi } from 'vitest';
import { SupervisorError, type ISupervisorObserver } from '@botkeeper/core';
import { BotSupervisor } from './supervisor.js';
import type { RestartPolicy } from './strategies.js';
import type { ChildExit, ChildHandle, ChildLauncher, TerminateOutcome } from './process-supervisor.js';

// ── Fakes ────────────────────────────────────────────────────────────────

/** What a scripted child does once launched. */
type Step = { exitCode: number } | 'hang' | 'fail';

class FakeChild implements ChildHandle {
  readonly id = 'bot';
  readonly startedAt = Date.now();
  readonly terminate = vi.fn(async (_graceMs: number): Promise<TerminateOutcome> => {
    this.exit(null, 'SIGTERM');
    return 'exited';
  });

  private alive = true;
  private settle: (exit: ChildExit) => void = () => {};
  private readonly exited = new Promise<ChildExit>((resolve) => {
    this.settle = resolve;
  });

  constructor(readonly pid: number) {}

  isAlive(): boolean {
    return this.alive;
  }

  wait(): Promise<ChildExit> {
    return this.exited;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.alive) return;
    this.alive = false;
    this.settle({ code, signal, uptimeMs: Date.now() - this.startedAt });
  }
}

class ScriptedLauncher implements ChildLauncher {
  readonly children: FakeChild[] = [];
  launches = 0;
  maxLive = 0;
  onLaunch?: () => void;

  constructor(private readonly steps: Step[]) {}

  describe(): { command: string; args: string[] } {
    return { command: 'node', args: ['bot.js'] };
  }

  async launch(): Promise<ChildHandle> {
    this.onLaunch?.();
    const step = this.steps[this.launches] ?? 'hang';
    this.launches += 1;

    if (step === 'fail') {
      throw Object.assign(new Error('spawn node ENOENT'), { code: 'ENOENT' });
    }

    const child = new FakeChild(1000 + this.launches);
    this.children.push(child);
    const live = this.children.filter((c) => c.isAlive()).length;
    this.maxLive = Math.max(this.maxLive, live);

    if (step !== 'hang') {
      setTimeout(() => child.exit(step.exitCode), 1);
    }
    return child;
  }
}

function makeObserver(): ISupervisorObserver {
  return {
    onSupervisorStart: vi.fn(),
    onSupervisorStop: vi.fn(),
    onChildEvent: vi.fn(),
    onChildOutput: vi.fn(),
    onRestartEvent: vi.fn(),
    onHealthRequest: vi.fn(),
    onError: vi.fn(),
  };
}

const FAST_POLICY: Partial<RestartPolicy> = {
  baseDelayMs: 1,
  maxDelayMs: 20,
  maxRestarts: 10,
  cooldownMs: 50,
  spawnRetryDelayMs: 1,
  shutdownGraceMs: 50,
};

function makeSupervisor(steps: Step[], policy: Partial<RestartPolicy> = {}) {
  const launcher = new ScriptedLauncher(steps);
  const observer = makeObserver();
  const supervisor = new BotSupervisor({
    launcher,
    observer,
    policy: { ...FAST_POLICY, ...policy },
  });
  return { launcher, observer, supervisor };
}

// ── Tests ────────────────────────────────────────────────────────────────

describe('BotSupervisor', () => {
  describe('exit handling', () => {
    it('stops after a clean exit without recording a restart', async () => {
      const { launcher, supervisor } = makeSupervisor([{ exitCode: 0 }]);

      const result = await supervisor.run();

      expect(result).toEqual({ reason: 'clean_exit', restartCount: 0, totalSpawns: 1 });
      expect(launcher.launches).toBe(1);
      expect(supervisor.state.ledger.entries()).toHaveLength(0);
    });

    it('records exactly one restart for a crash and retries once', async () => {
      const { launcher, supervisor } = makeSupervisor([{ exitCode: 1 }, { exitCode: 0 }]);
      const scheduled = vi.fn();
      supervisor.on('restart:scheduled', scheduled);

      const result = await supervisor.run();

      expect(result).toEqual({ reason: 'clean_exit', restartCount: 1, totalSpawns: 2 });
      expect(launcher.launches).toBe(2);
      expect(scheduled).toHaveBeenCalledTimes(1);
      expect(scheduled).toHaveBeenCalledWith(1, 1);
    });

    it('treats a signal exit as a crash', async () => {
      const { launcher, supervisor } = makeSupervisor(['hang', { exitCode: 0 }]);
      supervisor.once('child:started', (handle) => {
        if (handle instanceof FakeChild) handle.exit(null, 'SIGSEGV');
      });

      const result = await supervisor.run();

      expect(result.restartCount).toBe(1);
      expect(launcher.launches).toBe(2);
    });

    it('reports the exit to the observer', async () => {
      const { observer, supervisor } = makeSupervisor([{ exitCode: 3 }, { exitCode: 0 }]);

      await supervisor.run();

      expect(observer.onChildEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'exited', code: 3, signal: null, requested: false }),
      );
      expect(observer.onRestartEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'scheduled', delayMs: 1, restartCount: 1, exitCode: 3 }),
      );
    });
  });

  describe('backoff', () => {
    it('follows the tier table as restarts accumulate', async () => {
      const { supervisor } = makeSupervisor([
        { exitCode: 1 },
        { exitCode: 1 },
        { exitCode: 1 },
        { exitCode: 1 },
        { exitCode: 1 },
        { exitCode: 1 },
        { exitCode: 0 },
      ]);
      const delays: number[] = [];
      supervisor.on('restart:scheduled', (delayMs) => delays.push(delayMs));

      await supervisor.run();

      expect(delays).toEqual([1, 1, 1, 2, 2, 4]);
    });

    it('returns the delay from computeBackoff and appends to the ledger', () => {
      const { supervisor } = makeSupervisor([], { baseDelayMs: 10_000, maxDelayMs: 300_000 });
      expect(supervisor.computeBackoff()).toBe(10_000);
      expect(supervisor.state.ledger.entries()).toHaveLength(1);
    });
  });

  describe('single live child', () => {
    it('never has two children running at once', async () => {
      const { launcher, supervisor } = makeSupervisor([
        { exitCode: 1 },
        { exitCode: 2 },
        'fail',
        { exitCode: 1 },
        { exitCode: 0 },
      ]);

      await supervisor.run();

      expect(launcher.launches).toBe(5);
      expect(launcher.maxLive).toBe(1);
    });

    it('rejects a second concurrent run', async () => {
      const { supervisor } = makeSupervisor(['hang']);
      const started = new Promise<void>((resolve) => supervisor.once('child:started', () => resolve()));

      const running = supervisor.run();
      await started;

      await expect(supervisor.run()).rejects.toThrow(SupervisorError);
      await supervisor.stop();
      await running;
    });
  });

  describe('spawn failure', () => {
    it('logs the failure and retries without using a ledger slot', async () => {
      const { launcher, observer, supervisor } = makeSupervisor(['fail', { exitCode: 0 }]);
      const failed = vi.fn();
      supervisor.on('child:spawn_failed', failed);

      const result = await supervisor.run();

      expect(failed).toHaveBeenCalledTimes(1);
      expect(observer.onChildEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'spawn_failed', childId: 'bot' }),
      );
      expect(launcher.launches).toBe(2);
      expect(result.restartCount).toBe(0);
      expect(result.totalSpawns).toBe(1);
    });

    it('spawnChild returns null when the launcher throws', async () => {
      const { supervisor } = makeSupervisor(['fail']);
      await expect(supervisor.spawnChild()).resolves.toBeNull();
    });
  });

  describe('daily cap', () => {
    it('cools down at the cap, then starts with an empty ledger', async () => {
      const { launcher, supervisor } = makeSupervisor(
        [{ exitCode: 1 }, { exitCode: 1 }, { exitCode: 0 }],
        { maxRestarts: 2, cooldownMs: 80 },
      );
      let cooldownAt = 0;
      let thirdLaunchAt = 0;
      let countAtThirdLaunch = -1;
      supervisor.on('restart:cooldown', () => {
        cooldownAt = Date.now();
      });
      launcher.onLaunch = () => {
        if (launcher.launches === 2) {
          thirdLaunchAt = Date.now();
          countAtThirdLaunch = supervisor.state.ledger.entries().length;
        }
      };

      const result = await supervisor.run();

      expect(cooldownAt).toBeGreaterThan(0);
      expect(thirdLaunchAt - cooldownAt).toBeGreaterThanOrEqual(70);
      expect(countAtThirdLaunch).toBe(0);
      expect(result.restartCount).toBe(0);
      expect(launcher.launches).toBe(3);
    });

    it('reports cooling down in the snapshot while waiting', async () => {
      const { supervisor } = makeSupervisor([], { maxRestarts: 1, cooldownMs: 60_000 });
      supervisor.state.ledger.record(Date.now());

      const pending = supervisor.enforceDailyCap();
      expect(supervisor.state.snapshot().coolingDown).toBe(true);

      supervisor.state.requestTermination('test');
      await expect(pending).resolves.toBe(false);
      expect(supervisor.state.snapshot().coolingDown).toBe(false);
      expect(supervisor.state.ledger.entries()).toHaveLength(1);
    });
  });

  describe('termination', () => {
    it('exits a long backoff sleep within one polling interval', async () => {
      const { launcher, supervisor } = makeSupervisor([{ exitCode: 1 }], {
        baseDelayMs: 60_000,
        maxDelayMs: 60_000,
      });
      let stopRequestedAt = 0;
      supervisor.on('restart:scheduled', () => {
        stopRequestedAt = Date.now();
        void supervisor.stop('SIGTERM');
      });

      const result = await supervisor.run();

      expect(result.reason).toBe('terminated');
      expect(Date.now() - stopRequestedAt).toBeLessThan(1_000);
      expect(launcher.launches).toBe(1);
    });

    it('terminates the live child with the grace period on stop', async () => {
      const { launcher, observer, supervisor } = makeSupervisor(['hang'], { shutdownGraceMs: 1_234 });
      const started = new Promise<void>((resolve) => supervisor.once('child:started', () => resolve()));

      const running = supervisor.run();
      await started;
      await supervisor.stop('SIGINT');
      const result = await running;

      const [child] = launcher.children;
      expect(child?.terminate).toHaveBeenCalledWith(1_234);
      expect(result).toEqual({ reason: 'terminated', restartCount: 0, totalSpawns: 1 });
      expect(supervisor.state.snapshot().childStatus).toBe('stopped');
      expect(observer.onChildEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'exited', requested: true }),
      );
    });

    it('does not spawn at all when stopped before run', async () => {
      const { launcher, supervisor } = makeSupervisor([{ exitCode: 0 }]);
      supervisor.state.requestTermination('early');

      const result = await supervisor.run();

      expect(result.reason).toBe('terminated');
      expect(launcher.launches).toBe(0);
    });

    it('reports a force kill to the observer', async () => {
      const { launcher, observer, supervisor } = makeSupervisor(['hang']);
      const started = new Promise<void>((resolve) => supervisor.once('child:started', () => resolve()));

      const running = supervisor.run();
      await started;
      const child = launcher.children[0];
      if (!child) throw new Error('child was not launched');
      child.terminate.mockImplementationOnce(async () => {
        child.exit(null, 'SIGKILL');
        return 'killed';
      });
      await supervisor.stop();
      await running;

      expect(observer.onChildEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'killed', graceMs: 50 }),
      );
    });
  });

  describe('events and host stats', () => {
    it('emits start and stop events with the result', async () => {
      const { observer, supervisor } = makeSupervisor([{ exitCode: 0 }]);
      const started = vi.fn();
      const stopped = vi.fn();
      supervisor.on('supervisor:started', started);
      supervisor.on('supervisor:stopped', stopped);

      await supervisor.run();

      expect(started).toHaveBeenCalledTimes(1);
      expect(stopped).toHaveBeenCalledWith({ reason: 'clean_exit', restartCount: 0, totalSpawns: 1 });
      expect(observer.onSupervisorStart).toHaveBeenCalledWith(
        expect.objectContaining({ command: 'node', args: ['bot.js'] }),
      );
      expect(observer.onSupervisorStop).toHaveBeenCalledWith(
        expect.objectContaining({ reason: 'clean_exit', totalSpawns: 1 }),
      );
    });

    it('samples host stats before each spawn', async () => {
      const launcher = new ScriptedLauncher([{ exitCode: 0 }]);
      const observer = makeObserver();
      const hostStats = {
        cpuPercent: 12.5,
        memoryPercent: 40,
        memoryAvailable: 1024,
        diskPercent: 70,
        diskFree: 2048,
      };
      const sampleHostStats = vi.fn(async () => hostStats);
      const supervisor = new BotSupervisor({ launcher, observer, policy: FAST_POLICY, sampleHostStats });

      await supervisor.run();

      expect(sampleHostStats).toHaveBeenCalledTimes(1);
      expect(observer.onChildEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'spawned', attempt: 1, hostStats }),
      );
    });

    it('still spawns when host stats sampling throws', async () => {
      const launcher = new ScriptedLauncher([{ exitCode: 0 }]);
      const observer = makeObserver();
      const supervisor = new BotSupervisor({
        launcher,
        observer,
        policy: FAST_POLICY,
        sampleHostStats: async () => {
          throw new Error('no /proc');
        },
      });

      const result = await supervisor.run();

      expect(result.totalSpawns).toBe(1);
      expect(observer.onError).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'no /proc' }),
        { childId: 'bot', action: 'host_stats' },
      );
    });
  });
});
