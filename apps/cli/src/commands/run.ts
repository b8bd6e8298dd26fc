/**
 * Run command -- supervise the bot and serve the health endpoint.
 *
 * Wires the pieces together: observers from config, the process launcher,
 * the restart controller and the health server, all sharing one
 * SupervisorState. SIGINT and SIGTERM set the termination flag; the child
 * is then stopped gracefully, the server closed and the logs flushed.
 */

import {
  HealthServerError,
  toError,
  type BotkeeperConfig,
  type ISupervisorObserver,
} from '@botkeeper/core';
import { createObserver } from '@botkeeper/observability';
import { BotSupervisor, ProcessLauncher, SupervisorState, type SupervisorRunResult } from '@botkeeper/supervisor';
import { HealthServer, HostSystemProbe, TelegramIdentityProbe } from '@botkeeper/gateway';
import { buildChildEnv } from '../config.js';
import { RESET, RED, DIM, loadConfigOrReport, type CliOptions } from './shared.js';

export interface BotkeeperRuntime {
  observer: ISupervisorObserver;
  supervisor: BotSupervisor;
  server: HealthServer;
}

/** Build the runtime for a loaded config without starting anything. */
export function createRuntime(
  config: BotkeeperConfig,
  observer: ISupervisorObserver = createObserver(config.observability),
  env: NodeJS.ProcessEnv = process.env,
): BotkeeperRuntime {
  const state = new SupervisorState({ childId: config.child.id, windowMs: config.restart.windowMs });
  const systemProbe = new HostSystemProbe({ diskPath: config.health.diskPath, observer });
  const identityProbe = new TelegramIdentityProbe({
    token: config.telegram.token,
    apiRoot: config.telegram.apiRoot,
    timeoutMs: config.telegram.probeTimeoutMs,
    observer,
  });

  const launcher = new ProcessLauncher(
    {
      id: config.child.id,
      command: config.child.command,
      args: config.child.args,
      spawnOptions: { cwd: config.child.cwd, env: buildChildEnv(config, env) },
    },
    observer,
  );

  const supervisor = new BotSupervisor({
    launcher,
    policy: config.restart,
    observer,
    state,
    healthPort: config.health.port,
    sampleHostStats: () => systemProbe.snapshot(),
  });

  const server = new HealthServer({
    port: config.health.port,
    host: config.health.host,
    state,
    identityProbe,
    systemProbe,
    observer,
  });

  return { observer, supervisor, server };
}

/**
 * Start the health server, run the restart loop until it ends, then shut
 * everything down. Signal handlers are installed only for the duration.
 * A port that cannot be bound rejects with HealthServerError before any
 * child is spawned.
 */
export async function runRuntime(runtime: BotkeeperRuntime): Promise<SupervisorRunResult> {
  const { observer, supervisor, server } = runtime;

  await server.start();

  const onSignal = (signal: NodeJS.Signals) => {
    supervisor.stop(signal).catch((err: unknown) => {
      observer.onError(toError(err), { action: 'shutdown', signal });
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await supervisor.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await server.stop();
    await observer.flush?.();
  }
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

/** Follow-up advice for a failure that ended the run, if there is any. */
export function failureHint(error: Error): string | undefined {
  if (error instanceof HealthServerError) {
    return `Check that port ${error.port} is free.`;
  }
  return undefined;
}

export async function run(options: CliOptions): Promise<void> {
  const config = loadConfigOrReport(options);
  if (!config) return;

  const runtime = createRuntime(config);
  try {
    await runRuntime(runtime);
  } catch (err) {
    const error = toError(err);
    runtime.observer.onError(error, { action: 'run' });
    console.error(`\n  ${RED}botkeeper stopped:${RESET} ${error.message}`);
    const hint = failureHint(error);
    if (hint) console.error(`  ${DIM}${hint}${RESET}`);
    console.error('');
    process.exitCode = 1;
  }
}
