/**
 * ISupervisorObserver -- observability contract
 *
 * Structured events for every part of the supervisor: its own lifecycle,
 * the supervised child, restart decisions, health requests and errors.
 */

export type OutputStream = 'OUT' | 'ERR';

export interface SupervisorMeta {
  pid: number;
  command: string;
  args: string[];
  healthPort?: number;
  startedAt: Date;
}

export interface SupervisorStopStats {
  reason: 'terminated' | 'clean_exit';
  restartCount: number;
  totalSpawns: number;
  uptimeMs: number;
}

export interface HostStatsSnapshot {
  cpuPercent: number;
  memoryPercent: number;
  memoryAvailable: number;
  diskPercent: number;
  diskFree: number;
}

export type ChildEvent =
  | { type: 'spawned'; childId: string; pid: number | undefined; attempt: number; hostStats?: HostStatsSnapshot }
  | { type: 'spawn_failed'; childId: string; error: Error }
  | {
      type: 'exited';
      childId: string;
      pid: number | undefined;
      code: number | null;
      signal: string | null;
      uptimeMs: number;
      requested: boolean;
    }
  | { type: 'terminating'; childId: string; pid: number | undefined; reason: string }
  | { type: 'killed'; childId: string; pid: number | undefined; graceMs: number };

export interface ChildOutputEvent {
  childId: string;
  stream: OutputStream;
  line: string;
  timestamp: Date;
}

export type RestartEvent =
  | { type: 'scheduled'; childId: string; delayMs: number; restartCount: number; exitCode: number | null }
  | { type: 'cooldown'; childId: string; restartCount: number; maxRestarts: number; cooldownMs: number }
  | { type: 'cooldown_finished'; childId: string };

export interface HealthRequestEvent {
  method: string;
  path: string;
  statusCode: number;
  healthStatus?: string;
  duration: number;
  remoteAddress?: string;
}

export interface ISupervisorObserver {
  onSupervisorStart(meta: SupervisorMeta): void;
  onSupervisorStop(stats: SupervisorStopStats): void;
  onChildEvent(event: ChildEvent): void;
  onChildOutput(event: ChildOutputEvent): void;
  onRestartEvent(event: RestartEvent): void;
  onHealthRequest(event: HealthRequestEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
