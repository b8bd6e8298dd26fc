/**
 * Health report assembly.
 *
 * Pure: takes a supervisor snapshot plus the two probe results and decides
 * the overall status and HTTP status code. The bot is `healthy` only when
 * its identity check succeeds and the child process is running.
 */

import type { HostStatsSnapshot } from '@botkeeper/core';
import type { ChildStatus, SupervisorSnapshot } from '@botkeeper/supervisor';

// ── Probe results ────────────────────────────────────────────────────────

export type IdentityStatus = 'online' | 'offline' | 'error';

export interface IdentityProbeResult {
  status: IdentityStatus;
  botId?: number;
  botUsername?: string;
  error?: string;
}

export interface IdentityProbe {
  check(): Promise<IdentityProbeResult>;
}

export type SystemProbeResult =
  | { ok: true; stats: HostStatsSnapshot }
  | { ok: false; error: string };

export interface SystemProbe {
  sample(): Promise<SystemProbeResult>;
}

// ── Report ───────────────────────────────────────────────────────────────

export type HealthStatus = 'healthy' | 'degraded' | 'error';

export interface BotSection {
  status: IdentityStatus;
  bot_id?: number;
  bot_username?: string;
  error?: string;
}

export type SystemSection =
  | {
      cpu_percent: number;
      memory_percent: number;
      memory_available: number;
      disk_percent: number;
      disk_free: number;
    }
  | { error: string };

export interface ProcessSection {
  status: ChildStatus;
  pid?: number;
  restart_count: number;
  total_spawns: number;
  last_exit_code: number | null;
  cooling_down: boolean;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  bot: BotSection;
  system: SystemSection;
  process: ProcessSection;
}

export interface HealthReportInput {
  snapshot: SupervisorSnapshot;
  identity: IdentityProbeResult;
  system: SystemProbeResult;
  now?: Date;
}

export interface HealthReportResult {
  statusCode: 200 | 503;
  report: HealthReport;
}

/** Body returned when no report can be produced. */
export interface HealthErrorBody {
  status: 'error';
  timestamp: string;
  error: string;
}

export function buildHealthReport(input: HealthReportInput): HealthReportResult {
  const { snapshot, identity, system } = input;
  const healthy = identity.status === 'online' && snapshot.childStatus === 'running';

  const report: HealthReport = {
    status: healthy ? 'healthy' : 'degraded',
    timestamp: (input.now ?? new Date()).toISOString(),
    bot: botSection(identity),
    system: system.ok
      ? {
          cpu_percent: system.stats.cpuPercent,
          memory_percent: system.stats.memoryPercent,
          memory_available: system.stats.memoryAvailable,
          disk_percent: system.stats.diskPercent,
          disk_free: system.stats.diskFree,
        }
      : { error: system.error },
    process: {
      status: snapshot.childStatus,
      pid: snapshot.pid,
      restart_count: snapshot.restartCount,
      total_spawns: snapshot.totalSpawns,
      last_exit_code: snapshot.lastExitCode,
      cooling_down: snapshot.coolingDown,
    },
  };

  return { statusCode: healthy ? 200 : 503, report };
}

export function errorBody(message: string, now: Date = new Date()): HealthErrorBody {
  return { status: 'error', timestamp: now.toISOString(), error: message };
}

function botSection(identity: IdentityProbeResult): BotSection {
  const section: BotSection = { status: identity.status };
  if (identity.botId !== undefined) section.bot_id = identity.botId;
  if (identity.botUsername !== undefined) section.bot_username = identity.botUsername;
  if (identity.error !== undefined) section.error = identity.error;
  return section;
}
