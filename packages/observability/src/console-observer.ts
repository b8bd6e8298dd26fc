/**
 * ConsoleObserver -- structured console logging with ANSI color coding.
 *
 * Formats supervisor events as human-readable console output, respecting
 * the configured log level. Child output is echoed with its stream tag so
 * stdout and stderr lines stay distinguishable once interleaved.
 */

import type {
  ISupervisorObserver,
  LogLevel,
  SupervisorMeta,
  SupervisorStopStats,
  ChildEvent,
  ChildOutputEvent,
  RestartEvent,
  HealthRequestEvent,
} from '@botkeeper/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements ISupervisorObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  // ---- ISupervisorObserver ------------------------------------------------

  onSupervisorStart(meta: SupervisorMeta): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SUPERVISOR', FG.cyan)} ${FG.green}started${RESET}` +
        ` ${DIM}pid=${RESET}${meta.pid}` +
        ` ${DIM}command=${RESET}${[meta.command, ...meta.args].join(' ')}` +
        (meta.healthPort !== undefined ? ` ${DIM}port=${RESET}${meta.healthPort}` : ''),
    );
  }

  onSupervisorStop(stats: SupervisorStopStats): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SUPERVISOR', FG.cyan)} ${FG.yellow}stopped${RESET}` +
        ` ${DIM}reason=${RESET}${stats.reason}` +
        ` ${DIM}uptime=${RESET}${this.formatDuration(stats.uptimeMs)}` +
        ` ${DIM}spawns=${RESET}${stats.totalSpawns}` +
        ` ${DIM}restarts_24h=${RESET}${stats.restartCount}`,
    );
  }

  onChildEvent(event: ChildEvent): void {
    const ts = this.timestamp();
    const tag = this.tag('CHILD', FG.magenta);

    switch (event.type) {
      case 'spawned': {
        if (!this.shouldLog('info')) return;
        const stats = event.hostStats
          ? ` ${DIM}cpu=${RESET}${event.hostStats.cpuPercent}%` +
            ` ${DIM}mem=${RESET}${event.hostStats.memoryPercent}%` +
            ` ${DIM}disk=${RESET}${event.hostStats.diskPercent}%`
          : '';
        console.log(
          `${DIM}${ts}${RESET} ${tag} ${FG.green}spawned${RESET} ${BOLD}${event.childId}${RESET}` +
            ` ${DIM}pid=${RESET}${event.pid ?? '?'}` +
            ` ${DIM}attempt=${RESET}${event.attempt}` +
            stats,
        );
        return;
      }
      case 'spawn_failed':
        if (!this.shouldLog('error')) return;
        console.error(
          `${DIM}${ts}${RESET} ${tag} ${FG.red}spawn failed${RESET} ${BOLD}${event.childId}${RESET}` +
            ` ${DIM}error=${RESET}${event.error.message}`,
        );
        return;
      case 'exited': {
        const clean = event.requested || (event.code === 0 && event.signal === null);
        if (!this.shouldLog(clean ? 'info' : 'warn')) return;
        const line =
          `${DIM}${ts}${RESET} ${tag} ${clean ? FG.yellow : FG.red}exited${RESET} ${BOLD}${event.childId}${RESET}` +
          ` ${DIM}pid=${RESET}${event.pid ?? '?'}` +
          ` ${DIM}code=${RESET}${event.code ?? 'null'}` +
          (event.signal ? ` ${DIM}signal=${RESET}${event.signal}` : '') +
          ` ${DIM}uptime=${RESET}${this.formatDuration(event.uptimeMs)}` +
          (event.requested ? ` ${DIM}(requested)${RESET}` : '');
        if (clean) console.log(line);
        else console.warn(line);
        return;
      }
      case 'terminating':
        if (!this.shouldLog('info')) return;
        console.log(
          `${DIM}${ts}${RESET} ${tag} ${FG.yellow}terminating${RESET} ${BOLD}${event.childId}${RESET}` +
            ` ${DIM}pid=${RESET}${event.pid ?? '?'}` +
            ` ${DIM}reason=${RESET}${event.reason}`,
        );
        return;
      case 'killed':
        if (!this.shouldLog('warn')) return;
        console.warn(
          `${DIM}${ts}${RESET} ${tag} ${FG.red}force-killed${RESET} ${BOLD}${event.childId}${RESET}` +
            ` ${DIM}pid=${RESET}${event.pid ?? '?'}` +
            ` ${DIM}grace=${RESET}${this.formatDuration(event.graceMs)}`,
        );
        return;
    }
  }

  onChildOutput(event: ChildOutputEvent): void {
    if (event.stream === 'ERR') {
      if (!this.shouldLog('warn')) return;
      console.warn(
        `${DIM}${event.timestamp.toISOString()}${RESET} ${this.tag('ERR', FG.red)} ${event.line}`,
      );
    } else {
      if (!this.shouldLog('info')) return;
      console.log(
        `${DIM}${event.timestamp.toISOString()}${RESET} ${this.tag('OUT', FG.gray)} ${event.line}`,
      );
    }
  }

  onRestartEvent(event: RestartEvent): void {
    const ts = this.timestamp();
    const tag = this.tag('RESTART', FG.blue);

    switch (event.type) {
      case 'scheduled':
        if (!this.shouldLog('info')) return;
        console.log(
          `${DIM}${ts}${RESET} ${tag} ${BOLD}${event.childId}${RESET}` +
            ` ${DIM}delay=${RESET}${this.formatDuration(event.delayMs)}` +
            ` ${DIM}restarts_24h=${RESET}${event.restartCount}` +
            ` ${DIM}exit_code=${RESET}${event.exitCode ?? 'null'}`,
        );
        return;
      case 'cooldown':
        if (!this.shouldLog('error')) return;
        console.error(
          `${DIM}${ts}${RESET} ${tag} ${BOLD}${FG.red}CRITICAL${RESET}` +
            ` ${BOLD}${event.childId}${RESET} reached ${event.restartCount}/${event.maxRestarts} restarts` +
            ` ${DIM}cooldown=${RESET}${this.formatDuration(event.cooldownMs)}`,
        );
        return;
      case 'cooldown_finished':
        if (!this.shouldLog('info')) return;
        console.log(
          `${DIM}${ts}${RESET} ${tag} ${FG.green}cooldown finished${RESET} ${BOLD}${event.childId}${RESET}`,
        );
        return;
    }
  }

  onHealthRequest(event: HealthRequestEvent): void {
    if (!this.shouldLog('debug')) return;
    const statusColor = event.statusCode < 400 ? FG.green : FG.yellow;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('HTTP', FG.cyan)} ${event.method} ${event.path}` +
        ` ${statusColor}${event.statusCode}${RESET}` +
        (event.healthStatus ? ` ${DIM}health=${RESET}${event.healthStatus}` : '') +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.duration)}` +
        (event.remoteAddress ? ` ${DIM}from=${RESET}${event.remoteAddress}` : ''),
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}context=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}` +
        ` ${error.message}` +
        ctx,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
