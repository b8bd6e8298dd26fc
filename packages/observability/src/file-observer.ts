/**
 * FileObserver -- appends every event as one JSON line to a log file.
 *
 * Writes are synchronous so that lines coming from the stdout and stderr
 * readers of a child are never torn or reordered within a stream. When the
 * file grows past `maxBytes` it is rotated to `<file>.1` (one generation).
 *
 * A failed write never reaches the caller: it is reported on stderr once,
 * and again only after a later write has succeeded.
 */

import { appendFileSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
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

export interface FileObserverOptions {
  /** Path of the JSONL file. Default `logs/supervisor.jsonl` under cwd. */
  filePath?: string;
  /** Rotate once the file exceeds this many bytes. Default 10 MiB. */
  maxBytes?: number;
}

interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

const DEFAULT_FILE = 'logs/supervisor.jsonl';
const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

function serializeError(error: Error): Record<string, unknown> {
  const out: Record<string, unknown> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') out['code'] = error.code;
  return out;
}

export class FileObserver implements ISupervisorObserver {
  readonly filePath: string;
  private readonly maxBytes: number;
  private size: number;
  private failing = false;

  constructor(options: FileObserverOptions = {}) {
    this.filePath = resolve(options.filePath ?? DEFAULT_FILE);
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.size = this.currentSize();
  }

  // ---- helpers ------------------------------------------------------------

  private currentSize(): number {
    try {
      return statSync(this.filePath).size;
    } catch {
      // File does not exist yet.
      return 0;
    }
  }

  private write(level: LogLevel, event: string, data: Record<string, unknown>): void {
    const entry: LogEntry = { ts: new Date().toISOString(), level, event, ...data };
    const line = JSON.stringify(entry) + '\n';
    const bytes = Buffer.byteLength(line);

    try {
      if (this.size > 0 && this.size + bytes > this.maxBytes) {
        renameSync(this.filePath, `${this.filePath}.1`);
        this.size = 0;
      }

      appendFileSync(this.filePath, line, 'utf-8');
      this.size += bytes;
      this.failing = false;
    } catch (err) {
      if (!this.failing) {
        console.error(`[FileObserver] cannot write ${this.filePath}:`, err);
      }
      this.failing = true;
    }
  }

  // ---- ISupervisorObserver ------------------------------------------------

  onSupervisorStart(meta: SupervisorMeta): void {
    this.write('info', 'supervisor_start', {
      pid: meta.pid,
      command: meta.command,
      args: meta.args,
      healthPort: meta.healthPort,
      startedAt: meta.startedAt.toISOString(),
    });
  }

  onSupervisorStop(stats: SupervisorStopStats): void {
    this.write('info', 'supervisor_stop', { ...stats });
  }

  onChildEvent(event: ChildEvent): void {
    switch (event.type) {
      case 'spawn_failed':
        this.write('error', 'child_spawn_failed', {
          childId: event.childId,
          error: serializeError(event.error),
        });
        return;
      case 'exited': {
        const clean = event.requested || (event.code === 0 && event.signal === null);
        this.write(clean ? 'info' : 'warn', 'child_exited', { ...event });
        return;
      }
      case 'killed':
        this.write('warn', 'child_killed', { ...event });
        return;
      default:
        this.write('info', `child_${event.type}`, { ...event });
    }
  }

  onChildOutput(event: ChildOutputEvent): void {
    this.write(event.stream === 'ERR' ? 'warn' : 'info', 'child_output', {
      childId: event.childId,
      stream: event.stream,
      line: event.line,
    });
  }

  onRestartEvent(event: RestartEvent): void {
    this.write(event.type === 'cooldown' ? 'error' : 'info', `restart_${event.type}`, { ...event });
  }

  onHealthRequest(event: HealthRequestEvent): void {
    this.write('debug', 'health_request', { ...event });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', 'error', { error: serializeError(error), context });
  }

  async flush(): Promise<void> {
    // appendFileSync leaves nothing buffered.
  }
}
