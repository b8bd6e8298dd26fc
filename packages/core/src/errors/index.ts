/**
 * Error hierarchy shared by every botkeeper package.
 *
 * Each subclass carries a stable `code` so callers and log sinks can
 * classify failures without string-matching messages.
 */

export class BotkeeperError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BotkeeperError';
    this.code = code;
    this.context = context;
  }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends BotkeeperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Misuse of the restart controller or a failure inside it. */
export class SupervisorError extends BotkeeperError {
  readonly childId: string;

  constructor(message: string, childId: string, context?: Record<string, unknown>) {
    super(message, 'SUPERVISOR_ERROR', { ...context, childId });
    this.name = 'SupervisorError';
    this.childId = childId;
  }
}

/** A health probe (identity or host stats) could not produce a sample. */
export class ProbeError extends BotkeeperError {
  readonly probe: string;

  constructor(message: string, probe: string, context?: Record<string, unknown>) {
    super(message, 'PROBE_ERROR', { ...context, probe });
    this.name = 'ProbeError';
    this.probe = probe;
  }
}

/** The health endpoint could not bind its port. Fatal at startup. */
export class HealthServerError extends BotkeeperError {
  readonly port: number;

  constructor(message: string, port: number, context?: Record<string, unknown>) {
    super(message, 'HEALTH_SERVER_ERROR', { ...context, port });
    this.name = 'HealthServerError';
    this.port = port;
  }
}

/** Normalise an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
