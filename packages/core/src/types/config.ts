/**
 * Configuration schema for botkeeper.
 *
 * Loaded once at startup by the CLI (defaults, optional JSON file,
 * environment overrides) and handed to each package as plain data.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface BackoffTier {
  /** Highest restart count (inclusive) this tier applies to. */
  upTo: number;
  /** Multiplier applied to the base delay. */
  multiplier: number;
}

export interface TelegramConfig {
  token: string;
  apiRoot: string;
  probeTimeoutMs: number;
  adminId?: number;
}

export interface ChildConfig {
  id: string;
  command: string;
  args: string[];
  cwd?: string;
  databaseUrl?: string;
}

export interface RestartConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  tiers: BackoffTier[];
  maxRestarts: number;
  windowMs: number;
  cooldownMs: number;
  spawnRetryDelayMs: number;
  shutdownGraceMs: number;
}

export interface HealthConfig {
  port: number;
  host: string;
  diskPath: string;
}

export interface ObservabilityConfig {
  observers: string[];
  logLevel: LogLevel;
  logPath?: string;
  maxLogSize?: number;
}

export interface BotkeeperConfig {
  telegram: TelegramConfig;
  child: ChildConfig;
  restart: RestartConfig;
  health: HealthConfig;
  observability: ObservabilityConfig;
}
