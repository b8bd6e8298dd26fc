/**
 * Configuration loading for the botkeeper CLI.
 *
 * Order of precedence, lowest first:
 *   1. built-in defaults (getDefaultConfig)
 *   2. botkeeper.config.json in the working directory, or --config <path>
 *   3. environment variables (BOT_TOKEN, PORT, ADMIN_ID, DATABASE_URL,
 *      LOG_LEVEL, BOT_COMMAND), with `.env` loaded first via dotenv
 *
 * String values in the JSON file may reference environment variables as
 * `${VAR}`; unset variables resolve to an empty string. Nested objects are
 * merged field by field, arrays are replaced.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { ConfigError } from '@botkeeper/core';
import type {
  BackoffTier,
  BotkeeperConfig,
  ChildConfig,
  HealthConfig,
  LogLevel,
  ObservabilityConfig,
  RestartConfig,
  TelegramConfig,
} from '@botkeeper/core';
import { DEFAULT_RESTART_POLICY, MAX_TIMER_MS, validateRestartPolicy } from '@botkeeper/supervisor';
import { DEFAULT_API_ROOT, DEFAULT_PROBE_TIMEOUT_MS } from '@botkeeper/gateway';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raised when the config file or environment cannot produce a valid config. */
export class ConfigLoadError extends ConfigError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, field ? { field } : undefined);
    this.name = 'ConfigLoadError';
    this.field = field;
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const CONFIG_FILENAME = 'botkeeper.config.json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function getDefaultConfig(): BotkeeperConfig {
  return {
    telegram: {
      token: '',
      apiRoot: DEFAULT_API_ROOT,
      probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
    },
    child: {
      id: 'bot',
      command: 'node',
      args: ['bot.js'],
    },
    restart: {
      ...DEFAULT_RESTART_POLICY,
      tiers: DEFAULT_RESTART_POLICY.tiers.map((tier) => ({ ...tier })),
    },
    health: {
      port: 8080,
      host: '0.0.0.0',
      diskPath: '/',
    },
    observability: {
      observers: ['console', 'file'],
      logLevel: 'info',
      logPath: 'logs/supervisor.jsonl',
      maxLogSize: 10 * 1024 * 1024,
    },
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit config file (--config). Must exist. */
  configPath?: string;
  /** Directory searched for `.env` and botkeeper.config.json. Default cwd. */
  cwd?: string;
  /** Environment to read and to load `.env` into. Default process.env. */
  env?: NodeJS.ProcessEnv;
  /** Load `.env` from `cwd`. Default true. */
  dotenv?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}): BotkeeperConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.dotenv !== false) {
    loadEnvFile(join(cwd, '.env'), env);
  }

  const file = readConfigFile(options.configPath, cwd);
  const config = mergeConfig(getDefaultConfig(), resolveEnvVars(file, env));
  applyEnvOverrides(config, env);
  validateConfig(config);
  return config;
}

/**
 * Environment handed to the bot process: the supervisor's own environment
 * plus the settings the bot reads but the supervisor only passes along.
 */
export function buildChildEnv(config: BotkeeperConfig, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base, BOT_TOKEN: config.telegram.token };
  if (config.telegram.adminId !== undefined) env['ADMIN_ID'] = String(config.telegram.adminId);
  if (config.child.databaseUrl !== undefined) env['DATABASE_URL'] = config.child.databaseUrl;
  return env;
}

// ---------------------------------------------------------------------------
// File handling
// ---------------------------------------------------------------------------

/** Copy variables from a `.env` file into `env`. Existing values win. */
function loadEnvFile(path: string, env: NodeJS.ProcessEnv): void {
  if (!existsSync(path)) return;
  const parsed = parseDotenv(readFileSync(path));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) env[key] = value;
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string | undefined, cwd: string): JsonObject {
  const path = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILENAME);

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigLoadError(`Config file not found: ${path}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`Failed to parse ${path}: ${reason}`);
  }

  if (!isObject(parsed)) {
    throw new ConfigLoadError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/** Replace `${VAR}` references in every string value. */
function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = resolveEnvVars(item, env);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Typed readers over one section of the parsed file. Each returns the
 * default when the key is absent and rejects a value of the wrong type.
 */
class SectionReader {
  private readonly data: JsonObject;

  constructor(
    root: JsonObject,
    private readonly name: string,
  ) {
    const section = root[name];
    if (section === undefined) {
      this.data = {};
    } else if (isObject(section)) {
      this.data = section;
    } else {
      throw new ConfigLoadError(`Invalid config: ${name} must be an object`, name);
    }
  }

  number(key: string, fallback: number): number {
    const value = this.data[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw this.typeError(key, 'a number');
    }
    return value;
  }

  optionalNumber(key: string, fallback: number | undefined): number | undefined {
    return this.data[key] === undefined ? fallback : this.number(key, 0);
  }

  string(key: string, fallback: string): string {
    const value = this.data[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') throw this.typeError(key, 'a string');
    return value;
  }

  optionalString(key: string, fallback: string | undefined): string | undefined {
    return this.data[key] === undefined ? fallback : this.string(key, '');
  }

  strings(key: string, fallback: string[]): string[] {
    const value = this.data[key];
    if (value === undefined) return [...fallback];
    if (!Array.isArray(value)) throw this.typeError(key, 'an array of strings');
    return value.map((item: unknown) => {
      if (typeof item !== 'string') throw this.typeError(key, 'an array of strings');
      return item;
    });
  }

  tiers(key: string, fallback: BackoffTier[]): BackoffTier[] {
    const value = this.data[key];
    if (value === undefined) return fallback.map((tier) => ({ ...tier }));
    if (!Array.isArray(value)) throw this.typeError(key, 'an array of tiers');
    return value.map((item: unknown, i) => {
      const upTo = isObject(item) ? item['upTo'] : undefined;
      const multiplier = isObject(item) ? item['multiplier'] : undefined;
      if (typeof upTo !== 'number' || typeof multiplier !== 'number') {
        throw new ConfigLoadError(
          `Invalid config: ${this.name}.${key}[${i}] must be { upTo: number, multiplier: number }`,
          `${this.name}.${key}[${i}]`,
        );
      }
      return { upTo, multiplier };
    });
  }

  logLevel(key: string, fallback: LogLevel): LogLevel {
    const value = this.string(key, fallback);
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
      throw new ConfigLoadError(
        `Invalid config: ${this.name}.${key} must be one of ${LOG_LEVELS.join(', ')}`,
        `${this.name}.${key}`,
      );
    }
    return level;
  }

  private typeError(key: string, expected: string): ConfigLoadError {
    const field = `${this.name}.${key}`;
    return new ConfigLoadError(`Invalid config: ${field} must be ${expected}`, field);
  }
}

function mergeConfig(defaults: BotkeeperConfig, resolved: unknown): BotkeeperConfig {
  const file = isObject(resolved) ? resolved : {};

  const t = new SectionReader(file, 'telegram');
  const telegram: TelegramConfig = {
    token: t.string('token', defaults.telegram.token),
    apiRoot: t.string('apiRoot', defaults.telegram.apiRoot),
    probeTimeoutMs: t.number('probeTimeoutMs', defaults.telegram.probeTimeoutMs),
    adminId: t.optionalNumber('adminId', defaults.telegram.adminId),
  };

  const c = new SectionReader(file, 'child');
  const child: ChildConfig = {
    id: c.string('id', defaults.child.id),
    command: c.string('command', defaults.child.command),
    args: c.strings('args', defaults.child.args),
    cwd: c.optionalString('cwd', defaults.child.cwd),
    databaseUrl: c.optionalString('databaseUrl', defaults.child.databaseUrl),
  };

  const r = new SectionReader(file, 'restart');
  const d = defaults.restart;
  const restart: RestartConfig = {
    baseDelayMs: r.number('baseDelayMs', d.baseDelayMs),
    maxDelayMs: r.number('maxDelayMs', d.maxDelayMs),
    tiers: r.tiers('tiers', d.tiers),
    maxRestarts: r.number('maxRestarts', d.maxRestarts),
    windowMs: r.number('windowMs', d.windowMs),
    cooldownMs: r.number('cooldownMs', d.cooldownMs),
    spawnRetryDelayMs: r.number('spawnRetryDelayMs', d.spawnRetryDelayMs),
    shutdownGraceMs: r.number('shutdownGraceMs', d.shutdownGraceMs),
  };

  const h = new SectionReader(file, 'health');
  const health: HealthConfig = {
    port: h.number('port', defaults.health.port),
    host: h.string('host', defaults.health.host),
    diskPath: h.string('diskPath', defaults.health.diskPath),
  };

  const o = new SectionReader(file, 'observability');
  const observability: ObservabilityConfig = {
    observers: o.strings('observers', defaults.observability.observers),
    logLevel: o.logLevel('logLevel', defaults.observability.logLevel),
    logPath: o.optionalString('logPath', defaults.observability.logPath),
    maxLogSize: o.optionalNumber('maxLogSize', defaults.observability.maxLogSize),
  };

  return { telegram, child, restart, health, observability };
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

function parseInteger(raw: string, name: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigLoadError(`Invalid environment: ${name} must be an integer, got "${raw}"`, name);
  }
  return Number(raw.trim());
}

function applyEnvOverrides(config: BotkeeperConfig, env: NodeJS.ProcessEnv): void {
  const token = env['BOT_TOKEN'];
  if (token) config.telegram.token = token;

  const port = env['PORT'];
  if (port) config.health.port = parseInteger(port, 'PORT');

  const adminId = env['ADMIN_ID'];
  if (adminId) config.telegram.adminId = parseInteger(adminId, 'ADMIN_ID');

  const databaseUrl = env['DATABASE_URL'];
  if (databaseUrl) config.child.databaseUrl = databaseUrl;

  const logLevel = env['LOG_LEVEL'];
  if (logLevel) {
    const level = LOG_LEVELS.find((l) => l === logLevel.toLowerCase());
    if (!level) {
      throw new ConfigLoadError(
        `Invalid environment: LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
        'LOG_LEVEL',
      );
    }
    config.observability.logLevel = level;
  }

  const command = env['BOT_COMMAND'];
  if (command && command.trim()) {
    const [executable = '', ...args] = command.trim().split(/\s+/);
    config.child.command = executable;
    config.child.args = args;
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateConfig(config: BotkeeperConfig): void {
  if (!config.telegram.token.trim()) {
    throw new ConfigLoadError(
      'Invalid config: telegram.token is required (set BOT_TOKEN)',
      'telegram.token',
    );
  }
  if (!(config.telegram.probeTimeoutMs > 0)) {
    throw new ConfigLoadError(
      'Invalid config: telegram.probeTimeoutMs must be greater than 0',
      'telegram.probeTimeoutMs',
    );
  }
  // The Bot API client takes whole seconds, so the limit is rounded down.
  const maxProbeTimeoutMs = Math.floor(MAX_TIMER_MS / 1000) * 1000;
  if (config.telegram.probeTimeoutMs > maxProbeTimeoutMs) {
    throw new ConfigLoadError(
      `Invalid config: telegram.probeTimeoutMs must not exceed ${maxProbeTimeoutMs}`,
      'telegram.probeTimeoutMs',
    );
  }

  const port = config.health.port;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigLoadError(
      `Invalid config: health.port must be between 1 and 65535, got ${port}`,
      'health.port',
    );
  }

  if (!config.child.command.trim()) {
    throw new ConfigLoadError('Invalid config: child.command must not be empty', 'child.command');
  }

  const [issue] = validateRestartPolicy(config.restart);
  if (issue) {
    throw new ConfigLoadError(`Invalid config: ${issue.field} ${issue.message}`, issue.field);
  }
}
