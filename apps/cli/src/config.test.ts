/**
 * Tests for the CLI configuration module.
 *
 * Covers: getDefaultConfig, loadConfig (file, .env, env overrides),
 * ${VAR} resolution, merge rules, validation, ConfigLoadError and
 * buildChildEnv.
 */

import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError } from '@botkeeper/core';
import {
  CONFIG_FILENAME,
  ConfigLoadError,
  buildChildEnv,
  getDefaultConfig,
  loadConfig,
} from './config.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let dir: string;

beforeEach(() => {
  dir = join(tmpdir(), `botkeeper-config-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(dir, { recursive: true });
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function writeConfigFile(config: unknown, name = CONFIG_FILENAME): string {
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(config));
  return path;
}

/** Load with an isolated environment that always has a token. */
function load(env: NodeJS.ProcessEnv = {}, configPath?: string) {
  return loadConfig({ cwd: dir, env: { BOT_TOKEN: 'test-token', ...env }, configPath });
}

function loadError(env: NodeJS.ProcessEnv = {}, configPath?: string): ConfigLoadError {
  try {
    load(env, configPath);
  } catch (err) {
    if (err instanceof ConfigLoadError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('getDefaultConfig', () => {
  it('has the restart defaults', () => {
    const { restart } = getDefaultConfig();

    expect(restart.baseDelayMs).toBe(10_000);
    expect(restart.maxDelayMs).toBe(300_000);
    expect(restart.maxRestarts).toBe(20);
    expect(restart.windowMs).toBe(86_400_000);
    expect(restart.cooldownMs).toBe(3_600_000);
    expect(restart.tiers).toEqual([
      { upTo: 3, multiplier: 1 },
      { upTo: 5, multiplier: 2 },
      { upTo: 10, multiplier: 4 },
    ]);
  });

  it('runs node bot.js and listens on 8080', () => {
    const config = getDefaultConfig();

    expect(config.child.command).toBe('node');
    expect(config.child.args).toEqual(['bot.js']);
    expect(config.health.port).toBe(8080);
    expect(config.telegram.apiRoot).toBe('https://api.telegram.org');
    expect(config.observability.observers).toEqual(['console', 'file']);
  });

  it('returns independent copies', () => {
    const a = getDefaultConfig();
    a.restart.tiers.push({ upTo: 99, multiplier: 8 });

    expect(getDefaultConfig().restart.tiers).toHaveLength(3);
  });
});

describe('loadConfig', () => {
  it('returns defaults plus the token when no file exists', () => {
    const config = load();

    expect(config.telegram.token).toBe('test-token');
    expect(config.restart).toEqual(getDefaultConfig().restart);
  });

  it('fails without a token', () => {
    const err = (() => {
      try {
        loadConfig({ cwd: dir, env: {} });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(err).toBeInstanceOf(ConfigLoadError);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ field: 'telegram.token', code: 'CONFIG_ERROR' });
  });

  it('merges the config file over defaults field by field', () => {
    writeConfigFile({ restart: { maxRestarts: 5 }, health: { host: '127.0.0.1' } });

    const config = load();

    expect(config.restart.maxRestarts).toBe(5);
    expect(config.restart.baseDelayMs).toBe(10_000);
    expect(config.health).toEqual({ port: 8080, host: '127.0.0.1', diskPath: '/' });
  });

  it('replaces arrays instead of concatenating them', () => {
    writeConfigFile({ restart: { tiers: [{ upTo: 2, multiplier: 1 }] }, child: { args: ['main.js'] } });

    const config = load();

    expect(config.restart.tiers).toEqual([{ upTo: 2, multiplier: 1 }]);
    expect(config.child.args).toEqual(['main.js']);
  });

  it('resolves ${VAR} references in file strings', () => {
    writeConfigFile({ child: { cwd: '${BOT_HOME}/app', databaseUrl: '${MISSING_VAR}' } });

    const config = load({ BOT_HOME: '/srv/bot' });

    expect(config.child.cwd).toBe('/srv/bot/app');
    expect(config.child.databaseUrl).toBe('');
  });

  it('reads an explicit --config path', () => {
    const path = writeConfigFile({ health: { port: 9000 } }, 'custom.json');

    expect(load({}, path).health.port).toBe(9000);
  });

  it('fails when an explicit config file is missing', () => {
    const err = loadError({}, join(dir, 'nope.json'));
    expect(err.message).toContain('Config file not found');
  });

  it('fails on invalid JSON', () => {
    writeFileSync(join(dir, CONFIG_FILENAME), '{ not json');
    expect(loadError().message).toContain('Failed to parse');
  });

  it('fails when a section has the wrong shape', () => {
    writeConfigFile({ restart: [] });
    expect(loadError().field).toBe('restart');
  });

  it('fails when a value has the wrong type', () => {
    writeConfigFile({ restart: { maxRestarts: '20' } });
    expect(loadError().field).toBe('restart.maxRestarts');
  });

  it('fails on a malformed tier', () => {
    writeConfigFile({ restart: { tiers: [{ upTo: 3 }] } });
    expect(loadError().field).toBe('restart.tiers[0]');
  });
});

describe('environment overrides', () => {
  it('applies PORT, ADMIN_ID, DATABASE_URL and LOG_LEVEL', () => {
    const config = load({
      PORT: '9090',
      ADMIN_ID: '123456',
      DATABASE_URL: 'sqlite://test.db',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.health.port).toBe(9090);
    expect(config.telegram.adminId).toBe(123456);
    expect(config.child.databaseUrl).toBe('sqlite://test.db');
    expect(config.observability.logLevel).toBe('debug');
  });

  it('wins over the config file', () => {
    writeConfigFile({ health: { port: 9000 }, telegram: { token: 'file-token' } });

    const config = load({ PORT: '9091' });

    expect(config.health.port).toBe(9091);
    expect(config.telegram.token).toBe('test-token');
  });

  it('splits BOT_COMMAND into command and arguments', () => {
    const config = load({ BOT_COMMAND: '  npx  tsx src/bot.ts --verbose ' });

    expect(config.child.command).toBe('npx');
    expect(config.child.args).toEqual(['tsx', 'src/bot.ts', '--verbose']);
  });

  it('rejects a non-numeric ADMIN_ID', () => {
    expect(loadError({ ADMIN_ID: 'admin' }).field).toBe('ADMIN_ID');
  });

  it('rejects an unknown LOG_LEVEL', () => {
    expect(loadError({ LOG_LEVEL: 'verbose' }).field).toBe('LOG_LEVEL');
  });

  it('rejects a port out of range', () => {
    expect(loadError({ PORT: '70000' }).field).toBe('health.port');
    expect(loadError({ PORT: 'eighty' }).field).toBe('PORT');
  });
});

describe('.env loading', () => {
  it('reads variables from .env in the working directory', () => {
    writeFileSync(join(dir, '.env'), 'BOT_TOKEN=dotenv-token\nPORT=7070\n');
    const env: NodeJS.ProcessEnv = {};

    const config = loadConfig({ cwd: dir, env });

    expect(config.telegram.token).toBe('dotenv-token');
    expect(config.health.port).toBe(7070);
    expect(env['PORT']).toBe('7070');
  });

  it('keeps variables that are already set', () => {
    writeFileSync(join(dir, '.env'), 'BOT_TOKEN=dotenv-token\n');

    const config = loadConfig({ cwd: dir, env: { BOT_TOKEN: 'env-token' } });

    expect(config.telegram.token).toBe('env-token');
  });

  it('can be disabled', () => {
    writeFileSync(join(dir, '.env'), 'PORT=7070\n');

    const config = loadConfig({ cwd: dir, env: { BOT_TOKEN: 'test-token' }, dotenv: false });

    expect(config.health.port).toBe(8080);
  });
});

describe('restart policy validation', () => {
  it('rejects maxRestarts below 1', () => {
    writeConfigFile({ restart: { maxRestarts: 0 } });
    expect(loadError().field).toBe('restart.maxRestarts');
  });

  it('rejects a non-positive base delay', () => {
    writeConfigFile({ restart: { baseDelayMs: 0, maxDelayMs: 0 } });
    expect(loadError().field).toBe('restart.baseDelayMs');
  });

  it('rejects a cooldown longer than a timer can wait', () => {
    writeConfigFile({ restart: { cooldownMs: 3_000_000_000 } });
    const err = loadError();
    expect(err.field).toBe('restart.cooldownMs');
    expect(err.message).toBe('Invalid config: restart.cooldownMs must not exceed 2147483647');
  });

  it('rejects an oversized shutdown grace period and Bot API timeout', () => {
    writeConfigFile({ restart: { shutdownGraceMs: 2_147_483_648 } });
    expect(loadError().field).toBe('restart.shutdownGraceMs');

    writeConfigFile({ telegram: { probeTimeoutMs: 2_147_483_648 } });
    expect(loadError().field).toBe('telegram.probeTimeoutMs');
  });

  it('rejects a tier table that goes backwards', () => {
    writeConfigFile({
      restart: {
        tiers: [
          { upTo: 5, multiplier: 2 },
          { upTo: 3, multiplier: 4 },
        ],
      },
    });
    expect(loadError().field).toBe('restart.tiers[1]');
  });

  it('rejects an empty child command', () => {
    writeConfigFile({ child: { command: '  ' } });
    expect(loadError().field).toBe('child.command');
  });
});

describe('buildChildEnv', () => {
  it('forwards the token, admin id and database url', () => {
    const config = load({ ADMIN_ID: '42', DATABASE_URL: 'sqlite://test.db' });

    const env = buildChildEnv(config, { PATH: '/usr/bin' });

    expect(env).toEqual({
      PATH: '/usr/bin',
      BOT_TOKEN: 'test-token',
      ADMIN_ID: '42',
      DATABASE_URL: 'sqlite://test.db',
    });
  });

  it('omits settings that are not configured', () => {
    const env = buildChildEnv(load(), {});
    expect(env).toEqual({ BOT_TOKEN: 'test-token' });
  });
});
