/**
 * Helpers shared by the CLI commands: ANSI colours, parsed options and
 * the fatal-config path.
 */

import type { BotkeeperConfig } from '@botkeeper/core';
import { loadConfig } from '../config.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const CYAN = '\x1b[36m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';

export interface CliOptions {
  configPath?: string;
}

/**
 * Load the config, or print why it failed and set exit code 1.
 * Configuration errors are the only ones that end the process at startup.
 */
export function loadConfigOrReport(options: CliOptions): BotkeeperConfig | null {
  try {
    return loadConfig({ configPath: options.configPath });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}`);
    console.error(`  ${DIM}Set ${CYAN}BOT_TOKEN${DIM} in the environment or in .env.${RESET}\n`);
    process.exitCode = 1;
    return null;
  }
}
