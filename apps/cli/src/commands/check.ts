/**
 * Check command -- run both probes once and print the result.
 *
 * Exits 0 when the Bot API confirms the bot's identity, 1 otherwise.
 */

import type { BotkeeperConfig } from '@botkeeper/core';
import {
  HostSystemProbe,
  TelegramIdentityProbe,
  type IdentityProbe,
  type IdentityProbeResult,
  type SystemProbe,
  type SystemProbeResult,
} from '@botkeeper/gateway';
import { RESET, BOLD, DIM, CYAN, GREEN, YELLOW, RED, loadConfigOrReport, type CliOptions } from './shared.js';

export interface CheckResult {
  identity: IdentityProbeResult;
  system: SystemProbeResult;
}

export async function runChecks(identityProbe: IdentityProbe, systemProbe: SystemProbe): Promise<CheckResult> {
  const [identity, system] = await Promise.all([identityProbe.check(), systemProbe.sample()]);
  return { identity, system };
}

/** Plain-text summary lines, without colour. */
export function formatCheck(result: CheckResult): string[] {
  const { identity, system } = result;
  const lines: string[] = [];

  switch (identity.status) {
    case 'online':
      lines.push(`Bot       online as @${identity.botUsername ?? '?'} (id ${identity.botId ?? '?'})`);
      break;
    case 'offline':
      lines.push(`Bot       offline: ${identity.error ?? 'rejected by the Bot API'}`);
      break;
    case 'error':
      lines.push(`Bot       unreachable: ${identity.error ?? 'unknown error'}`);
      break;
  }

  if (system.ok) {
    const { cpuPercent, memoryPercent, diskPercent } = system.stats;
    lines.push(`System    cpu ${cpuPercent}%  memory ${memoryPercent}%  disk ${diskPercent}%`);
  } else {
    lines.push(`System    unavailable: ${system.error}`);
  }

  return lines;
}

function buildProbes(config: BotkeeperConfig): { identity: IdentityProbe; system: SystemProbe } {
  return {
    identity: new TelegramIdentityProbe({
      token: config.telegram.token,
      apiRoot: config.telegram.apiRoot,
      timeoutMs: config.telegram.probeTimeoutMs,
    }),
    system: new HostSystemProbe({ diskPath: config.health.diskPath }),
  };
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function check(options: CliOptions): Promise<void> {
  const config = loadConfigOrReport(options);
  if (!config) return;

  const probes = buildProbes(config);
  const result = await runChecks(probes.identity, probes.system);
  const colour =
    result.identity.status === 'online' ? GREEN : result.identity.status === 'offline' ? YELLOW : RED;

  console.log(`\n  ${CYAN}${BOLD}botkeeper check${RESET}`);
  console.log(`  ${DIM}${'='.repeat(50)}${RESET}\n`);
  const [botLine, ...rest] = formatCheck(result);
  console.log(`  ${colour}${botLine ?? ''}${RESET}`);
  for (const line of rest) console.log(`  ${line}`);
  console.log('');

  process.exitCode = result.identity.status === 'online' ? 0 : 1;
}
