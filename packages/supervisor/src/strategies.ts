/**
 * Restart policy and the tiered backoff schedule.
 *
 * The delay before a restart is keyed to how many restarts the ledger holds
 * for the trailing window: the base delay for the first tier, multiplied
 * for later tiers, and clamped to `maxDelayMs` past the last tier.
 */

import type { BackoffTier, RestartConfig } from '@botkeeper/core';
import type { RestartLedger } from './ledger.js';

export type RestartPolicy = RestartConfig;

export const DAY_MS = 86_400_000;

export const DEFAULT_BACKOFF_TIERS: readonly BackoffTier[] = [
  { upTo: 3, multiplier: 1 },
  { upTo: 5, multiplier: 2 },
  { upTo: 10, multiplier: 4 },
];

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  baseDelayMs: 10_000,
  maxDelayMs: 300_000,
  tiers: [...DEFAULT_BACKOFF_TIERS],
  maxRestarts: 20,
  windowMs: DAY_MS,
  cooldownMs: 3_600_000,
  spawnRetryDelayMs: 10_000,
  shutdownGraceMs: 5_000,
};

export interface PolicyIssue {
  field: string;
  message: string;
}

/**
 * Delay in ms for the given number of restarts in the window.
 * Counts past the last tier get `maxDelayMs`.
 */
export function backoffDelay(restartCount: number, policy: RestartPolicy): number {
  const { baseDelayMs, maxDelayMs, tiers } = policy;
  if (restartCount <= 0) return Math.min(baseDelayMs, maxDelayMs);

  for (const tier of tiers) {
    if (restartCount <= tier.upTo) {
      return Math.min(baseDelayMs * tier.multiplier, maxDelayMs);
    }
  }
  return maxDelayMs;
}

/**
 * Record a restart at `now` and return the delay to wait before it.
 * The ledger is pruned to its window before counting.
 */
export function computeBackoff(
  ledger: RestartLedger,
  policy: RestartPolicy,
  now: number = Date.now(),
): number {
  const count = ledger.record(now);
  return backoffDelay(count, policy);
}

/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Check a policy for values that would break the schedule: non-positive
 * or oversized delays, an empty cap, or tiers whose bounds or multipliers
 * decrease.
 */

export function validateRestartPolicy(policy: RestartPolicy, prefix = 'restart'): PolicyIssue[] {
  const issues: PolicyIssue[] = [];
  const field = (name: string) => `${prefix}.${name}`;

  if (!(policy.baseDelayMs > 0)) {
    issues.push({ field: field('baseDelayMs'), message: 'must be greater than 0' });
  }
  if (!(policy.maxDelayMs >= policy.baseDelayMs)) {
    issues.push({ field: field('maxDelayMs'), message: 'must be at least baseDelayMs' });
  }
  if (!Number.isInteger(policy.maxRestarts) || policy.maxRestarts < 1) {
    issues.push({ field: field('maxRestarts'), message: 'must be a positive integer' });
  }
  if (!(policy.windowMs > 0)) {
    issues.push({ field: field('windowMs'), message: 'must be greater than 0' });
  }
  for (const name of ['cooldownMs', 'spawnRetryDelayMs', 'shutdownGraceMs'] as const) {
    if (!(policy[name] >= 0)) {
      issues.push({ field: field(name), message: 'must not be negative' });
    }
  }
  for (const name of [
    'baseDelayMs',
    'maxDelayMs',
    'cooldownMs',
    'spawnRetryDelayMs',
    'shutdownGraceMs',
  ] as const) {
    if (policy[name] > MAX_TIMER_MS) {
      issues.push({ field: field(name), message: `must not exceed ${MAX_TIMER_MS}` });
    }
  }

  let previous: BackoffTier | undefined;
  policy.tiers.forEach((tier, i) => {
    const at = field(`tiers[${i}]`);
    if (!Number.isInteger(tier.upTo) || tier.upTo < 1) {
      issues.push({ field: at, message: 'upTo must be a positive integer' });
    }
    if (!(tier.multiplier >= 1)) {
      issues.push({ field: at, message: 'multiplier must be at least 1' });
    }
    if (previous && tier.upTo <= previous.upTo) {
      issues.push({ field: at, message: 'upTo must increase from the previous tier' });
    }
    if (previous && tier.multiplier < previous.multiplier) {
      issues.push({ field: at, message: 'multiplier must not decrease from the previous tier' });
    }
    previous = tier;
  });

  return issues;
}
