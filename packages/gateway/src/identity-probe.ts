/**
 * TelegramIdentityProbe -- asks the Bot API who the bot is (`getMe`).
 *
 * A successful answer means the token is valid and the API is reachable.
 * An `ok: false` answer (revoked or mistyped token) is reported as
 * `offline`; anything else (DNS, refused connection, timeout) as `error`.
 */

import { Api, GrammyError } from 'grammy';
import { ProbeError, toError, type ISupervisorObserver } from '@botkeeper/core';
import type { IdentityProbe, IdentityProbeResult } from './health-report.js';

export const DEFAULT_API_ROOT = 'https://api.telegram.org';
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

export interface TelegramIdentityProbeOptions {
  token: string;
  apiRoot?: string;
  timeoutMs?: number;
  observer?: ISupervisorObserver;
}

export class TelegramIdentityProbe implements IdentityProbe {
  private readonly api: Api;
  private readonly observer?: ISupervisorObserver;

  constructor(options: TelegramIdentityProbeOptions) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.api = new Api(options.token, {
      apiRoot: options.apiRoot ?? DEFAULT_API_ROOT,
      timeoutSeconds: Math.max(1, Math.ceil(timeoutMs / 1000)),
    });
    this.observer = options.observer;
  }

  async check(): Promise<IdentityProbeResult> {
    try {
      const me = await this.api.getMe();
      return { status: 'online', botId: me.id, botUsername: me.username };
    } catch (err) {
      if (err instanceof GrammyError) {
        this.report(err.description, { errorCode: err.error_code });
        return { status: 'offline', error: err.description };
      }
      const error = toError(err);
      this.report(error.message, {});
      return { status: 'error', error: error.message };
    }
  }

  private report(message: string, context: Record<string, unknown>): void {
    this.observer?.onError(new ProbeError(message, 'telegram', context), { probe: 'telegram' });
  }
}
