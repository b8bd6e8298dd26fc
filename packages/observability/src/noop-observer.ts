/**
 * NoopObserver -- silent observer that discards all events.
 *
 * Used when logging is explicitly disabled and as the default sink for
 * components constructed without an observer (tests, the `check` command).
 */

import type {
  ISupervisorObserver,
  SupervisorMeta,
  SupervisorStopStats,
  ChildEvent,
  ChildOutputEvent,
  RestartEvent,
  HealthRequestEvent,
} from '@botkeeper/core';

export class NoopObserver implements ISupervisorObserver {
  onSupervisorStart(_meta: SupervisorMeta): void {
    // intentionally empty
  }

  onSupervisorStop(_stats: SupervisorStopStats): void {
    // intentionally empty
  }

  onChildEvent(_event: ChildEvent): void {
    // intentionally empty
  }

  onChildOutput(_event: ChildOutputEvent): void {
    // intentionally empty
  }

  onRestartEvent(_event: RestartEvent): void {
    // intentionally empty
  }

  onHealthRequest(_event: HealthRequestEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
