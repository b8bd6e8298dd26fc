/**
 * MultiObserver -- fan-out observer that delegates to multiple child observers.
 *
 * Every ISupervisorObserver method is forwarded to each child. Errors thrown
 * by individual children are caught and logged to stderr so that a single
 * broken sink never takes down the supervisor.
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

export class MultiObserver implements ISupervisorObserver {
  private readonly children: ISupervisorObserver[];

  constructor(children: ISupervisorObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: ISupervisorObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- ISupervisorObserver ------------------------------------------------

  onSupervisorStart(meta: SupervisorMeta): void {
    this.safely((c) => c.onSupervisorStart(meta));
  }

  onSupervisorStop(stats: SupervisorStopStats): void {
    this.safely((c) => c.onSupervisorStop(stats));
  }

  onChildEvent(event: ChildEvent): void {
    this.safely((c) => c.onChildEvent(event));
  }

  onChildOutput(event: ChildOutputEvent): void {
    this.safely((c) => c.onChildOutput(event));
  }

  onRestartEvent(event: RestartEvent): void {
    this.safely((c) => c.onRestartEvent(event));
  }

  onHealthRequest(event: HealthRequestEvent): void {
    this.safely((c) => c.onHealthRequest(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
