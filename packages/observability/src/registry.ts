/**
 * Observer registry -- factory that builds observers from config.
 *
 * Reads the `observability` section of BotkeeperConfig and returns a
 * ready-to-use ISupervisorObserver (potentially a MultiObserver wrapping
 * several children).
 */

import type { ISupervisorObserver, ObservabilityConfig } from '@botkeeper/core';

import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import type { FileObserverOptions } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

export type ObserverFactoryConfig = Pick<ObservabilityConfig, 'observers'> &
  Partial<Omit<ObservabilityConfig, 'observers'>>;

/**
 * Build an ISupervisorObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: ObserverFactoryConfig): ISupervisorObserver {
  const { observers, logLevel = 'info', logPath, maxLogSize } = config;

  if (observers.length === 0) {
    return new NoopObserver();
  }

  const children: ISupervisorObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver(logLevel));
        break;
      case 'file': {
        const fileOpts: FileObserverOptions = {};
        if (logPath) fileOpts.filePath = logPath;
        if (maxLogSize) fileOpts.maxBytes = maxLogSize;
        children.push(new FileObserver(fileOpts));
        break;
      }
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [first] = children;
  if (!first) {
    return new NoopObserver();
  }

  if (children.length === 1) {
    return first;
  }

  return new MultiObserver(children);
}
