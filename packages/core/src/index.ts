/**
 * @botkeeper/core -- shared contracts for the botkeeper packages.
 */

export {
  BotkeeperError,
  ConfigError,
  SupervisorError,
  ProbeError,
  HealthServerError,
  toError,
} from './errors/index.js';

export type {
  OutputStream,
  SupervisorMeta,
  SupervisorStopStats,
  HostStatsSnapshot,
  ChildEvent,
  ChildOutputEvent,
  RestartEvent,
  HealthRequestEvent,
  ISupervisorObserver,
} from './interfaces/observer.js';

export type {
  LogLevel,
  BackoffTier,
  TelegramConfig,
  ChildConfig,
  RestartConfig,
  HealthConfig,
  ObservabilityConfig,
  BotkeeperConfig,
} from './types/config.js';
