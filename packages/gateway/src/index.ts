/**
 * @botkeeper/gateway -- health endpoint and the probes behind it
 */

export { HealthServer } from './server.js';
export type { HealthServerOptions } from './server.js';

export { buildHealthReport, errorBody } from './health-report.js';
export type {
  BotSection,
  HealthErrorBody,
  HealthReport,
  HealthReportInput,
  HealthReportResult,
  HealthStatus,
  IdentityProbe,
  IdentityProbeResult,
  IdentityStatus,
  ProcessSection,
  SystemProbe,
  SystemProbeResult,
  SystemSection,
} from './health-report.js';

export { TelegramIdentityProbe, DEFAULT_API_ROOT, DEFAULT_PROBE_TIMEOUT_MS } from './identity-probe.js';
export type { TelegramIdentityProbeOptions } from './identity-probe.js';

export { HostSystemProbe, nodeStatsSource } from './system-probe.js';
export type { DiskUsage, HostSystemProbeOptions, SystemStatsSource } from './system-probe.js';

export { renderStatusPage, escapeHtml } from './status-page.js';
