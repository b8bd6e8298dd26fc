/**
 * HTML rendering of a health report for humans opening the port in a
 * browser. Every interpolated value goes through `escapeHtml`.
 */

import type { HealthReport } from './health-report.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function formatBytes(bytes: number): string {
  const gib = bytes / 1024 ** 3;
  return gib >= 1 ? `${gib.toFixed(1)} GiB` : `${(bytes / 1024 ** 2).toFixed(0)} MiB`;
}

function row(label: string, value: string | number | undefined | null): string {
  const text = value === undefined || value === null ? '-' : String(value);
  return `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(text)}</td></tr>`;
}

export function renderStatusPage(report: HealthReport): string {
  const { bot, system, process } = report;

  const systemRows =
    'error' in system
      ? [row('Error', system.error)]
      : [
          row('CPU', `${system.cpu_percent}%`),
          row('Memory', `${system.memory_percent}%`),
          row('Memory available', formatBytes(system.memory_available)),
          row('Disk', `${system.disk_percent}%`),
          row('Disk free', formatBytes(system.disk_free)),
        ];

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta http-equiv="refresh" content="30">',
    '<title>Bot status</title>',
    '<style>body{font-family:sans-serif;margin:2rem}th{text-align:left;padding-right:1rem}' +
      '.healthy{color:#2e7d32}.degraded{color:#ef6c00}.error{color:#c62828}</style>',
    '</head>',
    '<body>',
    `<h1 class="${escapeHtml(report.status)}">${escapeHtml(report.status.toUpperCase())}</h1>`,
    `<p>Updated ${escapeHtml(report.timestamp)}</p>`,
    '<h2>Bot</h2>',
    '<table>',
    row('Status', bot.status),
    row('Username', bot.bot_username === undefined ? undefined : `@${bot.bot_username}`),
    row('Id', bot.bot_id),
    ...(bot.error === undefined ? [] : [row('Error', bot.error)]),
    '</table>',
    '<h2>Process</h2>',
    '<table>',
    row('Status', process.cooling_down ? `${process.status} (cooling down)` : process.status),
    row('PID', process.pid),
    row('Restarts (24h)', process.restart_count),
    row('Total spawns', process.total_spawns),
    row('Last exit code', process.last_exit_code),
    '</table>',
    '<h2>System</h2>',
    '<table>',
    ...systemRows,
    '</table>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
