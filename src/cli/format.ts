/**
 * Plain-text rendering for the CLI.
 */

import { SERVICE_KEY_PREFIX } from '../alerts/threshold-evaluator.js';
import { formatValue } from '../notifiers/format.js';
import type { ClusterReport, NodeResult, Severity } from '../types.js';

/** Process exit code for the worst severity seen */
export function exitCodeFor(severity: Severity): number {
  if (severity === 'ok') return 0;
  if (severity === 'warning') return 2;
  return 1;
}

/** Exit code for an invalid or missing configuration (EX_CONFIG) */
export const EXIT_CONFIG = 78;

export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(headers), line(widths.map(w => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

function metricCell(result: NodeResult, key: string): string {
  const metric = result.metrics.find(m => m.key === key);
  if (!metric || metric.value === undefined) return '-';
  const text = formatValue(key, metric.value);
  return metric.severity === 'ok' ? text : `${text}!`;
}

function servicesCell(result: NodeResult): string {
  const services = result.metrics.filter(m => m.key.startsWith(SERVICE_KEY_PREFIX));
  if (services.length === 0) return '-';
  const down = services.filter(m => m.severity !== 'ok').map(m => m.key.slice(SERVICE_KEY_PREFIX.length));
  return down.length > 0 ? `down: ${down.join(', ')}` : `${services.length} ok`;
}

function notesCell(result: NodeResult): string {
  if (result.error) return `${result.error.kind}: ${result.error.message}`;
  return result.annotations.map(a => a.message).join('; ');
}

export function renderResults(results: readonly NodeResult[]): string {
  const rows = results.map(r => [
    r.name,
    r.host,
    r.severity.toUpperCase(),
    metricCell(r, 'memory'),
    metricCell(r, 'disk'),
    metricCell(r, 'load'),
    servicesCell(r),
    notesCell(r),
  ]);
  return table(['NODE', 'HOST', 'STATUS', 'MEMORY', 'DISK', 'LOAD', 'SERVICES', 'NOTES'], rows);
}

export function summaryLine(report: ClusterReport): string {
  const { summary } = report;
  return `Cycle ${report.cycle}: ${report.severity.toUpperCase()} - ${summary.total} nodes ` +
    `(${summary.ok} ok, ${summary.warning} warning, ${summary.critical} critical, ${summary.unknown} unknown) ` +
    `in ${(report.durationMs / 1000).toFixed(1)}s`;
}

export function renderReport(report: ClusterReport): string {
  return `${summaryLine(report)}\n\n${renderResults(report.nodes)}`;
}
