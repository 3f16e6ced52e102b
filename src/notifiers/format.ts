/**
 * Message text shared by every notifier.
 *
 * Unreachable nodes read "Could not reach node" rather than a threshold
 * breach; escalations and reminders say so.
 */

import type { AlertEvent } from '../alerts/state-tracker.js';
import { SERVICE_KEY_PREFIX, metricValues } from '../alerts/threshold-evaluator.js';
import type { HealthSnapshot, Severity } from '../types.js';

export const SEVERITY_EMOJI: Record<Severity, string> = {
  ok: '✅',
  warning: '⚠️',
  critical: '🔴',
  unknown: '❌',
};

const KEY_LABELS: Record<string, string> = {
  memory: 'Memory',
  disk: 'Disk',
  load: 'Load',
  collection: 'Reachability',
};

export function keyLabel(key: string): string {
  if (key.startsWith(SERVICE_KEY_PREFIX)) return `Service ${key.slice(SERVICE_KEY_PREFIX.length)}`;
  return KEY_LABELS[key] ?? key;
}

/** Percent metrics get one decimal and a %, load gets two decimals. */
export function formatValue(key: string, value: number): string {
  return key === 'load' ? value.toFixed(2) : `${value.toFixed(1)}%`;
}

function breachText(event: AlertEvent): string {
  const label = keyLabel(event.key);
  const severity = event.severity.toUpperCase();
  if (event.value !== undefined) {
    const bound = event.threshold !== undefined ? ` (threshold ${formatValue(event.key, event.threshold)})` : '';
    return `${label} ${severity}: ${formatValue(event.key, event.value)}${bound}`;
  }
  return event.detail ? `${label} ${severity}: ${event.detail}` : `${label} ${severity}`;
}

/** One-line summary of an event. */
export function alertMessage(event: AlertEvent): string {
  if (event.kind === 'recovery') {
    return event.unreachable
      ? 'Node is reachable again'
      : `${keyLabel(event.key)} recovered (was ${event.previousSeverity.toUpperCase()})`;
  }

  const body = event.unreachable
    ? `Could not reach node${event.detail ? `: ${event.detail}` : ''}`
    : breachText(event);

  switch (event.kind) {
    case 'escalation':
      return `${body} (escalated from ${event.previousSeverity.toUpperCase()})`;
    case 'reminder':
      return `${body} (still ${event.severity.toUpperCase()} after ${event.consecutive} checks)`;
    default:
      return body;
  }
}

export interface MetricLine {
  label: string;
  value: string;
}

/** Current metric readings from a snapshot, for message bodies. */
export function snapshotLines(snapshot: HealthSnapshot): MetricLine[] {
  const values = metricValues(snapshot);
  const lines: MetricLine[] = [];
  if (values.memory !== undefined) lines.push({ label: 'Memory', value: formatValue('memory', values.memory) });
  if (values.disk !== undefined) lines.push({ label: 'Disk', value: formatValue('disk', values.disk) });
  if (values.load !== undefined) lines.push({ label: 'Load', value: formatValue('load', values.load) });
  return lines;
}
