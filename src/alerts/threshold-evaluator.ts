/**
 * Threshold Evaluator
 *
 * Maps a health snapshot plus the node's thresholds to a severity per alert
 * key and an overall node severity. Pure: no I/O, no state, no hysteresis.
 */

import {
  maxSeverity,
  type Bound,
  type HealthSnapshot,
  type MetricResult,
  type Severity,
  type ThresholdMetric,
  type Thresholds,
} from '../types.js';

export interface Evaluation {
  metrics: MetricResult[];
  overall: Severity;
}

export const SERVICE_KEY_PREFIX = 'service:';

export function serviceKey(name: string): string {
  return `${SERVICE_KEY_PREFIX}${name}`;
}

/**
 * Calculate percentage from used/total bytes.
 * Returns 0 if total is 0 to avoid division by zero.
 */
export function calcPct(used: number, total: number): number {
  if (total === 0) return 0;
  return (used / total) * 100;
}

/** Evaluate severity for a metric value against warning and critical bounds. */
export function evalSeverity(value: number, bound: Bound): Severity {
  if (value >= bound.critical) return 'critical';
  if (value >= bound.warning) return 'warning';
  return 'ok';
}

/**
 * Numeric metric values present in a snapshot.
 * Load is the 1-minute average per core; absent when the platform has none.
 */
export function metricValues(snapshot: HealthSnapshot): Partial<Record<ThresholdMetric, number>> {
  const values: Partial<Record<ThresholdMetric, number>> = {
    memory: calcPct(snapshot.memoryUsedBytes, snapshot.memoryTotalBytes),
    disk: calcPct(snapshot.diskUsedBytes, snapshot.diskTotalBytes),
  };
  if (snapshot.loadAverage) {
    values.load = snapshot.loadAverage[0] / Math.max(snapshot.cpuCount, 1);
  }
  return values;
}

function metricResult(key: ThresholdMetric, value: number, bound: Bound): MetricResult {
  const severity = evalSeverity(value, bound);
  const result: MetricResult = { key, severity, value };
  if (severity === 'critical') result.threshold = bound.critical;
  if (severity === 'warning') result.threshold = bound.warning;
  return result;
}

/**
 * Evaluate a snapshot. An absent snapshot (collection failed) is unknown
 * regardless of anything else.
 */
export function evaluate(
  snapshot: HealthSnapshot | undefined,
  thresholds: Thresholds,
  services: readonly string[],
): Evaluation {
  if (!snapshot) return { metrics: [], overall: 'unknown' };

  const metrics: MetricResult[] = [];
  const values = metricValues(snapshot);

  for (const key of ['memory', 'disk', 'load'] as const) {
    const value = values[key];
    if (value === undefined) continue;
    metrics.push(metricResult(key, value, thresholds[key]));
  }

  for (const name of services) {
    const running = snapshot.services[name];
    if (running === undefined) {
      metrics.push({ key: serviceKey(name), severity: 'critical', reason: 'not observed' });
    } else if (!running) {
      metrics.push({ key: serviceKey(name), severity: 'critical', reason: 'not running' });
    } else {
      metrics.push({ key: serviceKey(name), severity: 'ok' });
    }
  }

  return { metrics, overall: maxSeverity(metrics.map(m => m.severity)) };
}
