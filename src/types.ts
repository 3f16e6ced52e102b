import type { CollectionErrorKind } from './errors.js';

/** Supported node platforms */
export type Platform = 'linux' | 'darwin' | 'windows';

export const PLATFORMS: Platform[] = ['linux', 'darwin', 'windows'];

/** Severity, ordered ok < warning < critical < unknown */
export type Severity = 'ok' | 'warning' | 'critical' | 'unknown';

export const SEVERITY_RANK: Record<Severity, number> = {
  ok: 0,
  warning: 1,
  critical: 2,
  unknown: 3,
};

export function maxSeverity(severities: Iterable<Severity>, fallback: Severity = 'ok'): Severity {
  let max = fallback;
  for (const s of severities) {
    if (SEVERITY_RANK[s] > SEVERITY_RANK[max]) max = s;
  }
  return max;
}

export function isSeverity(value: string): value is Severity {
  return Object.hasOwn(SEVERITY_RANK, value);
}

/** Metrics that carry warning/critical bounds */
export type ThresholdMetric = 'memory' | 'disk' | 'load';

export const THRESHOLD_METRICS: ThresholdMetric[] = ['memory', 'disk', 'load'];

export interface Bound {
  warning: number;
  critical: number;
}

export type Thresholds = Record<ThresholdMetric, Bound>;

/** Point-in-time measurement of one node */
export interface HealthSnapshot {
  host: string;
  cpuPercent: number;
  cpuCount: number;
  /** 1/5/15 minute load; absent where the platform has none */
  loadAverage?: [number, number, number];
  memoryTotalBytes: number;
  memoryUsedBytes: number;
  diskTotalBytes: number;
  diskUsedBytes: number;
  /** Service name → running */
  services: Record<string, boolean>;
  timestamp: Date;
  /** Time taken by the collector, in ms */
  latencyMs: number;
}

/** Severity of a single alert key in one cycle */
export interface MetricResult {
  /** "memory", "disk", "load" or "service:<name>" */
  key: string;
  severity: Severity;
  value?: number;
  /** The bound that was crossed, if any */
  threshold?: number;
  reason?: string;
}

export interface NodeError {
  kind: CollectionErrorKind;
  message: string;
}

/** Annotation carried into the next report (e.g. a failed remediation) */
export interface NodeAnnotation {
  kind: 'remediation-failed';
  message: string;
  timestamp: Date;
}

export interface NodeResult {
  name: string;
  host: string;
  platform: Platform;
  snapshot?: HealthSnapshot;
  metrics: MetricResult[];
  severity: Severity;
  error?: NodeError;
  annotations: NodeAnnotation[];
}

export interface ReportSummary {
  total: number;
  ok: number;
  warning: number;
  critical: number;
  unknown: number;
}

export interface ClusterReport {
  readonly cycle: number;
  readonly timestamp: Date;
  readonly durationMs: number;
  readonly severity: Severity;
  /** Sorted by node name */
  readonly nodes: readonly NodeResult[];
  readonly summary: ReportSummary;
}
