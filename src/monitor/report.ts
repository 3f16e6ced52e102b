/**
 * ClusterReport assembly.
 */

import {
  maxSeverity,
  type ClusterReport,
  type NodeResult,
  type ReportSummary,
} from '../types.js';

export function summarize(nodes: readonly NodeResult[]): ReportSummary {
  const summary: ReportSummary = { total: nodes.length, ok: 0, warning: 0, critical: 0, unknown: 0 };
  for (const node of nodes) summary[node.severity]++;
  return summary;
}

export interface ReportInput {
  cycle: number;
  startedAt: number;
  finishedAt: number;
  nodes: NodeResult[];
}

/** Freeze a node result together with everything it holds. */
export function freezeResult(node: NodeResult): Readonly<NodeResult> {
  for (const metric of node.metrics) Object.freeze(metric);
  Object.freeze(node.metrics);
  for (const annotation of node.annotations) Object.freeze(annotation);
  Object.freeze(node.annotations);
  if (node.error) Object.freeze(node.error);
  if (node.snapshot) {
    Object.freeze(node.snapshot.services);
    if (node.snapshot.loadAverage) Object.freeze(node.snapshot.loadAverage);
    Object.freeze(node.snapshot);
  }
  return Object.freeze(node);
}

/**
 * Build an immutable report. Nodes are sorted by name so completion order
 * never shows through; overall severity is the worst node severity.
 */
export function buildClusterReport(input: ReportInput): ClusterReport {
  const nodes = [...input.nodes].sort((a, b) => a.name.localeCompare(b.name));
  for (const node of nodes) freezeResult(node);

  return Object.freeze({
    cycle: input.cycle,
    timestamp: new Date(input.finishedAt),
    durationMs: input.finishedAt - input.startedAt,
    severity: maxSeverity(nodes.map(n => n.severity)),
    nodes: Object.freeze(nodes),
    summary: summarize(nodes),
  });
}

/** Plain JSON form of one node result; dates become ISO strings. */
export function nodeToJSON(node: NodeResult): Record<string, unknown> {
  return {
    name: node.name,
    host: node.host,
    platform: node.platform,
    severity: node.severity,
    metrics: node.metrics,
    error: node.error ?? null,
    annotations: node.annotations.map(a => ({ ...a, timestamp: a.timestamp.toISOString() })),
    snapshot: node.snapshot
      ? { ...node.snapshot, timestamp: node.snapshot.timestamp.toISOString() }
      : null,
  };
}

/** Plain JSON form; dates become ISO strings. */
export function reportToJSON(report: ClusterReport): Record<string, unknown> {
  return {
    cycle: report.cycle,
    timestamp: report.timestamp.toISOString(),
    durationMs: report.durationMs,
    severity: report.severity,
    summary: report.summary,
    nodes: report.nodes.map(nodeToJSON),
  };
}
