/**
 * Threshold Evaluator Tests
 */

import { describe, it, expect } from 'vitest';
import { calcPct, evalSeverity, evaluate, metricValues, serviceKey } from './threshold-evaluator.js';
import type { HealthSnapshot, Thresholds } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const GB = 1024 * 1024 * 1024;

const THRESHOLDS: Thresholds = {
  memory: { warning: 85, critical: 90 },
  disk: { warning: 80, critical: 90 },
  load: { warning: 4, critical: 8 },
};

function makeSnapshot(overrides: Partial<HealthSnapshot> = {}): HealthSnapshot {
  return {
    host: '10.0.0.1',
    cpuPercent: 30,
    cpuCount: 4,
    loadAverage: [2, 1.5, 1],   // 0.5 per core
    memoryTotalBytes: 100 * GB,
    memoryUsedBytes: 50 * GB,   // 50%
    diskTotalBytes: 100 * GB,
    diskUsedBytes: 13 * GB,     // 13%
    services: { nginx: true },
    timestamp: new Date('2026-01-01T00:00:00Z'),
    latencyMs: 12,
    ...overrides,
  };
}

function severityOf(result: ReturnType<typeof evaluate>, key: string) {
  return result.metrics.find(m => m.key === key)?.severity;
}

// ---------------------------------------------------------------------------
// Group 1: primitives
// ---------------------------------------------------------------------------

describe('calcPct', () => {
  it('returns correct percentage for typical values', () => {
    expect(calcPct(14 * GB, 20 * GB)).toBeCloseTo(70, 5);
  });

  it('returns 0 when total is 0 (avoid divide-by-zero)', () => {
    expect(calcPct(0, 0)).toBe(0);
  });
});

describe('evalSeverity', () => {
  const bound = { warning: 85, critical: 90 };

  it('returns ok below the warning bound', () => {
    expect(evalSeverity(84.9, bound)).toBe('ok');
  });

  it('returns warning at the warning bound', () => {
    expect(evalSeverity(85, bound)).toBe('warning');
  });

  it('returns warning strictly between the bounds', () => {
    expect(evalSeverity(87.5, bound)).toBe('warning');
  });

  it('returns critical at and above the critical bound', () => {
    expect(evalSeverity(90, bound)).toBe('critical');
    expect(evalSeverity(99, bound)).toBe('critical');
  });

  it('holds across a range of (warning, critical) pairs', () => {
    const pairs: Array<[number, number]> = [[1, 2], [50, 51], [70, 85], [0.5, 8]];
    for (const [warning, critical] of pairs) {
      const b = { warning, critical };
      expect(evalSeverity((warning + critical) / 2, b)).toBe('warning');
      expect(evalSeverity(warning - 0.1, b)).toBe('ok');
      expect(evalSeverity(critical, b)).toBe('critical');
    }
  });
});

describe('metricValues', () => {
  it('normalises load by core count', () => {
    expect(metricValues(makeSnapshot({ loadAverage: [12, 1, 1], cpuCount: 4 })).load).toBe(3);
  });

  it('omits load when the platform reports none', () => {
    expect(metricValues(makeSnapshot({ loadAverage: undefined }))).not.toHaveProperty('load');
  });
});

// ---------------------------------------------------------------------------
// Group 2: evaluate
// ---------------------------------------------------------------------------

describe('evaluate', () => {
  it('returns ok for a healthy node', () => {
    const result = evaluate(makeSnapshot(), THRESHOLDS, ['nginx']);
    expect(result.overall).toBe('ok');
    expect(result.metrics.map(m => m.key)).toEqual(['memory', 'disk', 'load', 'service:nginx']);
  });

  it('db1 at 92% memory against 85/90 is critical', () => {
    const result = evaluate(makeSnapshot({ memoryUsedBytes: 92 * GB }), THRESHOLDS, []);
    const memory = result.metrics.find(m => m.key === 'memory');
    expect(memory?.severity).toBe('critical');
    expect(memory?.threshold).toBe(90);
    expect(memory?.value).toBeCloseTo(92, 5);
    expect(result.overall).toBe('critical');
  });

  it('a critical metric stays critical regardless of the others', () => {
    const result = evaluate(
      makeSnapshot({ diskUsedBytes: 95 * GB, memoryUsedBytes: 1 * GB, loadAverage: [0, 0, 0] }),
      THRESHOLDS,
      [],
    );
    expect(severityOf(result, 'disk')).toBe('critical');
    expect(severityOf(result, 'memory')).toBe('ok');
    expect(result.overall).toBe('critical');
  });

  it('records the warning bound on a warning', () => {
    const result = evaluate(makeSnapshot({ diskUsedBytes: 85 * GB }), THRESHOLDS, []);
    const disk = result.metrics.find(m => m.key === 'disk');
    expect(disk?.severity).toBe('warning');
    expect(disk?.threshold).toBe(80);
    expect(result.overall).toBe('warning');
  });

  it('omits load instead of defaulting it to ok', () => {
    const result = evaluate(makeSnapshot({ loadAverage: undefined }), THRESHOLDS, []);
    expect(result.metrics.map(m => m.key)).toEqual(['memory', 'disk']);
  });

  it('marks a stopped service critical', () => {
    const result = evaluate(makeSnapshot({ services: { nginx: false } }), THRESHOLDS, ['nginx']);
    const svc = result.metrics.find(m => m.key === serviceKey('nginx'));
    expect(svc).toEqual({ key: 'service:nginx', severity: 'critical', reason: 'not running' });
    expect(result.overall).toBe('critical');
  });

  it('marks a configured but unobserved service critical with reason "not observed"', () => {
    const result = evaluate(makeSnapshot({ services: {} }), THRESHOLDS, ['redis']);
    expect(result.metrics.find(m => m.key === 'service:redis')).toEqual({
      key: 'service:redis',
      severity: 'critical',
      reason: 'not observed',
    });
  });

  it('ignores services in the snapshot that are not configured', () => {
    const result = evaluate(makeSnapshot({ services: { nginx: true, cron: false } }), THRESHOLDS, ['nginx']);
    expect(result.metrics.some(m => m.key === 'service:cron')).toBe(false);
    expect(result.overall).toBe('ok');
  });

  it('is unknown when the snapshot is absent', () => {
    expect(evaluate(undefined, THRESHOLDS, ['nginx'])).toEqual({ metrics: [], overall: 'unknown' });
  });
});
