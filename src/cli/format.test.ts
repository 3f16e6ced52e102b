import { describe, it, expect } from 'vitest';
import { exitCodeFor, renderResults, summaryLine, table } from './format.js';
import { buildClusterReport } from '../monitor/report.js';
import type { NodeResult } from '../types.js';

function makeResult(overrides: Partial<NodeResult> = {}): NodeResult {
  return {
    name: 'web1',
    host: '10.0.0.5',
    platform: 'linux',
    severity: 'ok',
    metrics: [
      { key: 'memory', severity: 'ok', value: 50 },
      { key: 'disk', severity: 'warning', value: 85, threshold: 80 },
      { key: 'load', severity: 'ok', value: 0.25 },
      { key: 'service:nginx', severity: 'ok' },
      { key: 'service:redis', severity: 'critical', reason: 'not running' },
    ],
    annotations: [],
    ...overrides,
  };
}

describe('exitCodeFor', () => {
  it('maps severities to exit codes', () => {
    expect(exitCodeFor('ok')).toBe(0);
    expect(exitCodeFor('warning')).toBe(2);
    expect(exitCodeFor('critical')).toBe(1);
    expect(exitCodeFor('unknown')).toBe(1);
  });
});

describe('table', () => {
  it('pads columns to the widest cell', () => {
    expect(table(['A', 'BB'], [['xyz', '1'], ['q', '']])).toBe([
      'A    BB',
      '---  --',
      'xyz  1',
      'q',
    ].join('\n'));
  });
});

describe('renderResults', () => {
  it('shows metric values, breaches and stopped services', () => {
    const lines = renderResults([makeResult({ severity: 'critical' })]).split('\n');
    expect(lines[2]).toBe('web1  10.0.0.5  CRITICAL  50.0%   85.0%!  0.25  down: redis');
  });

  it('shows the collection error for an unreachable node', () => {
    const lines = renderResults([
      makeResult({ metrics: [], severity: 'unknown', error: { kind: 'timeout', message: 'no response within 30s' } }),
    ]).split('\n');
    expect(lines[2]).toBe('web1  10.0.0.5  UNKNOWN  -       -     -     -         timeout: no response within 30s');
  });
});

describe('summaryLine', () => {
  it('summarises the cycle', () => {
    const report = buildClusterReport({
      cycle: 3,
      startedAt: 0,
      finishedAt: 1_250,
      nodes: [makeResult(), makeResult({ name: 'db1', severity: 'critical' })],
    });
    expect(summaryLine(report)).toBe('Cycle 3: CRITICAL - 2 nodes (1 ok, 0 warning, 1 critical, 0 unknown) in 1.3s');
  });
});
