/**
 * Report Store Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { REPORT_KEY, ReportStore, type ReportCache } from './report-store.js';
import { buildClusterReport } from '../monitor/report.js';
import { setLogLevel } from '../logger.js';

class FakeCache implements ReportCache {
  values = new Map<string, string>();
  ttls = new Map<string, number>();
  down = false;
  disconnected = false;

  async get(key: string): Promise<string | null> {
    if (this.down) throw new Error('Connection is closed.');
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<unknown> {
    if (this.down) throw new Error('Connection is closed.');
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  disconnect(): void {
    this.disconnected = true;
  }
}

const FINISHED = Date.parse('2026-03-01T12:00:02Z');

function makeReport() {
  return buildClusterReport({
    cycle: 4,
    startedAt: FINISHED - 2000,
    finishedAt: FINISHED,
    nodes: [{ name: 'web1', host: 'web1.internal', platform: 'linux', severity: 'ok', metrics: [], annotations: [] }],
  });
}

beforeEach(() => {
  setLogLevel('error');
});

describe('ReportStore', () => {
  it('is disabled without a Redis URL', async () => {
    const store = new ReportStore(undefined, 300);
    expect(store.enabled).toBe(false);
    expect(await store.readLatest()).toBeNull();
  });

  it('writes the report as JSON with a TTL', async () => {
    const cache = new FakeCache();
    const store = new ReportStore(undefined, 300, cache);

    await store.publish(makeReport());

    expect(cache.ttls.get(REPORT_KEY)).toBe(300);
    const stored = JSON.parse(cache.values.get(REPORT_KEY) ?? '{}');
    expect(stored.cycle).toBe(4);
    expect(stored.timestamp).toBe('2026-03-01T12:00:02.000Z');
    expect(stored.nodes[0].name).toBe('web1');
  });

  it('reads the latest report back with its age', async () => {
    const cache = new FakeCache();
    const store = new ReportStore(undefined, 300, cache);
    await store.publish(makeReport());

    const latest = await store.readLatest(FINISHED + 30_000);

    expect(latest?.ageSeconds).toBe(30);
    expect(latest?.timestamp.toISOString()).toBe('2026-03-01T12:00:02.000Z');
    expect(latest?.report.severity).toBe('ok');
  });

  it('returns null for missing or malformed data', async () => {
    const cache = new FakeCache();
    const store = new ReportStore(undefined, 300, cache);

    expect(await store.readLatest()).toBeNull();
    cache.values.set(REPORT_KEY, '[1,2]');
    expect(await store.readLatest()).toBeNull();
    cache.values.set(REPORT_KEY, '{"cycle":1}');
    expect(await store.readLatest()).toBeNull();
  });

  it('fails soft when Redis is down', async () => {
    const cache = new FakeCache();
    cache.down = true;
    const store = new ReportStore(undefined, 300, cache);

    await expect(store.publish(makeReport())).resolves.toBeUndefined();
    expect(await store.readLatest()).toBeNull();
  });

  it('disconnects on close', async () => {
    const cache = new FakeCache();
    const store = new ReportStore(undefined, 300, cache);

    await store.close();

    expect(cache.disconnected).toBe(true);
    expect(store.enabled).toBe(false);
  });
});
