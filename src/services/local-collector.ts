/**
 * Local Collector
 *
 * Reads the host this process runs on: CPU from two os.cpus() samples,
 * memory and load from os, disk from statfs on the system root, services
 * from pgrep (tasklist on Windows).
 */

import { execFile } from 'child_process';
import { statfs } from 'fs/promises';
import { cpus, freemem, hostname, loadavg, totalmem } from 'os';
import { promisify } from 'util';
import type { NodeConfig } from '../config.js';
import { CollectionError, toCollectionError } from '../errors.js';
import { log } from '../logger.js';
import type { HealthSnapshot } from '../types.js';
import { sleep } from '../monitor/timing.js';
import type { CollectOptions, Collector } from './collector.js';
import { selfExcludingPattern } from './remote-collector.js';

const execFileAsync = promisify(execFile);

const IS_WINDOWS = process.platform === 'win32';

interface CpuTimes {
  idle: number;
  total: number;
}

function cpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

/** Busy percentage between two samples. */
export function cpuPercentBetween(start: CpuTimes, end: CpuTimes): number {
  const total = end.total - start.total;
  if (total <= 0) return 0;
  const busy = total - (end.idle - start.idle);
  return Math.min(Math.max((busy / total) * 100, 0), 100);
}

function exitCode(err: unknown): unknown {
  return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
}

export class LocalCollector implements Collector {
  readonly kind = 'local';

  constructor(private readonly sampleMs = 500) {}

  async collect(node: NodeConfig, options: CollectOptions): Promise<HealthSnapshot> {
    const started = Date.now();
    try {
      const [cpuPercent, disk, services] = await Promise.all([
        this.sampleCpu(options.signal),
        this.diskUsage(),
        this.serviceStates(node.services, options),
      ]);

      const total = totalmem();
      const snapshot: HealthSnapshot = {
        host: hostname(),
        cpuPercent,
        cpuCount: Math.max(cpus().length, 1),
        memoryTotalBytes: total,
        memoryUsedBytes: total - freemem(),
        diskTotalBytes: disk.total,
        diskUsedBytes: disk.used,
        services,
        timestamp: new Date(),
        latencyMs: Date.now() - started,
      };
      if (!IS_WINDOWS) {
        const [one, five, fifteen] = loadavg();
        snapshot.loadAverage = [one, five, fifteen];
      }
      return snapshot;
    } catch (err) {
      throw toCollectionError(err, node.name);
    }
  }

  private async sampleCpu(signal?: AbortSignal): Promise<number> {
    const start = cpuTimes();
    await sleep(this.sampleMs, signal);
    return cpuPercentBetween(start, cpuTimes());
  }

  private async diskUsage(): Promise<{ total: number; used: number }> {
    const stats = await statfs(IS_WINDOWS ? 'C:\\' : '/');
    return {
      total: stats.blocks * stats.bsize,
      used: (stats.blocks - stats.bfree) * stats.bsize,
    };
  }

  /** A probe that cannot run leaves the service unobserved. */
  private async serviceStates(names: readonly string[], options: CollectOptions): Promise<Record<string, boolean>> {
    const states: Record<string, boolean> = {};
    await Promise.all(
      names.map(async (name) => {
        const running = await this.isRunning(name, options);
        if (running !== undefined) states[name] = running;
      }),
    );
    return states;
  }

  private async isRunning(name: string, options: CollectOptions): Promise<boolean | undefined> {
    const execOptions = { timeout: options.timeoutMs, signal: options.signal };
    try {
      if (IS_WINDOWS) {
        const { stdout } = await execFileAsync('tasklist', ['/FI', `IMAGENAME eq ${name}*`, '/NH'], execOptions);
        return stdout.toLowerCase().includes(name.toLowerCase());
      }
      await execFileAsync('pgrep', ['-f', selfExcludingPattern(name)], execOptions);
      return true;
    } catch (err) {
      // pgrep exits 1 when nothing matched
      if (exitCode(err) === 1) return false;
      if (options.signal?.aborted) throw new CollectionError('cancelled', 'local check cancelled');
      log(`[Collector] Could not probe service ${name}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return undefined;
    }
  }
}
