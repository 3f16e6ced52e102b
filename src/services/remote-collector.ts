/**
 * Remote Collector
 *
 * Batches every probe for a node into one SSH command that prints KEY=VALUE
 * lines, then parses them into a HealthSnapshot. Command builders and
 * parsers are pure so they can be tested without a connection.
 */

import type { NodeConfig } from '../config.js';
import { CollectionError } from '../errors.js';
import { log } from '../logger.js';
import type { HealthSnapshot, Platform } from '../types.js';
import type { CollectOptions, Collector } from './collector.js';
import { shellQuote, sshExec, type SshExecFn } from './ssh.js';

// ---------------------------------------------------------------------------
// Command builders
// ---------------------------------------------------------------------------

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * pgrep -f pattern that does not match the shell running it: "nginx" becomes
 * "[n]ginx", which matches the process but not its own command line.
 */
export function selfExcludingPattern(name: string): string {
  const escaped = escapeRegex(name);
  if (!/^[A-Za-z0-9]/.test(escaped)) return escaped;
  return `[${escaped[0]}]${escaped.slice(1)}`;
}

function unixServiceProbe(name: string, index: number): string {
  const probe = `{ pgrep -x ${shellQuote(name)} || pgrep -f ${shellQuote(selfExcludingPattern(name))}; } >/dev/null 2>&1`;
  return `${probe} && echo "SVC_${index}=1" || echo "SVC_${index}=0"`;
}

function linuxCommand(services: readonly string[]): string {
  return [
    'echo "CPU_COUNT=$(nproc)"',
    `echo "CPU_PCT=$(top -bn1 | grep 'Cpu(s)' | awk '{print 100 - $8}')"`,
    `echo "LOAD=$(cut -d' ' -f1-3 /proc/loadavg)"`,
    `echo "MEM_TOTAL_KB=$(awk '/^MemTotal:/ {print $2}' /proc/meminfo)"`,
    `echo "MEM_AVAIL_KB=$(awk '/^MemAvailable:/ {print $2}' /proc/meminfo)"`,
    `echo "DISK=$(df -B1 / | tail -1 | awk '{print $2" "$3}')"`,
    ...services.map(unixServiceProbe),
  ].join('; ');
}

function darwinCommand(services: readonly string[]): string {
  return [
    'echo "CPU_COUNT=$(sysctl -n hw.ncpu)"',
    `echo "CPU_PCT=$(ps -A -o %cpu | awk '{s+=$1} END {print s}')"`,
    `echo "LOAD=$(sysctl -n vm.loadavg | tr -d '{}')"`,
    'echo "MEM_TOTAL=$(sysctl -n hw.memsize)"',
    'echo "PAGE_SIZE=$(sysctl -n hw.pagesize)"',
    `echo "PAGES_FREE=$(vm_stat | awk '/Pages free/ {gsub(/\\./,"",$3); print $3}')"`,
    `echo "PAGES_INACTIVE=$(vm_stat | awk '/Pages inactive/ {gsub(/\\./,"",$3); print $3}')"`,
    `echo "DISK_KB=$(df -k / | tail -1 | awk '{print $2" "$3}')"`,
    ...services.map(unixServiceProbe),
  ].join('; ');
}

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function windowsCommand(services: readonly string[]): string {
  const script = [
    '$os=Get-CimInstance Win32_OperatingSystem',
    "$d=Get-CimInstance Win32_LogicalDisk -Filter 'DeviceID=''C:'''",
    '$p=Get-CimInstance Win32_Processor',
    "'CPU_COUNT='+($p | Measure-Object -Property NumberOfLogicalProcessors -Sum).Sum",
    "'CPU_PCT='+($p | Measure-Object -Property LoadPercentage -Average).Average",
    "'MEM_TOTAL_KB='+$os.TotalVisibleMemorySize",
    "'MEM_FREE_KB='+$os.FreePhysicalMemory",
    "'DISK='+$d.Size+' '+($d.Size-$d.FreeSpace)",
    ...services.map(
      (name, i) => `'SVC_${i}='+[int][bool](Get-Process -Name ${psQuote(name)} -ErrorAction SilentlyContinue)`,
    ),
  ].join('; ');
  return `powershell -NoProfile -NonInteractive -Command "${script}"`;
}

/** One command that prints every metric for the platform as KEY=VALUE lines. */
export function buildMetricsCommand(platform: Platform, services: readonly string[]): string {
  switch (platform) {
    case 'linux':
      return linuxCommand(services);
    case 'darwin':
      return darwinCommand(services);
    case 'windows':
      return windowsCommand(services);
  }
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export function parseKeyValues(output: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of output.split(/\r?\n/)) {
    const match = /^([A-Z0-9_]+)=(.*)$/.exec(line.trim());
    if (match) vars[match[1]] = match[2].trim();
  }
  return vars;
}

function num(vars: Record<string, string>, key: string): number | undefined {
  const raw = vars[key];
  if (raw === undefined || raw === '') return undefined;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

function required(vars: Record<string, string>, key: string): number {
  const value = num(vars, key);
  if (value === undefined) {
    throw new CollectionError('command', `unparseable output: missing ${key}`);
  }
  return value;
}

/** "total used" → [total, used] */
function pair(vars: Record<string, string>, key: string): [number, number] {
  const parts = (vars[key] ?? '').split(/\s+/).map(Number);
  if (parts.length < 2 || !Number.isFinite(parts[0]) || !Number.isFinite(parts[1])) {
    throw new CollectionError('command', `unparseable output: bad ${key} "${vars[key] ?? ''}"`);
  }
  return [parts[0], parts[1]];
}

function parseLoad(raw: string | undefined): [number, number, number] | undefined {
  if (!raw) return undefined;
  const parts = raw.trim().split(/\s+/).map(Number);
  if (parts.length < 3 || parts.slice(0, 3).some(n => !Number.isFinite(n))) return undefined;
  return [parts[0], parts[1], parts[2]];
}

export interface SnapshotMeta {
  host: string;
  latencyMs: number;
  timestamp: Date;
}

/** Build a snapshot from KEY=VALUE output. Throws on missing memory or disk data. */
export function parseSnapshot(
  platform: Platform,
  vars: Record<string, string>,
  services: readonly string[],
  meta: SnapshotMeta,
): HealthSnapshot {
  const cpuCount = Math.max(num(vars, 'CPU_COUNT') ?? 1, 1);
  let cpuPercent = num(vars, 'CPU_PCT') ?? 0;
  let memoryTotalBytes: number;
  let memoryUsedBytes: number;
  let diskTotalBytes: number;
  let diskUsedBytes: number;
  let loadAverage: [number, number, number] | undefined;

  switch (platform) {
    case 'linux': {
      const total = required(vars, 'MEM_TOTAL_KB');
      const avail = required(vars, 'MEM_AVAIL_KB');
      memoryTotalBytes = total * 1024;
      memoryUsedBytes = (total - avail) * 1024;
      [diskTotalBytes, diskUsedBytes] = pair(vars, 'DISK');
      loadAverage = parseLoad(vars.LOAD);
      break;
    }
    case 'darwin': {
      memoryTotalBytes = required(vars, 'MEM_TOTAL');
      const pageSize = num(vars, 'PAGE_SIZE') ?? 4096;
      const freePages = required(vars, 'PAGES_FREE') + (num(vars, 'PAGES_INACTIVE') ?? 0);
      memoryUsedBytes = Math.max(memoryTotalBytes - freePages * pageSize, 0);
      const [totalKb, usedKb] = pair(vars, 'DISK_KB');
      diskTotalBytes = totalKb * 1024;
      diskUsedBytes = usedKb * 1024;
      loadAverage = parseLoad(vars.LOAD);
      // ps sums per-process percentages of one core
      cpuPercent = cpuPercent / cpuCount;
      break;
    }
    case 'windows': {
      const total = required(vars, 'MEM_TOTAL_KB');
      const free = required(vars, 'MEM_FREE_KB');
      memoryTotalBytes = total * 1024;
      memoryUsedBytes = (total - free) * 1024;
      [diskTotalBytes, diskUsedBytes] = pair(vars, 'DISK');
      break;
    }
  }

  const serviceStates: Record<string, boolean> = {};
  services.forEach((name, i) => {
    const raw = vars[`SVC_${i}`];
    if (raw === '1') serviceStates[name] = true;
    else if (raw === '0') serviceStates[name] = false;
  });

  const snapshot: HealthSnapshot = {
    host: meta.host,
    cpuPercent: Math.min(Math.max(cpuPercent, 0), 100),
    cpuCount,
    memoryTotalBytes,
    memoryUsedBytes,
    diskTotalBytes,
    diskUsedBytes,
    services: serviceStates,
    timestamp: meta.timestamp,
    latencyMs: meta.latencyMs,
  };
  if (loadAverage) snapshot.loadAverage = loadAverage;
  return snapshot;
}

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

export class SshCollector implements Collector {
  readonly kind = 'ssh';

  constructor(private readonly exec: SshExecFn = sshExec) {}

  async collect(node: NodeConfig, options: CollectOptions): Promise<HealthSnapshot> {
    const ssh = node.ssh;
    if (!ssh) throw new CollectionError('config', `node ${node.name} has no SSH settings`, node.name);

    const started = Date.now();
    const command = buildMetricsCommand(node.platform, node.services);
    const result = await this.exec(ssh, command, { timeoutMs: options.timeoutMs, signal: options.signal });

    if (result.code !== 0 && !result.stdout) {
      throw new CollectionError('command', `metrics command exited ${result.code}: ${result.stderr}`, node.name);
    }

    const vars = parseKeyValues(result.stdout);
    log(`[Collector] ${node.name}: ${Object.keys(vars).length} values over SSH`, 'debug');
    try {
      return parseSnapshot(node.platform, vars, node.services, {
        host: ssh.host,
        latencyMs: Date.now() - started,
        timestamp: new Date(),
      });
    } catch (err) {
      if (err instanceof CollectionError) throw new CollectionError(err.kind, err.message, node.name);
      throw err;
    }
  }
}
