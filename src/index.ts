#!/usr/bin/env node
/**
 * Fleet Health Monitor CLI
 *
 * Usage:
 *   fhm check [--config fhm.json] [--json]     # Single cycle, exit code by severity
 *   fhm check --watch [--interval 30]          # Continuous monitoring
 *   fhm quick <host> --user admin              # Ad-hoc SSH check, no config needed
 *   fhm local                                  # Check this machine
 *   fhm init [--output fhm.json]               # Write a starter config
 *   fhm report                                 # Latest report from Redis
 *   fhm serve [--port 8080] [--host 127.0.0.1] # Continuous monitoring plus the HTTP API
 *
 * Exit codes: 0 ok, 2 warning, 1 critical/unknown, 78 configuration error.
 */

import { existsSync, writeFileSync } from 'fs';
import { hostname } from 'os';
import { Command } from 'commander';
import { closeServer, createApiServer, listen } from './api/server.js';
import { exampleConfig, expandHome, loadConfig, parseConfig, type Config, type NodeConfig } from './config.js';
import { ConfigValidationError } from './errors.js';
import { log, setLogLevel } from './logger.js';
import { HealthMonitor } from './monitor/orchestrator.js';
import { reportToJSON } from './monitor/report.js';
import { createNotifiers } from './notifiers/index.js';
import { ScriptRemediationDispatcher } from './remediation/dispatcher.js';
import { EventPublisher } from './services/events.js';
import { ReportStore } from './services/report-store.js';
import { EXIT_CONFIG, exitCodeFor, renderReport, renderResults } from './cli/format.js';
import { PLATFORMS, type ClusterReport, type NodeResult, type Platform } from './types.js';

const VERSION = '1.0.0';

interface CheckOptions {
  config?: string;
  json?: boolean;
  watch?: boolean;
  interval?: string;
}

interface QuickOptions {
  user: string;
  port: string;
  key?: string;
  password?: string;
  platform: string;
  services?: string;
  timeout: string;
  json?: boolean;
}

interface LocalOptions {
  services?: string;
  json?: boolean;
}

interface InitOptions {
  output: string;
  force?: boolean;
}

interface ReportOptions {
  config?: string;
  json?: boolean;
}

interface ServeOptions {
  config?: string;
  port: string;
  host: string;
}

/** Thrown for bad command-line arguments; exits 1 with the message. */
class UsageError extends Error {}

function positiveNumber(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new UsageError(`${flag} must be a positive number`);
  return n;
}

function splitList(value: string | undefined): string[] {
  return value ? value.split(',').map(s => s.trim()).filter(Boolean) : [];
}

function parsePlatform(value: string): Platform {
  const platform = PLATFORMS.find(p => p === value);
  if (!platform) throw new UsageError(`--platform must be one of ${PLATFORMS.join(', ')}`);
  return platform;
}

function currentPlatform(): Platform {
  if (process.platform === 'win32') return 'windows';
  if (process.platform === 'darwin') return 'darwin';
  return 'linux';
}

/** Aborts on SIGINT/SIGTERM. */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = (sig: string) => {
    if (controller.signal.aborted) return;
    log(`[CLI] ${sig} received, shutting down...`);
    controller.abort();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
  return controller.signal;
}

function applyLogLevel(config: Config, json: boolean | undefined): void {
  // keep stdout clean for JSON output
  setLogLevel(json && config.logLevel !== 'error' ? 'warn' : config.logLevel);
}

function printReport(report: ClusterReport, json: boolean | undefined): void {
  console.log(json ? JSON.stringify(reportToJSON(report), null, 2) : renderReport(report));
}

function printResult(result: NodeResult, json: boolean | undefined): void {
  if (!json) {
    console.log(renderResults([result]));
    return;
  }
  const { snapshot, ...rest } = result;
  console.log(JSON.stringify({
    ...rest,
    error: rest.error ?? null,
    snapshot: snapshot ? { ...snapshot, timestamp: snapshot.timestamp.toISOString() } : null,
  }, null, 2));
}

/** Monitor for ad-hoc checks; notifiers and stores stay off. */
function adhocMonitor(nodeTimeoutSeconds: number): HealthMonitor {
  const config = parseConfig({ nodes: {}, nodeTimeoutSeconds });
  setLogLevel(config.logLevel);
  return new HealthMonitor(config);
}

// ── Commands ────────────────────────────────────────────────────────────────

interface Wired {
  monitor: HealthMonitor;
  close(): Promise<void>;
}

/** Monitor with every configured notifier, store and remediation attached. */
function wireMonitor(config: Config): Wired {
  const enabled = config.nodes.filter(n => n.enabled);
  log(`[CLI] Fleet Health Monitor ${VERSION}`);
  log(`[CLI] Nodes: ${enabled.map(n => n.name).join(', ') || '(none)'}`);

  const reportStore = config.redisUrl ? new ReportStore(config.redisUrl, config.reportTtlSeconds) : null;
  const events = config.postgresUrl ? new EventPublisher(config.postgresUrl) : null;
  const monitor = new HealthMonitor(config, {
    notifiers: createNotifiers(config.notifiers),
    remediation: config.remediation.enabled ? new ScriptRemediationDispatcher(config.remediation) : null,
    reportStore,
    events,
  });
  return {
    monitor,
    async close() {
      await reportStore?.close();
      await events?.close();
    },
  };
}

async function check(options: CheckOptions): Promise<number> {
  const config = loadConfig(options.config);
  if (options.interval !== undefined) {
    config.checkIntervalSeconds = positiveNumber(options.interval, '--interval');
  }
  applyLogLevel(config, options.json);

  const { monitor, close } = wireMonitor(config);
  const signal = shutdownSignal();

  try {
    if (options.watch) {
      await monitor.watch(signal, report => printReport(report, options.json));
      return 0;
    }
    const report = await monitor.runCycle(undefined, { signal });
    await monitor.drain();
    printReport(report, options.json);
    return exitCodeFor(report.severity);
  } finally {
    await close();
  }
}

async function serve(options: ServeOptions): Promise<number> {
  const port = positiveNumber(options.port, '--port');
  const config = loadConfig(options.config);
  applyLogLevel(config, false);

  const { monitor, close } = wireMonitor(config);
  const signal = shutdownSignal();
  const server = await listen(createApiServer(monitor, { version: VERSION }), port, options.host);

  try {
    await monitor.watch(signal);
    return 0;
  } finally {
    await closeServer(server);
    await close();
  }
}

async function quick(host: string, options: QuickOptions): Promise<number> {
  const timeoutSeconds = positiveNumber(options.timeout, '--timeout');
  const port = positiveNumber(options.port, '--port');
  const node: NodeConfig = {
    name: host,
    platform: parsePlatform(options.platform),
    enabled: true,
    local: false,
    ssh: {
      host,
      username: options.user,
      port,
      keyFile: options.key,
      password: options.password,
      timeoutSeconds: Math.min(timeoutSeconds, 10),
    },
    services: splitList(options.services),
    tags: [],
  };

  const monitor = adhocMonitor(timeoutSeconds);
  const result = await monitor.quickCheck(node, { signal: shutdownSignal() });
  printResult(result, options.json);
  return exitCodeFor(result.severity);
}

async function local(options: LocalOptions): Promise<number> {
  const node: NodeConfig = {
    name: hostname(),
    platform: currentPlatform(),
    enabled: true,
    local: true,
    services: splitList(options.services),
    tags: [],
  };

  const monitor = adhocMonitor(30);
  const result = await monitor.quickCheck(node, { signal: shutdownSignal() });
  printResult(result, options.json);
  return exitCodeFor(result.severity);
}

function init(options: InitOptions): number {
  const file = expandHome(options.output);
  if (existsSync(file) && !options.force) {
    throw new UsageError(`${file} already exists (use --force to overwrite)`);
  }
  writeFileSync(file, `${JSON.stringify(exampleConfig(), null, 2)}\n`);
  console.log(`Wrote starter configuration to ${file}`);
  console.log('Edit the nodes section, then run: fhm check');
  return 0;
}

async function report(options: ReportOptions): Promise<number> {
  const config = loadConfig(options.config);
  applyLogLevel(config, options.json);
  if (!config.redisUrl) throw new UsageError('redisUrl is not configured; no report store to read from');

  const store = new ReportStore(config.redisUrl, config.reportTtlSeconds);
  try {
    const latest = await store.readLatest();
    if (!latest) {
      console.error('No report stored (is `fhm check --watch` running?)');
      return 1;
    }
    if (options.json) {
      console.log(JSON.stringify(latest.report, null, 2));
    } else {
      console.log(`Latest report from ${latest.timestamp.toISOString()} (${Math.round(latest.ageSeconds)}s ago)`);
      console.log(JSON.stringify(latest.report, null, 2));
    }
    return 0;
  } finally {
    await store.close();
  }
}

// ── Entry point ─────────────────────────────────────────────────────────────

function handleFailure(err: unknown): void {
  if (err instanceof ConfigValidationError) {
    console.error(err.message);
    process.exitCode = EXIT_CONFIG;
    return;
  }
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    process.exitCode = 1;
    return;
  }
  console.error('Fatal error:', err);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('fhm')
  .description('Fleet health monitor: threshold checks, alerts and remediation across local and SSH nodes')
  .version(VERSION);

program
  .command('check')
  .description('Run a check cycle over every configured node')
  .option('-c, --config <path>', 'Configuration file (default: $FHM_CONFIG, ./fhm.json, ~/.config/fhm/config.json)')
  .option('--json', 'Print the report as JSON')
  .option('-w, --watch', 'Keep checking every checkIntervalSeconds until interrupted')
  .option('-i, --interval <seconds>', 'Override checkIntervalSeconds')
  .action(async (options: CheckOptions) => {
    process.exitCode = await check(options);
  });

program
  .command('quick <host>')
  .description('Check a single host over SSH without a config file')
  .requiredOption('-u, --user <name>', 'SSH username')
  .option('-p, --port <port>', 'SSH port', '22')
  .option('-k, --key <path>', 'Private key file')
  .option('--password <password>', 'SSH password')
  .option('--platform <platform>', 'linux, darwin or windows', 'linux')
  .option('-s, --services <list>', 'Comma-separated services to check')
  .option('-t, --timeout <seconds>', 'Give up after this many seconds', '30')
  .option('--json', 'Print the result as JSON')
  .action(async (host: string, options: QuickOptions) => {
    process.exitCode = await quick(host, options);
  });

program
  .command('local')
  .description('Check the machine this runs on')
  .option('-s, --services <list>', 'Comma-separated services to check')
  .option('--json', 'Print the result as JSON')
  .action(async (options: LocalOptions) => {
    process.exitCode = await local(options);
  });

program
  .command('init')
  .description('Write a starter configuration file')
  .option('-o, --output <path>', 'Where to write it', 'fhm.json')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: InitOptions) => {
    process.exitCode = init(options);
  });

program
  .command('report')
  .description('Show the latest report published by a running monitor')
  .option('-c, --config <path>', 'Configuration file')
  .option('--json', 'Print the stored report only')
  .action(async (options: ReportOptions) => {
    process.exitCode = await report(options);
  });

program
  .command('serve')
  .description('Monitor continuously and serve reports over HTTP')
  .option('-c, --config <path>', 'Configuration file')
  .option('-p, --port <port>', 'Port to listen on', '8080')
  .option('-H, --host <address>', 'Address to bind', '127.0.0.1')
  .action(async (options: ServeOptions) => {
    process.exitCode = await serve(options);
  });

program.parseAsync(process.argv).catch(handleFailure);
