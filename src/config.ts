/**
 * Health monitor configuration.
 *
 * Loaded once per process from a JSON file. Scalar settings and notifier
 * credentials can be overridden via environment variables.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { ConfigValidationError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import {
  PLATFORMS,
  THRESHOLD_METRICS,
  isSeverity,
  type Bound,
  type Platform,
  type Severity,
  type ThresholdMetric,
  type Thresholds,
} from './types.js';

export interface SshConfig {
  host: string;
  username: string;
  port: number;
  /** Private key path; falls back to password, then SSH agent */
  keyFile?: string;
  password?: string;
  timeoutSeconds: number;
}

export interface NodeConfig {
  /** Unique within a run */
  name: string;
  platform: Platform;
  enabled: boolean;
  /** Monitor the host this process runs on */
  local: boolean;
  ssh?: SshConfig;
  services: string[];
  /** Per-metric overrides of the global thresholds */
  thresholds?: Partial<Thresholds>;
  /** Trigger actions merged over remediation.triggers; "" turns one off */
  remediation?: { triggers: RemediationTriggers };
  tags: string[];
}

export interface TelegramConfig {
  enabled: boolean;
  botToken: string;
  chatId: string;
}

export interface SlackConfig {
  enabled: boolean;
  webhookUrl: string;
  channel?: string;
}

export interface WebhookConfig {
  enabled: boolean;
  url: string;
  method: string;
  headers: Record<string, string>;
  username?: string;
  password?: string;
}

export interface NotifiersConfig {
  telegram?: TelegramConfig;
  slack?: SlackConfig;
  webhook?: WebhookConfig;
}

export interface RemediationTriggers {
  memory?: string;
  disk?: string;
  load?: string;
  /** Service name → action */
  services: Record<string, string>;
}

export interface RemediationConfig {
  enabled: boolean;
  /** Log actions instead of running them */
  dryRun: boolean;
  /** Relative actions are looked up here first */
  scriptsDir: string;
  /** Lowest severity that triggers an action */
  minSeverity: Severity;
  /** Run actions on the node over SSH instead of locally */
  runOnNode: boolean;
  actionTimeoutSeconds: number;
  cooldownMinutes: number;
  maxPerHour: number;
  triggers: RemediationTriggers;
}

export interface Config {
  nodes: NodeConfig[];
  thresholds: Thresholds;

  checkIntervalSeconds: number;
  /** Max nodes checked at once; defaults to min(node count, 10) */
  maxConcurrency?: number;
  nodeTimeoutSeconds: number;
  /** Unfinished nodes are reported unknown after this */
  cycleTimeoutSeconds?: number;
  /** How long in-flight checks may unwind after cancellation */
  cancelGraceSeconds: number;
  /** Minimum time between reminders for the same ongoing alert */
  alertCooldownMinutes: number;

  logLevel: LogLevel;
  notifiers: NotifiersConfig;
  remediation: RemediationConfig;

  /** Latest report is published here for dashboards */
  redisUrl?: string;
  reportTtlSeconds: number;
  /** Alert/remediation event log */
  postgresUrl?: string;
}

export const DEFAULT_THRESHOLDS: Thresholds = {
  memory: { warning: 80, critical: 90 },
  disk: { warning: 80, critical: 90 },
  // 1-minute load per core
  load: { warning: 4, critical: 8 },
};

export const MAX_DEFAULT_CONCURRENCY = 10;

export const CONFIG_SEARCH_PATHS = ['fhm.json', 'config.json', '~/.config/fhm/config.json'];

type Env = Record<string, string | undefined>;
type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function int(val: string | undefined, fallback: number): number {
  return val ? parseInt(val, 10) : fallback;
}

function float(val: string | undefined, fallback: number): number {
  return val ? parseFloat(val) : fallback;
}

/**
 * Typed field access over an untrusted JSON object. Problems are collected
 * rather than thrown so that one load reports every issue at once.
 */
class FieldReader {
  constructor(
    private readonly raw: Raw,
    private readonly path: string,
    private readonly issues: string[],
  ) {}

  private where(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  has(key: string): boolean {
    return this.raw[key] !== undefined;
  }

  string(key: string): string | undefined {
    const v = this.raw[key];
    if (v === undefined) return undefined;
    if (typeof v === 'number') return String(v);
    if (typeof v !== 'string') {
      this.issues.push(`${this.where(key)} must be a string`);
      return undefined;
    }
    return v;
  }

  number(key: string, fallback: number): number {
    const v = this.raw[key];
    if (v === undefined) return fallback;
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      this.issues.push(`${this.where(key)} must be a number`);
      return fallback;
    }
    return v;
  }

  optionalNumber(key: string): number | undefined {
    return this.has(key) ? this.number(key, 0) : undefined;
  }

  boolean(key: string, fallback: boolean): boolean {
    const v = this.raw[key];
    if (v === undefined) return fallback;
    if (typeof v !== 'boolean') {
      this.issues.push(`${this.where(key)} must be true or false`);
      return fallback;
    }
    return v;
  }

  stringList(key: string): string[] {
    const v = this.raw[key];
    if (v === undefined) return [];
    if (!Array.isArray(v) || v.some(item => typeof item !== 'string')) {
      this.issues.push(`${this.where(key)} must be a list of strings`);
      return [];
    }
    return v.filter((item): item is string => typeof item === 'string');
  }

  stringMap(key: string): Record<string, string> {
    const v = this.raw[key];
    if (v === undefined) return {};
    const out: Record<string, string> = {};
    if (!isRecord(v)) {
      this.issues.push(`${this.where(key)} must be an object`);
      return out;
    }
    for (const [k, item] of Object.entries(v)) {
      if (typeof item === 'string') out[k] = item;
      else this.issues.push(`${this.where(key)}.${k} must be a string`);
    }
    return out;
  }

  child(key: string): FieldReader | undefined {
    const v = this.raw[key];
    if (v === undefined) return undefined;
    if (!isRecord(v)) {
      this.issues.push(`${this.where(key)} must be an object`);
      return undefined;
    }
    return new FieldReader(v, this.where(key), this.issues);
  }

  entries(): Array<[string, unknown]> {
    return Object.entries(this.raw);
  }

  nested(key: string, value: unknown): FieldReader | undefined {
    if (!isRecord(value)) {
      this.issues.push(`${this.where(key)} must be an object`);
      return undefined;
    }
    return new FieldReader(value, this.where(key), this.issues);
  }
}

function readBounds(reader: FieldReader | undefined, base?: Thresholds): Partial<Thresholds> {
  const out: Partial<Thresholds> = {};
  if (!reader) return out;
  for (const metric of THRESHOLD_METRICS) {
    const b = reader.child(metric);
    if (!b) continue;
    const fallback = base?.[metric] ?? DEFAULT_THRESHOLDS[metric];
    out[metric] = {
      warning: b.number('warning', fallback.warning),
      critical: b.number('critical', fallback.critical),
    };
  }
  return out;
}

function checkBounds(label: string, thresholds: Thresholds, issues: string[]): void {
  for (const metric of THRESHOLD_METRICS) {
    const { warning, critical } = thresholds[metric];
    if (warning >= critical) {
      issues.push(`${label} ${metric}: warning (${warning}) must be below critical (${critical})`);
    }
    if (warning < 0) {
      issues.push(`${label} ${metric}: warning must not be negative`);
    }
  }
}

/** Global thresholds with a node's per-metric overrides applied. */
export function resolveThresholds(global: Thresholds, node: Pick<NodeConfig, 'thresholds'>): Thresholds {
  return {
    memory: node.thresholds?.memory ?? global.memory,
    disk: node.thresholds?.disk ?? global.disk,
    load: node.thresholds?.load ?? global.load,
  };
}

/** Global remediation triggers with a node's overrides merged over them. */
export function resolveTriggers(global: RemediationTriggers, node: Pick<NodeConfig, 'remediation'>): RemediationTriggers {
  const own = node.remediation?.triggers;
  if (!own) return global;
  return {
    memory: own.memory ?? global.memory,
    disk: own.disk ?? global.disk,
    load: own.load ?? global.load,
    services: { ...global.services, ...own.services },
  };
}

/** Concurrency for a cycle: configured value, else proportional to node count but capped. */
export function resolveConcurrency(nodeCount: number, configured?: number): number {
  if (configured !== undefined) return Math.max(1, Math.floor(configured));
  return Math.max(1, Math.min(nodeCount, MAX_DEFAULT_CONCURRENCY));
}

function readNode(name: string, reader: FieldReader, global: Thresholds, issues: string[]): NodeConfig {
  const platformRaw = reader.string('platform') ?? 'linux';
  const platform = PLATFORMS.find(p => p === platformRaw);
  if (!platform) issues.push(`nodes.${name}.platform must be one of ${PLATFORMS.join(', ')}`);

  const local = reader.boolean('local', false);
  let ssh: SshConfig | undefined;
  const sshReader = reader.child('ssh');
  if (sshReader) {
    const host = sshReader.string('host');
    const username = sshReader.string('username');
    if (!host) issues.push(`nodes.${name}.ssh.host is required`);
    if (!username) issues.push(`nodes.${name}.ssh.username is required`);
    const port = sshReader.number('port', 22);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      issues.push(`nodes.${name}.ssh.port must be between 1 and 65535`);
    }
    ssh = {
      host: host ?? '',
      username: username ?? '',
      port,
      keyFile: sshReader.string('keyFile'),
      password: sshReader.string('password'),
      timeoutSeconds: sshReader.number('timeoutSeconds', 10),
    };
  }

  if (local && ssh) issues.push(`nodes.${name}: set either local or ssh, not both`);
  if (!local && !ssh) issues.push(`nodes.${name}: no connection (set local: true or provide ssh)`);

  const overrides = readBounds(reader.child('thresholds'), global);
  const triggers = reader.child('remediation')?.child('triggers');
  const node: NodeConfig = {
    name,
    platform: platform ?? 'linux',
    enabled: reader.boolean('enabled', true),
    local,
    ssh,
    services: reader.stringList('services'),
    thresholds: Object.keys(overrides).length > 0 ? overrides : undefined,
    remediation: triggers ? { triggers: readTriggers(triggers) } : undefined,
    tags: reader.stringList('tags'),
  };
  checkBounds(`nodes.${name} thresholds`, resolveThresholds(global, node), issues);
  return node;
}

function readNotifiers(reader: FieldReader | undefined, env: Env, issues: string[]): NotifiersConfig {
  const out: NotifiersConfig = {};

  const tg = reader?.child('telegram');
  const botToken = env.TELEGRAM_BOT_TOKEN ?? tg?.string('botToken');
  const chatId = env.TELEGRAM_CHAT_ID ?? tg?.string('chatId');
  if (tg || (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID)) {
    const enabled = tg?.boolean('enabled', true) ?? true;
    if (enabled && (!botToken || !chatId)) issues.push('notifiers.telegram requires botToken and chatId');
    out.telegram = { enabled, botToken: botToken ?? '', chatId: chatId ?? '' };
  }

  const slack = reader?.child('slack');
  const slackUrl = env.SLACK_WEBHOOK_URL ?? slack?.string('webhookUrl');
  if (slack || env.SLACK_WEBHOOK_URL) {
    const enabled = slack?.boolean('enabled', true) ?? true;
    if (enabled && !slackUrl) issues.push('notifiers.slack requires webhookUrl');
    out.slack = { enabled, webhookUrl: slackUrl ?? '', channel: slack?.string('channel') };
  }

  const hook = reader?.child('webhook');
  const hookUrl = env.WEBHOOK_URL ?? hook?.string('url');
  if (hook || env.WEBHOOK_URL) {
    const enabled = hook?.boolean('enabled', true) ?? true;
    if (enabled && !hookUrl) issues.push('notifiers.webhook requires url');
    out.webhook = {
      enabled,
      url: hookUrl ?? '',
      method: (hook?.string('method') ?? 'POST').toUpperCase(),
      headers: hook?.stringMap('headers') ?? {},
      username: hook?.string('username'),
      password: hook?.string('password'),
    };
  }

  return out;
}

function readTriggers(reader: FieldReader | undefined): RemediationTriggers {
  return {
    memory: reader?.string('memory'),
    disk: reader?.string('disk'),
    load: reader?.string('load'),
    services: reader?.stringMap('services') ?? {},
  };
}

function readRemediation(reader: FieldReader | undefined, issues: string[]): RemediationConfig {
  const minSeverityRaw = reader?.string('minSeverity') ?? 'critical';
  let minSeverity: Severity = 'critical';
  if (isSeverity(minSeverityRaw) && minSeverityRaw !== 'ok') {
    minSeverity = minSeverityRaw;
  } else {
    issues.push('remediation.minSeverity must be warning, critical or unknown');
  }

  const config: RemediationConfig = {
    enabled: reader?.boolean('enabled', false) ?? false,
    dryRun: reader?.boolean('dryRun', false) ?? false,
    scriptsDir: reader?.string('scriptsDir') ?? './remediation',
    minSeverity,
    runOnNode: reader?.boolean('runOnNode', false) ?? false,
    actionTimeoutSeconds: reader?.number('actionTimeoutSeconds', 60) ?? 60,
    cooldownMinutes: reader?.number('cooldownMinutes', 10) ?? 10,
    maxPerHour: reader?.number('maxPerHour', 6) ?? 6,
    triggers: readTriggers(reader?.child('triggers')),
  };
  if (config.maxPerHour < 1) issues.push('remediation.maxPerHour must be at least 1');
  if (config.cooldownMinutes < 0) issues.push('remediation.cooldownMinutes must not be negative');
  return config;
}

/**
 * Build a Config from parsed JSON, applying environment overrides.
 * Throws ConfigValidationError listing every problem found.
 */
export function parseConfig(raw: unknown, env: Env = process.env): Config {
  const issues: string[] = [];
  if (!isRecord(raw)) throw new ConfigValidationError(['configuration root must be an object']);
  const root = new FieldReader(raw, '', issues);

  const globalOverrides = readBounds(root.child('thresholds'));
  const thresholds: Thresholds = { ...DEFAULT_THRESHOLDS, ...globalOverrides };
  checkBounds('thresholds', thresholds, issues);

  const nodes: NodeConfig[] = [];
  const nodesReader = root.child('nodes');
  if (!nodesReader) {
    issues.push('nodes is required (map of node name to node settings)');
  } else {
    for (const [name, value] of nodesReader.entries()) {
      if (!name.trim()) {
        issues.push('node names must not be empty');
        continue;
      }
      const reader = nodesReader.nested(name, value);
      if (reader) nodes.push(readNode(name, reader, thresholds, issues));
    }
  }

  const logLevelRaw = (env.LOG_LEVEL ?? root.string('logLevel') ?? 'info').toLowerCase();
  let logLevel: LogLevel = 'info';
  if (isLogLevel(logLevelRaw)) {
    logLevel = logLevelRaw;
  } else {
    issues.push('logLevel must be one of debug, info, warn, error');
  }

  const config: Config = {
    nodes,
    thresholds,
    checkIntervalSeconds: int(env.CHECK_INTERVAL, root.number('checkIntervalSeconds', 60)),
    maxConcurrency: env.MAX_CONCURRENCY ? int(env.MAX_CONCURRENCY, 1) : root.optionalNumber('maxConcurrency'),
    nodeTimeoutSeconds: float(env.NODE_TIMEOUT, root.number('nodeTimeoutSeconds', 30)),
    cycleTimeoutSeconds: root.optionalNumber('cycleTimeoutSeconds'),
    cancelGraceSeconds: root.number('cancelGraceSeconds', 5),
    alertCooldownMinutes: float(env.ALERT_COOLDOWN_MINUTES, root.number('alertCooldownMinutes', 15)),
    logLevel,
    notifiers: readNotifiers(root.child('notifiers'), env, issues),
    remediation: readRemediation(root.child('remediation'), issues),
    redisUrl: env.REDIS_URL ?? root.string('redisUrl'),
    reportTtlSeconds: root.number('reportTtlSeconds', 3600),
    postgresUrl: env.POSTGRES_URL ?? root.string('postgresUrl'),
  };

  const positive: Array<[string, number | undefined]> = [
    ['checkIntervalSeconds', config.checkIntervalSeconds],
    ['maxConcurrency', config.maxConcurrency],
    ['nodeTimeoutSeconds', config.nodeTimeoutSeconds],
    ['cycleTimeoutSeconds', config.cycleTimeoutSeconds],
  ];
  for (const [key, value] of positive) {
    if (value !== undefined && !(value > 0)) issues.push(`${key} must be a positive number`);
  }
  if (!(config.cancelGraceSeconds >= 0)) issues.push('cancelGraceSeconds must not be negative');
  if (!(config.alertCooldownMinutes >= 0)) issues.push('alertCooldownMinutes must not be negative');

  if (issues.length > 0) throw new ConfigValidationError(issues);

  for (const node of nodes) Object.freeze(node);
  return config;
}

export function expandHome(path: string): string {
  return path.startsWith('~/') ? resolve(homedir(), path.slice(2)) : resolve(path);
}

/** First existing config file: $FHM_CONFIG, then the search paths. */
export function findConfigPath(env: Env = process.env): string | undefined {
  if (env.FHM_CONFIG) return expandHome(env.FHM_CONFIG);
  return CONFIG_SEARCH_PATHS.map(expandHome).find(p => existsSync(p));
}

export function loadConfig(path?: string, env: Env = process.env): Config {
  const file = path ? expandHome(path) : findConfigPath(env);
  if (!file) {
    throw new ConfigValidationError([
      `No configuration file found (looked for ${CONFIG_SEARCH_PATHS.join(', ')}); create one with: fhm init`,
    ]);
  }
  if (!existsSync(file)) throw new ConfigValidationError([`Config file not found: ${file}`]);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigValidationError([`${file}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseConfig(raw, env);
}

/** Starter configuration written by `fhm init`. */
export function exampleConfig(): Record<string, unknown> {
  const bound = (b: Bound) => ({ warning: b.warning, critical: b.critical });
  const thresholds: Record<ThresholdMetric, { warning: number; critical: number }> = {
    memory: bound(DEFAULT_THRESHOLDS.memory),
    disk: bound(DEFAULT_THRESHOLDS.disk),
    load: bound(DEFAULT_THRESHOLDS.load),
  };
  return {
    nodes: {
      'web-server-1': {
        platform: 'linux',
        ssh: { username: 'admin', host: '192.168.1.10' },
        services: ['nginx', 'docker'],
        tags: ['production', 'web'],
      },
      'db-server-1': {
        platform: 'linux',
        ssh: { username: 'admin', host: '192.168.1.20', keyFile: '~/.ssh/id_ed25519' },
        services: ['postgres'],
        thresholds: { memory: { warning: 85, critical: 90 } },
        remediation: { triggers: { memory: '', services: { postgres: 'sudo systemctl restart postgresql' } } },
        tags: ['production', 'database'],
      },
      'mac-workstation': {
        platform: 'darwin',
        ssh: { username: 'user', host: '192.168.1.30' },
        services: ['ollama'],
      },
      localhost: {
        platform: 'linux',
        local: true,
        services: ['docker'],
      },
    },
    thresholds,
    checkIntervalSeconds: 60,
    nodeTimeoutSeconds: 30,
    alertCooldownMinutes: 15,
    notifiers: {
      webhook: { enabled: false, url: 'https://example.invalid/hooks/health' },
    },
    remediation: {
      enabled: false,
      scriptsDir: './remediation',
      triggers: {
        memory: 'cleanup-memory.sh',
        disk: 'cleanup-disk.sh',
        services: { nginx: 'sudo systemctl restart nginx' },
      },
    },
  };
}
