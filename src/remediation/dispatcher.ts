/**
 * Remediation Dispatcher
 *
 * Runs the configured action for a breached trigger (memory, disk, load or
 * a stopped service). Actions are a script in scriptsDir or a shell command,
 * run locally or on the node over SSH, with the node context exported as
 * FHM_* environment variables.
 *
 * Tracks history to prevent remediation loops: a per (node, trigger)
 * cooldown, an hourly cap, and at most one run per alert event.
 */

import { exec } from 'child_process';
import { existsSync } from 'fs';
import { isAbsolute, join } from 'path';
import { promisify } from 'util';
import type { AlertEvent } from '../alerts/state-tracker.js';
import { SERVICE_KEY_PREFIX, metricValues } from '../alerts/threshold-evaluator.js';
import type { NodeConfig, RemediationConfig, SshConfig } from '../config.js';
import { expandHome, resolveTriggers } from '../config.js';
import { RemediationDispatchError } from '../errors.js';
import { log } from '../logger.js';
import { shellQuote, sshExec, type ExecResult } from '../services/ssh.js';
import { SEVERITY_RANK, type NodeResult, type Platform, type Severity } from '../types.js';

const execAsync = promisify(exec);

/** Named fields handed to every action */
export interface RemediationContext {
  nodeName: string;
  host: string;
  platform: Platform;
  triggerKey: string;
  severity: Severity;
  memoryPercent?: number;
  diskPercent?: number;
  load1?: number;
  service?: string;
}

export type RemediationStatus = 'success' | 'dry-run' | 'skipped';

export interface RemediationOutcome {
  status: RemediationStatus;
  action?: string;
  message: string;
}

/**
 * Resolves with the outcome of a run (or why it was skipped); rejects with
 * RemediationDispatchError when the action ran and failed.
 */
export interface RemediationDispatcher {
  /** Action configured for an event on `node`, if it should trigger one */
  actionFor(event: AlertEvent, node: NodeConfig): string | undefined;
  dispatch(node: NodeConfig, triggerKey: string, context: RemediationContext, eventId?: string): Promise<RemediationOutcome>;
}

export interface ActionRunner {
  runLocal(command: string, env: Record<string, string>, timeoutMs: number): Promise<ExecResult>;
  runRemote(target: SshConfig, command: string, env: Record<string, string>, timeoutMs: number): Promise<ExecResult>;
}

interface HistoryEntry {
  node: string;
  trigger: string;
  at: number;
  success: boolean;
}

function execFailure(err: unknown): ExecResult | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code !== 'number') return undefined;
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
  return { code, stdout: stdout.trim(), stderr: stderr.trim() };
}

export const shellRunner: ActionRunner = {
  async runLocal(command, env, timeoutMs) {
    try {
      const { stdout, stderr } = await execAsync(command, { env: { ...process.env, ...env }, timeout: timeoutMs });
      return { code: 0, stdout: stdout.trim(), stderr: stderr.trim() };
    } catch (err) {
      const failed = execFailure(err);
      if (failed) return failed;
      if (typeof err === 'object' && err !== null && 'killed' in err && err.killed) {
        throw new Error(`timed out after ${Math.round(timeoutMs / 1000)}s`);
      }
      throw err;
    }
  },

  async runRemote(target, command, env, timeoutMs) {
    const exports = Object.entries(env).map(([k, v]) => `${k}=${shellQuote(v)}`).join(' ');
    return sshExec(target, `env ${exports} sh -c ${shellQuote(command)}`, { timeoutMs });
  },
};

/** Context fields for an event, read from the node's latest result. */
export function buildContext(result: NodeResult, event: AlertEvent): RemediationContext {
  const context: RemediationContext = {
    nodeName: result.name,
    host: result.host,
    platform: result.platform,
    triggerKey: event.key,
    severity: event.severity,
  };
  if (result.snapshot) {
    const values = metricValues(result.snapshot);
    if (values.memory !== undefined) context.memoryPercent = values.memory;
    if (values.disk !== undefined) context.diskPercent = values.disk;
    if (values.load !== undefined) context.load1 = values.load;
  }
  if (event.key.startsWith(SERVICE_KEY_PREFIX)) context.service = event.key.slice(SERVICE_KEY_PREFIX.length);
  return context;
}

export function contextEnv(context: RemediationContext): Record<string, string> {
  const env: Record<string, string> = {
    FHM_NODE_NAME: context.nodeName,
    FHM_NODE_HOST: context.host,
    FHM_NODE_PLATFORM: context.platform,
    FHM_TRIGGER: context.triggerKey,
    FHM_SEVERITY: context.severity,
  };
  if (context.memoryPercent !== undefined) env.FHM_MEMORY_PERCENT = context.memoryPercent.toFixed(1);
  if (context.diskPercent !== undefined) env.FHM_DISK_PERCENT = context.diskPercent.toFixed(1);
  if (context.load1 !== undefined) env.FHM_LOAD_1M = context.load1.toFixed(2);
  if (context.service !== undefined) env.FHM_SERVICE = context.service;
  return env;
}

export class ScriptRemediationDispatcher implements RemediationDispatcher {
  private history: HistoryEntry[] = [];
  /** Alert event id → when it was dispatched; pruned with the history */
  private dispatched = new Map<string, number>();

  constructor(
    private readonly config: RemediationConfig,
    private readonly runner: ActionRunner = shellRunner,
    private readonly now: () => number = Date.now,
  ) {}

  actionFor(event: AlertEvent, node: NodeConfig): string | undefined {
    if (!this.config.enabled) return undefined;
    if (event.kind !== 'new' && event.kind !== 'escalation') return undefined;
    if (SEVERITY_RANK[event.severity] < SEVERITY_RANK[this.config.minSeverity]) return undefined;
    return this.triggerAction(event.key, node);
  }

  private triggerAction(key: string, node: NodeConfig): string | undefined {
    const triggers = resolveTriggers(this.config.triggers, node);
    let action: string | undefined;
    if (key.startsWith(SERVICE_KEY_PREFIX)) action = triggers.services[key.slice(SERVICE_KEY_PREFIX.length)];
    else if (key === 'memory' || key === 'disk' || key === 'load') action = triggers[key];
    // an empty override turns the global action off for this node
    return action || undefined;
  }

  private prune(): void {
    const keepMs = Math.max(60, this.config.cooldownMinutes) * 60_000;
    const cutoff = this.now() - keepMs;
    this.history = this.history.filter(h => h.at > cutoff);
    for (const [id, at] of this.dispatched) {
      if (at <= cutoff) this.dispatched.delete(id);
    }
  }

  private recentCount(minutes: number): number {
    const cutoff = this.now() - minutes * 60_000;
    return this.history.filter(h => h.at > cutoff).length;
  }

  /** Script in scriptsDir if one exists, else the action as a shell command. */
  private resolveCommand(action: string): string {
    if (isAbsolute(action)) return action;
    const script = join(expandHome(this.config.scriptsDir), action);
    return existsSync(script) ? shellQuote(script) : action;
  }

  async dispatch(
    node: NodeConfig,
    triggerKey: string,
    context: RemediationContext,
    eventId?: string,
  ): Promise<RemediationOutcome> {
    const action = this.triggerAction(triggerKey, node);
    if (!action) return { status: 'skipped', message: `no action configured for ${triggerKey}` };

    this.prune();
    if (eventId !== undefined) {
      if (this.dispatched.has(eventId)) {
        return { status: 'skipped', action, message: `event ${eventId} already dispatched` };
      }
      this.dispatched.set(eventId, this.now());
    }

    const recent = this.recentCount(60);
    if (recent >= this.config.maxPerHour) {
      const message = `remediation loop suspected (${recent} actions in 1h), manual intervention required`;
      log(`[Remediation] ${node.name} ${triggerKey}: ${message}`, 'warn');
      return { status: 'skipped', action, message };
    }

    const last = this.history.filter(h => h.node === node.name && h.trigger === triggerKey).pop();
    if (last) {
      const sinceMs = this.now() - last.at;
      if (sinceMs < this.config.cooldownMinutes * 60_000) {
        const message = `cooldown active (${(sinceMs / 60_000).toFixed(1)}m since last run)`;
        log(`[Remediation] ${node.name} ${triggerKey}: ${message}`);
        return { status: 'skipped', action, message };
      }
    }

    const command = this.resolveCommand(action);
    const remote = this.config.runOnNode && node.ssh !== undefined;

    if (this.config.dryRun) {
      log(`[Remediation] [DRY RUN] Would execute ${remote ? 'on node' : 'locally'}: ${command} for ${node.name} ${triggerKey}`);
      return { status: 'dry-run', action, message: `dry run: ${command}` };
    }

    log(`[Remediation] Executing ${command} for ${node.name} ${triggerKey}${remote ? ' on node' : ''}`);
    const env = contextEnv(context);
    const timeoutMs = this.config.actionTimeoutSeconds * 1000;
    const entry: HistoryEntry = { node: node.name, trigger: triggerKey, at: this.now(), success: false };
    this.history.push(entry);

    let result: ExecResult;
    try {
      result = remote && node.ssh
        ? await this.runner.runRemote(node.ssh, command, env, timeoutMs)
        : await this.runner.runLocal(command, env, timeoutMs);
    } catch (err) {
      throw new RemediationDispatchError(node.name, triggerKey, err instanceof Error ? err.message : String(err));
    }

    if (result.code !== 0) {
      throw new RemediationDispatchError(node.name, triggerKey, result.stderr || `exit code ${result.code}`);
    }

    entry.success = true;
    log(`[Remediation] Succeeded: ${node.name} ${triggerKey}`);
    return { status: 'success', action, message: result.stdout || 'ok' };
  }

  /** Recent runs, oldest first */
  getHistory(): Array<Readonly<HistoryEntry>> {
    return this.history.map(h => ({ ...h }));
  }
}
