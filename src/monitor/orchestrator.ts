/**
 * Health Monitor
 *
 * Drives check cycles across the fleet:
 *   collect (bounded concurrency, per-node timeout)
 *   → evaluate thresholds
 *   → fold into alert state (one writer at a time)
 *   → queue notifications / remediation on dispatch workers
 *   → publish the ClusterReport.
 *
 * All mutable state (alert states, latest report, pending annotations)
 * belongs to the instance, so independent monitors can coexist.
 */

import { Mutex, Semaphore } from 'async-mutex';
import { AlertStateTracker, type AlertEvent, type AlertState } from '../alerts/state-tracker.js';
import { evaluate } from '../alerts/threshold-evaluator.js';
import { resolveConcurrency, resolveThresholds, type Config, type NodeConfig } from '../config.js';
import { CollectionError, RemediationDispatchError, toCollectionError } from '../errors.js';
import { log } from '../logger.js';
import { alertMessage } from '../notifiers/format.js';
import type { AlertNotice, Notifier } from '../notifiers/types.js';
import { buildContext, type RemediationDispatcher } from '../remediation/dispatcher.js';
import { createCollector, type CollectorFactory } from '../services/collector.js';
import type { EventPublisher } from '../services/events.js';
import type { ReportStore } from '../services/report-store.js';
import type { ClusterReport, HealthSnapshot, NodeAnnotation, NodeResult } from '../types.js';
import { DispatchQueue } from './dispatch-queue.js';
import { buildClusterReport, freezeResult } from './report.js';
import { sleep, withTimeout } from './timing.js';

/** Alert key for reachability of the node itself */
export const COLLECTION_KEY = 'collection';

export interface MonitorDeps {
  collectorFor?: CollectorFactory;
  notifiers?: Notifier[];
  remediation?: RemediationDispatcher | null;
  reportStore?: ReportStore | null;
  events?: EventPublisher | null;
  /** Epoch ms clock */
  now?: () => number;
}

export interface CycleOptions {
  signal?: AbortSignal;
}

interface Collected {
  snapshot?: HealthSnapshot;
  error?: CollectionError;
}

type CycleEnd = 'complete' | 'timeout' | 'cancelled';

interface CycleState {
  cycle: number;
  results: Map<string, NodeResult>;
  finalised: boolean;
}

export function hostOf(node: NodeConfig): string {
  if (node.local) return 'localhost';
  return node.ssh?.host ?? 'unknown';
}

function isCancelled(result: NodeResult): boolean {
  return result.error?.kind === 'cancelled';
}

export class HealthMonitor {
  private readonly tracker: AlertStateTracker;
  private readonly foldLock = new Mutex();
  private readonly queue = new DispatchQueue();
  private readonly collectorFor: CollectorFactory;
  private readonly notifiers: Notifier[];
  private readonly remediation: RemediationDispatcher | null;
  private readonly reportStore: ReportStore | null;
  private readonly events: EventPublisher | null;
  private readonly now: () => number;

  private cycle = 0;
  private latest: ClusterReport | null = null;
  private pendingAnnotations = new Map<string, NodeAnnotation[]>();

  constructor(private readonly config: Config, deps: MonitorDeps = {}) {
    this.tracker = new AlertStateTracker(config.alertCooldownMinutes * 60_000);
    this.collectorFor = deps.collectorFor ?? createCollector;
    this.notifiers = deps.notifiers ?? [];
    this.remediation = deps.remediation ?? null;
    this.reportStore = deps.reportStore ?? null;
    this.events = deps.events ?? null;
    this.now = deps.now ?? Date.now;
  }

  // ── Public API ────────────────────────────────────────────────────────────

  /** Last published report, or null before the first cycle completes. */
  getLatestReport(): ClusterReport | null {
    return this.latest;
  }

  /** Copies of every tracked alert state */
  getAlertStates(): AlertState[] {
    return this.tracker.snapshot();
  }

  /** Wait for every queued notification and remediation to finish. */
  async drain(): Promise<void> {
    await this.queue.idle();
  }

  /**
   * Run one check cycle over `nodes` (default: every enabled node).
   * Never rejects for node-level failures; those become unknown results.
   */
  async runCycle(
    nodes: readonly NodeConfig[] = this.config.nodes.filter(n => n.enabled),
    options: CycleOptions = {},
  ): Promise<ClusterReport> {
    const state: CycleState = { cycle: ++this.cycle, results: new Map(), finalised: false };
    const startedAt = this.now();
    const limit = resolveConcurrency(nodes.length, this.config.maxConcurrency);
    const slots = new Semaphore(limit);
    const controller = new AbortController();

    log(`[Monitor] ── Cycle ${state.cycle}: ${nodes.length} nodes, ${limit} at a time ──`, 'debug');

    const tasks = nodes.map(node => this.runNode(node, state, slots, controller.signal));
    const end = await this.waitForCycle(Promise.all(tasks), controller, options.signal);

    const release = await this.foldLock.acquire();
    try {
      state.finalised = true;
      for (const node of nodes) {
        if (state.results.has(node.name)) continue;
        const error = end === 'cancelled'
          ? new CollectionError('cancelled', `cancelled after ${this.config.cancelGraceSeconds}s grace period`, node.name)
          : new CollectionError('timeout', `cycle timed out after ${this.config.cycleTimeoutSeconds ?? 0}s`, node.name);
        const result = this.buildResult(node, { error }, this.takeAnnotations(node.name));
        state.results.set(node.name, result);
        if (end === 'timeout') this.fold(node, result, state.cycle);
      }
    } finally {
      release();
    }
    slots.cancel();
    controller.abort();

    const report = buildClusterReport({
      cycle: state.cycle,
      startedAt,
      finishedAt: this.now(),
      nodes: [...state.results.values()],
    });
    // Overlapping cycles can finish out of order; never go back to an older one
    const newest = this.latest === null || report.cycle > this.latest.cycle;
    if (newest) {
      this.latest = report;
    } else {
      log(`[Monitor] Cycle ${report.cycle} finished after cycle ${this.latest?.cycle}; not published`, 'debug');
    }

    if (end !== 'complete') {
      log(`[Monitor] Cycle ${report.cycle} ended early (${end}); unfinished nodes reported unknown`, 'warn');
    }
    log(
      `[Monitor] Cycle ${report.cycle} ${report.severity.toUpperCase()} in ${report.durationMs}ms ` +
      `(ok=${report.summary.ok} warning=${report.summary.warning} critical=${report.summary.critical} unknown=${report.summary.unknown})`,
    );

    const store = this.reportStore;
    if (newest && store?.enabled) this.queue.enqueue('report-store', `cycle ${report.cycle}`, () => store.publish(report));
    return report;
  }

  /**
   * Collect and evaluate a single ad-hoc node. Alert state, annotations and
   * the published report are left untouched.
   */
  async quickCheck(node: NodeConfig, options: CycleOptions = {}): Promise<NodeResult> {
    const collected = await this.collectNode(node, options.signal);
    return freezeResult(this.buildResult(node, collected, []));
  }

  /**
   * Run cycles every checkIntervalSeconds until `signal` aborts. A failing
   * cycle is logged and the loop continues.
   */
  async watch(signal: AbortSignal, onReport?: (report: ClusterReport) => void): Promise<void> {
    const intervalMs = this.config.checkIntervalSeconds * 1000;
    log(`[Monitor] Watching ${this.config.nodes.filter(n => n.enabled).length} nodes every ${this.config.checkIntervalSeconds}s`);
    await this.events?.publishLifecycle(true);

    while (!signal.aborted) {
      const started = this.now();
      try {
        const report = await this.runCycle(undefined, { signal });
        onReport?.(report);
      } catch (err) {
        log(`[Monitor] Cycle failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
      }
      if (signal.aborted) break;
      await sleep(Math.max(0, intervalMs - (this.now() - started)), signal);
    }

    log('[Monitor] Stopping; waiting for pending notifications');
    await this.drain();
    await this.events?.publishLifecycle(false);
  }

  // ── Cycle internals ───────────────────────────────────────────────────────

  private waitForCycle(
    all: Promise<unknown>,
    controller: AbortController,
    external?: AbortSignal,
  ): Promise<CycleEnd> {
    return new Promise<CycleEnd>((resolve) => {
      let cycleTimer: ReturnType<typeof setTimeout> | undefined;
      let graceTimer: ReturnType<typeof setTimeout> | undefined;

      const finish = (end: CycleEnd) => {
        clearTimeout(cycleTimer);
        clearTimeout(graceTimer);
        external?.removeEventListener('abort', onAbort);
        resolve(end);
      };

      const onAbort = () => {
        controller.abort();
        graceTimer = setTimeout(() => finish('cancelled'), this.config.cancelGraceSeconds * 1000);
      };

      if (this.config.cycleTimeoutSeconds !== undefined) {
        cycleTimer = setTimeout(() => finish('timeout'), this.config.cycleTimeoutSeconds * 1000);
      }
      if (external?.aborted) onAbort();
      else external?.addEventListener('abort', onAbort, { once: true });

      all.then(
        () => finish('complete'),
        (err: unknown) => {
          log(`[Monitor] Node task failed unexpectedly: ${err instanceof Error ? err.message : String(err)}`, 'error');
          finish('complete');
        },
      );
    });
  }

  private async runNode(node: NodeConfig, state: CycleState, slots: Semaphore, signal: AbortSignal): Promise<void> {
    const acquired = await slots.acquire().catch((err: unknown) => {
      log(`[Monitor] ${node.name}: no slot before cycle ended (${err instanceof Error ? err.message : String(err)})`, 'debug');
      return null;
    });
    if (!acquired) return;
    const [, releaseSlot] = acquired;

    try {
      if (state.finalised) return;
      const collected: Collected = signal.aborted
        ? { error: new CollectionError('cancelled', 'cycle cancelled before collection started', node.name) }
        : await this.collectNode(node, signal);

      const release = await this.foldLock.acquire();
      try {
        if (state.finalised) {
          log(`[Monitor] ${node.name}: late result for cycle ${state.cycle} discarded`, 'debug');
          return;
        }
        const result = this.buildResult(node, collected, this.takeAnnotations(node.name));
        state.results.set(node.name, result);
        if (!isCancelled(result)) this.fold(node, result, state.cycle);
      } finally {
        release();
      }
    } finally {
      releaseSlot();
    }
  }

  private async collectNode(node: NodeConfig, cycleSignal?: AbortSignal): Promise<Collected> {
    const timeoutMs = this.config.nodeTimeoutSeconds * 1000;
    const nodeController = new AbortController();
    const onAbort = () => nodeController.abort();
    cycleSignal?.addEventListener('abort', onAbort, { once: true });

    try {
      const collector = this.collectorFor(node);
      const snapshot = await withTimeout(
        collector.collect(node, { timeoutMs, signal: nodeController.signal }),
        timeoutMs,
        () => new CollectionError('timeout', `no response within ${this.config.nodeTimeoutSeconds}s`, node.name),
      );
      return { snapshot };
    } catch (err) {
      const error = toCollectionError(err, node.name);
      if (cycleSignal?.aborted && error.kind !== 'cancelled') {
        return { error: new CollectionError('cancelled', `cancelled: ${error.message}`, node.name) };
      }
      log(`[Monitor] ${node.name}: collection failed (${error.kind}): ${error.message}`, 'warn');
      return { error };
    } finally {
      cycleSignal?.removeEventListener('abort', onAbort);
      // Stops a collector still running after a timeout
      nodeController.abort();
    }
  }

  private buildResult(node: NodeConfig, collected: Collected, annotations: NodeAnnotation[]): NodeResult {
    const result: NodeResult = {
      name: node.name,
      host: hostOf(node),
      platform: node.platform,
      metrics: [],
      severity: 'unknown',
      annotations,
    };
    if (collected.snapshot) {
      const evaluation = evaluate(collected.snapshot, resolveThresholds(this.config.thresholds, node), node.services);
      result.snapshot = Object.freeze(collected.snapshot);
      result.metrics = evaluation.metrics;
      result.severity = evaluation.overall;
    } else if (collected.error) {
      result.error = { kind: collected.error.kind, message: collected.error.message };
    }
    return result;
  }

  private takeAnnotations(nodeName: string): NodeAnnotation[] {
    const pending = this.pendingAnnotations.get(nodeName) ?? [];
    this.pendingAnnotations.delete(nodeName);
    return pending;
  }

  private annotate(nodeName: string, annotation: NodeAnnotation): void {
    const pending = this.pendingAnnotations.get(nodeName) ?? [];
    pending.push(annotation);
    this.pendingAnnotations.set(nodeName, pending);
  }

  /** Apply one node's result to alert state. Caller holds the fold lock. */
  private fold(node: NodeConfig, result: NodeResult, cycle: number): void {
    const at = this.now();
    const events: AlertEvent[] = [];
    const push = (event: AlertEvent | null) => {
      if (event) events.push(event);
    };

    if (result.snapshot) {
      push(this.tracker.observe({ node: node.name, key: COLLECTION_KEY, severity: 'ok', cycle, at }));
      for (const metric of result.metrics) {
        push(this.tracker.observe({ node: node.name, key: metric.key, severity: metric.severity, cycle, at, metric }));
      }
    } else {
      push(this.tracker.observe({
        node: node.name,
        key: COLLECTION_KEY,
        severity: 'unknown',
        cycle,
        at,
        detail: result.error?.message,
      }));
    }

    for (const event of events) this.route(node, result, event);
  }

  // ── Dispatch ──────────────────────────────────────────────────────────────

  private route(node: NodeConfig, result: NodeResult, event: AlertEvent): void {
    const message = alertMessage(event);
    const notice: AlertNotice = { event, host: result.host, platform: result.platform };
    if (result.snapshot) notice.snapshot = result.snapshot;

    log(`[Alert] ${event.kind.toUpperCase()} ${event.node}/${event.key}: ${message}`, event.kind === 'recovery' ? 'info' : 'warn');

    for (const notifier of this.notifiers) {
      this.queue.enqueue(notifier.name, event.id, () =>
        event.kind === 'recovery' ? notifier.sendRecovery(notice) : notifier.sendAlert(notice),
      );
    }

    const events = this.events;
    if (events?.enabled) {
      this.queue.enqueue('events', event.id, () => events.publishAlert(event, message));
    }

    const remediation = this.remediation;
    if (remediation && remediation.actionFor(event, node) !== undefined) {
      const context = buildContext(result, event);
      this.queue.enqueue('remediation', event.id, async () => {
        try {
          const outcome = await remediation.dispatch(node, event.key, context, event.id);
          log(`[Remediation] ${node.name} ${event.key}: ${outcome.status} - ${outcome.message}`);
          await events?.publishRemediation(node.name, event.key, outcome);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          log(`[Remediation] ${err instanceof RemediationDispatchError ? '' : 'Unexpected error: '}${reason}`, 'error');
          this.annotate(node.name, { kind: 'remediation-failed', message: reason, timestamp: new Date(this.now()) });
          await events?.publishRemediation(node.name, event.key, { error: reason });
        }
      });
    }
  }
}
