/**
 * Alert State Tracker
 *
 * Turns per-cycle (node, alert-key, severity) observations into
 * new / escalation / reminder / recovery events, one state machine per key:
 *
 *   normal ──non-ok──▶ alerting ──same/lower, cooldown active──▶ suppressed
 *     ▲                  │  ▲                                        │
 *     └──────ok──────────┘  └──────────cooldown elapsed (reminder)───┘
 *
 * A higher severity than the one last notified always emits an escalation.
 * A single ok observation clears an alert; there is no debounce window.
 */

import { log } from '../logger.js';
import { SEVERITY_RANK, type MetricResult, type Severity } from '../types.js';

export type AlertPhase = 'normal' | 'alerting' | 'suppressed';

export type AlertEventKind = 'new' | 'escalation' | 'reminder' | 'recovery';

export interface AlertState {
  node: string;
  key: string;
  phase: AlertPhase;
  /** Latest observed severity */
  severity: Severity;
  /** Severity carried by the last notification */
  alertedSeverity: Severity;
  lastTransitionAt: number | null;
  lastNotifiedAt: number | null;
  /** Consecutive cycles at the current severity */
  consecutive: number;
  /** Last cycle applied to this key */
  cycle: number;
}

export interface Observation {
  node: string;
  key: string;
  severity: Severity;
  cycle: number;
  /** Epoch ms */
  at: number;
  metric?: MetricResult;
  /** Free text, e.g. a collection error */
  detail?: string;
}

export interface AlertEvent {
  id: string;
  kind: AlertEventKind;
  node: string;
  key: string;
  severity: Severity;
  previousSeverity: Severity;
  /** The node could not be reached (as opposed to a threshold breach) */
  unreachable: boolean;
  cycle: number;
  timestamp: Date;
  value?: number;
  threshold?: number;
  detail?: string;
  /** Consecutive cycles at this severity; for a recovery, at the last alerting severity */
  consecutive: number;
}

function isAlerting(severity: Severity): boolean {
  return severity !== 'ok';
}

export class AlertStateTracker {
  private states = new Map<string, AlertState>();
  private seq = 0;

  constructor(private readonly cooldownMs: number) {}

  private stateKey(node: string, key: string): string {
    return `${node}\u0000${key}`;
  }

  /**
   * Apply one observation. Returns the event to dispatch, or null when the
   * transition is silent (steady ok, or suppressed by cooldown).
   */
  observe(obs: Observation): AlertEvent | null {
    const k = this.stateKey(obs.node, obs.key);
    const prev = this.states.get(k);

    if (prev && obs.cycle < prev.cycle) {
      log(`[AlertState] Dropping out-of-order observation ${obs.node}/${obs.key} (cycle ${obs.cycle} < ${prev.cycle})`, 'debug');
      return null;
    }

    const state: AlertState = prev
      ? { ...prev }
      : {
          node: obs.node,
          key: obs.key,
          phase: 'normal',
          severity: 'ok',
          alertedSeverity: 'ok',
          lastTransitionAt: null,
          lastNotifiedAt: null,
          consecutive: 0,
          cycle: obs.cycle,
        };

    const previousSeverity = state.severity;
    state.consecutive = obs.severity === previousSeverity ? state.consecutive + 1 : 1;
    state.severity = obs.severity;
    state.cycle = obs.cycle;

    let kind: AlertEventKind | null = null;

    if (state.phase === 'normal') {
      if (isAlerting(obs.severity)) {
        kind = 'new';
        state.phase = 'alerting';
        state.lastTransitionAt = obs.at;
      }
    } else if (!isAlerting(obs.severity)) {
      kind = 'recovery';
      state.phase = 'normal';
      state.alertedSeverity = 'ok';
      state.lastTransitionAt = obs.at;
    } else if (SEVERITY_RANK[obs.severity] > SEVERITY_RANK[state.alertedSeverity]) {
      kind = 'escalation';
      state.phase = 'alerting';
      state.lastTransitionAt = obs.at;
    } else if (state.lastNotifiedAt === null || obs.at - state.lastNotifiedAt >= this.cooldownMs) {
      kind = 'reminder';
      if (state.phase === 'suppressed') state.lastTransitionAt = obs.at;
      state.phase = 'alerting';
    } else {
      if (state.phase === 'alerting') state.lastTransitionAt = obs.at;
      state.phase = 'suppressed';
    }

    const openCycles = kind === 'recovery' ? (prev?.consecutive ?? 0) : state.consecutive;
    if (kind === 'recovery') state.consecutive = 0;
    if (kind && kind !== 'recovery') {
      state.lastNotifiedAt = obs.at;
      state.alertedSeverity = obs.severity;
    }

    this.states.set(k, state);
    if (!kind) return null;

    const event: AlertEvent = {
      id: `${obs.node}:${obs.key}:${obs.cycle}:${++this.seq}`,
      kind,
      node: obs.node,
      key: obs.key,
      severity: obs.severity,
      previousSeverity,
      unreachable: kind === 'recovery' ? previousSeverity === 'unknown' : obs.severity === 'unknown',
      cycle: obs.cycle,
      timestamp: new Date(obs.at),
      consecutive: openCycles,
    };
    if (obs.metric?.value !== undefined) event.value = obs.metric.value;
    if (obs.metric?.threshold !== undefined) event.threshold = obs.metric.threshold;
    const detail = obs.detail ?? obs.metric?.reason;
    if (detail) event.detail = detail;
    return event;
  }

  get(node: string, key: string): AlertState | undefined {
    const s = this.states.get(this.stateKey(node, key));
    return s ? { ...s } : undefined;
  }

  /** Copies of every tracked state, ordered by node then key. */
  snapshot(): AlertState[] {
    return [...this.states.values()]
      .map(s => ({ ...s }))
      .sort((a, b) => a.node.localeCompare(b.node) || a.key.localeCompare(b.key));
  }

  /** Keys currently open (alerting or suppressed). */
  openAlerts(): AlertState[] {
    return this.snapshot().filter(s => s.phase !== 'normal');
  }
}
