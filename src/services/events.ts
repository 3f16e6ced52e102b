/**
 * Event Publisher
 *
 * Writes alert, recovery, remediation and lifecycle events to Postgres
 * (monitoring_events, see sql/monitoring_events.sql) so a status page can
 * show them.
 */

import pg from 'pg';
import type { AlertEvent } from '../alerts/state-tracker.js';
import type { RemediationOutcome } from '../remediation/dispatcher.js';
import type { Severity } from '../types.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type MonitorEventType =
  | 'ALERT'
  | 'ESCALATION'
  | 'REMINDER'
  | 'RECOVERY'
  | 'REMEDIATION'
  | 'REMEDIATION_FAILED'
  | 'MONITOR_START'
  | 'MONITOR_STOP';

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface MonitorEvent {
  eventType: MonitorEventType;
  node?: string;
  alertKey?: string;
  severity?: EventSeverity;
  success?: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/** The subset of pg.Pool the publisher needs */
export interface EventSink {
  query(text: string, values: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

const EVENT_TYPES: Record<AlertEvent['kind'], MonitorEventType> = {
  new: 'ALERT',
  escalation: 'ESCALATION',
  reminder: 'REMINDER',
  recovery: 'RECOVERY',
};

export function eventSeverity(severity: Severity): EventSeverity {
  if (severity === 'ok') return 'INFO';
  if (severity === 'warning') return 'WARNING';
  return 'CRITICAL';
}

/**
 * Event publisher that writes directly to Postgres.
 * Falls back gracefully if Postgres is unavailable.
 */
export class EventPublisher {
  private pool: EventSink | null = null;
  private postgresAvailable = true;

  constructor(postgresUrl: string | undefined, sink?: EventSink) {
    if (sink) {
      this.pool = sink;
    } else {
      this.initPostgres(postgresUrl);
    }
  }

  private initPostgres(postgresUrl: string | undefined): void {
    if (!postgresUrl) {
      log('[Events] No Postgres URL configured, event publishing disabled', 'debug');
      this.postgresAvailable = false;
      return;
    }

    try {
      const pool = new Pool({
        connectionString: postgresUrl,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
      });

      pool.on('error', (err) => {
        log(`[Events] Postgres pool error: ${err.message}`, 'warn');
        this.postgresAvailable = false;
      });
      this.pool = pool;
    } catch (err) {
      log(`[Events] Failed to initialize Postgres: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      this.postgresAvailable = false;
    }
  }

  get enabled(): boolean {
    return this.pool !== null && this.postgresAvailable;
  }

  /**
   * Publish an event to the monitoring_events table.
   * Never throws.
   */
  async publish(event: MonitorEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) return;

    try {
      await this.pool.query(
        `INSERT INTO monitoring_events
         (event_type, node, alert_key, severity, success, message, details)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          event.eventType,
          event.node ?? null,
          event.alertKey ?? null,
          event.severity ?? 'INFO',
          event.success ?? null,
          event.message ?? null,
          event.details ? JSON.stringify(event.details) : null,
        ],
      );

      log(`[Events] Published ${event.eventType}: ${event.node ?? event.message ?? 'ok'}`, 'debug');
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] monitoring_events table does not exist, skipping event publishing', 'warn');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish event: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      }
    }
  }

  async publishAlert(event: AlertEvent, message: string): Promise<void> {
    const details: Record<string, unknown> = {
      id: event.id,
      cycle: event.cycle,
      previousSeverity: event.previousSeverity,
      unreachable: event.unreachable,
      consecutive: event.consecutive,
    };
    if (event.value !== undefined) details.value = event.value;
    if (event.threshold !== undefined) details.threshold = event.threshold;

    await this.publish({
      eventType: EVENT_TYPES[event.kind],
      node: event.node,
      alertKey: event.key,
      severity: eventSeverity(event.severity),
      message,
      details,
    });
  }

  async publishRemediation(
    node: string,
    triggerKey: string,
    outcome: RemediationOutcome | { error: string },
  ): Promise<void> {
    const failed = 'error' in outcome;
    await this.publish({
      eventType: failed ? 'REMEDIATION_FAILED' : 'REMEDIATION',
      node,
      alertKey: triggerKey,
      severity: failed ? 'CRITICAL' : 'WARNING',
      success: !failed,
      message: failed ? `Remediation failed: ${outcome.error}` : `Remediation ${outcome.status}: ${outcome.message}`,
      details: failed ? { error: outcome.error } : { status: outcome.status, action: outcome.action },
    });
  }

  /**
   * Publish monitor lifecycle events.
   */
  async publishLifecycle(started: boolean): Promise<void> {
    await this.publish({
      eventType: started ? 'MONITOR_START' : 'MONITOR_STOP',
      severity: 'INFO',
      message: started ? 'Health monitor started' : 'Health monitor stopped',
    });
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
