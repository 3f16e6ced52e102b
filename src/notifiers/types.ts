import type { AlertEvent } from '../alerts/state-tracker.js';
import type { HealthSnapshot, Platform } from '../types.js';

/** An alert event plus the node context a message needs */
export interface AlertNotice {
  event: AlertEvent;
  host: string;
  platform: Platform;
  /** Snapshot from the cycle that raised the event; absent when unreachable */
  snapshot?: HealthSnapshot;
}

/**
 * A notification channel. Both methods resolve on delivery and reject with
 * NotifierDeliveryError otherwise.
 */
export interface Notifier {
  readonly name: string;
  sendAlert(notice: AlertNotice): Promise<void>;
  sendRecovery(notice: AlertNotice): Promise<void>;
}
