/**
 * Dispatch Queue
 *
 * One serial worker per target (a notifier, the remediation dispatcher).
 * Jobs for the same target run in order; targets run independently, so a
 * slow webhook delays only its own deliveries. Each job runs once: a failure
 * is logged and the next job starts.
 */

import { log } from '../logger.js';

export type DispatchJob = () => Promise<void>;

export class DispatchQueue {
  private tails = new Map<string, Promise<void>>();
  private queued = 0;

  enqueue(target: string, label: string, job: DispatchJob): void {
    this.queued++;
    const prev = this.tails.get(target) ?? Promise.resolve();
    const next: Promise<void> = prev
      .then(job)
      .catch((err: unknown) => {
        log(`[Dispatch] ${target} failed on ${label}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      })
      .finally(() => {
        this.queued--;
        if (this.tails.get(target) === next) this.tails.delete(target);
      });
    this.tails.set(target, next);
  }

  /** Jobs enqueued and not yet finished */
  get pending(): number {
    return this.queued;
  }

  /** Resolve once every queued job (including ones enqueued meanwhile) has run. */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }
}
