/**
 * Generic HTTP webhook notifier.
 */

import type { WebhookConfig } from '../config.js';
import { log } from '../logger.js';
import { alertMessage } from './format.js';
import { sendJson } from './http.js';
import type { AlertNotice, Notifier } from './types.js';

export function buildWebhookPayload(notice: AlertNotice): Record<string, unknown> {
  const { event } = notice;
  const payload: Record<string, unknown> = {
    event: event.kind === 'recovery' ? 'recovery' : 'alert',
    kind: event.kind,
    id: event.id,
    node: event.node,
    host: notice.host,
    platform: notice.platform,
    key: event.key,
    severity: event.severity,
    previousSeverity: event.previousSeverity,
    unreachable: event.unreachable,
    cycle: event.cycle,
    timestamp: event.timestamp.toISOString(),
    message: alertMessage(event),
  };
  if (event.value !== undefined) payload.value = event.value;
  if (event.threshold !== undefined) payload.threshold = event.threshold;
  if (notice.snapshot && event.kind !== 'recovery') {
    payload.health = { ...notice.snapshot, timestamp: notice.snapshot.timestamp.toISOString() };
  }
  return payload;
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

export class WebhookNotifier implements Notifier {
  readonly name = 'webhook';
  private readonly headers: Record<string, string>;

  constructor(private readonly config: Pick<WebhookConfig, 'url' | 'method' | 'headers' | 'username' | 'password'>) {
    this.headers = { ...config.headers };
    if (config.username !== undefined && config.password !== undefined) {
      this.headers.Authorization = basicAuth(config.username, config.password);
    }
  }

  async sendAlert(notice: AlertNotice): Promise<void> {
    await this.send(notice);
  }

  async sendRecovery(notice: AlertNotice): Promise<void> {
    await this.send(notice);
  }

  private async send(notice: AlertNotice): Promise<void> {
    await sendJson(this.name, this.config.url, buildWebhookPayload(notice), {
      method: this.config.method.toUpperCase(),
      headers: this.headers,
    });
    log(`[Webhook] ${notice.event.kind} sent to ${this.config.url}`, 'debug');
  }
}
