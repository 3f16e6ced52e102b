/**
 * Slack notifier (incoming webhook with a coloured attachment).
 */

import type { SlackConfig } from '../config.js';
import { log } from '../logger.js';
import type { Severity } from '../types.js';
import { alertMessage, snapshotLines } from './format.js';
import { sendJson } from './http.js';
import type { AlertNotice, Notifier } from './types.js';

const COLORS: Record<Severity, string> = {
  ok: 'good',
  warning: 'warning',
  critical: 'danger',
  unknown: 'danger',
};

interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackPayload {
  text: string;
  channel?: string;
  attachments: Array<{
    color: string;
    title?: string;
    text: string;
    fields?: SlackField[];
    footer?: string;
    ts?: number;
  }>;
}

export function buildSlackAlert(notice: AlertNotice, channel?: string): SlackPayload {
  const { event } = notice;
  const fields: SlackField[] = [];
  if (notice.snapshot) {
    for (const { label, value } of snapshotLines(notice.snapshot)) {
      fields.push({ title: label, value, short: true });
    }
    const services = Object.entries(notice.snapshot.services);
    if (services.length > 0) {
      fields.push({
        title: 'Services',
        value: services.map(([name, running]) => `${name} (${running ? '✓' : '✗'})`).join(', '),
        short: false,
      });
    }
  }
  fields.push({ title: 'Platform', value: notice.platform, short: true });

  const payload: SlackPayload = {
    text: `🚨 Alert: ${event.node}`,
    attachments: [
      {
        color: COLORS[event.severity],
        title: `${event.node} - ${event.severity.toUpperCase()}`,
        text: alertMessage(event),
        fields,
        footer: 'Fleet Health Monitor',
        ts: Math.floor(event.timestamp.getTime() / 1000),
      },
    ],
  };
  if (channel) payload.channel = channel;
  return payload;
}

export function buildSlackRecovery(notice: AlertNotice, channel?: string): SlackPayload {
  const payload: SlackPayload = {
    text: `✅ *${notice.event.node}* - ${alertMessage(notice.event)}`,
    attachments: [{ color: COLORS.ok, text: `${notice.event.key} is back to OK.` }],
  };
  if (channel) payload.channel = channel;
  return payload;
}

export class SlackNotifier implements Notifier {
  readonly name = 'slack';

  constructor(private readonly config: Pick<SlackConfig, 'webhookUrl' | 'channel'>) {}

  async sendAlert(notice: AlertNotice): Promise<void> {
    await sendJson(this.name, this.config.webhookUrl, buildSlackAlert(notice, this.config.channel));
    log(`[Slack] Alert sent for ${notice.event.node}/${notice.event.key}`, 'debug');
  }

  async sendRecovery(notice: AlertNotice): Promise<void> {
    await sendJson(this.name, this.config.webhookUrl, buildSlackRecovery(notice, this.config.channel));
    log(`[Slack] Recovery sent for ${notice.event.node}/${notice.event.key}`, 'debug');
  }
}
