/**
 * Telegram notifier (Bot API sendMessage, Markdown).
 */

import type { TelegramConfig } from '../config.js';
import { log } from '../logger.js';
import { SEVERITY_EMOJI, alertMessage, snapshotLines } from './format.js';
import { sendJson } from './http.js';
import type { AlertNotice, Notifier } from './types.js';

const API_BASE = 'https://api.telegram.org';

export function formatTelegramAlert(notice: AlertNotice): string {
  const { event } = notice;
  const lines = [
    `${SEVERITY_EMOJI[event.severity]} *${event.node}* (${notice.host})`,
    `_${alertMessage(event)}_`,
  ];

  if (notice.snapshot) {
    lines.push('', '📊 *Metrics:*');
    for (const { label, value } of snapshotLines(notice.snapshot)) {
      lines.push(`  • ${label}: \`${value}\``);
    }
    const services = Object.entries(notice.snapshot.services);
    if (services.length > 0) {
      lines.push('', '🔧 *Services:*');
      for (const [name, running] of services) {
        lines.push(`  • ${name}: ${running ? '✅' : '❌'}`);
      }
    }
  }
  return lines.join('\n');
}

export function formatTelegramRecovery(notice: AlertNotice): string {
  return `${SEVERITY_EMOJI.ok} *${notice.event.node}* - ${alertMessage(notice.event)}`;
}

export class TelegramNotifier implements Notifier {
  readonly name = 'telegram';

  constructor(private readonly config: Pick<TelegramConfig, 'botToken' | 'chatId'>) {}

  async sendAlert(notice: AlertNotice): Promise<void> {
    await this.send(formatTelegramAlert(notice));
  }

  async sendRecovery(notice: AlertNotice): Promise<void> {
    await this.send(formatTelegramRecovery(notice));
  }

  private async send(text: string): Promise<void> {
    await sendJson(this.name, `${API_BASE}/bot${this.config.botToken}/sendMessage`, {
      chat_id: this.config.chatId,
      text,
      parse_mode: 'Markdown',
    });
    log(`[Telegram] Sent to chat ${this.config.chatId}`, 'debug');
  }
}
