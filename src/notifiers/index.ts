import type { NotifiersConfig } from '../config.js';
import { log } from '../logger.js';
import { SlackNotifier } from './slack.js';
import { TelegramNotifier } from './telegram.js';
import type { Notifier } from './types.js';
import { WebhookNotifier } from './webhook.js';

export type { AlertNotice, Notifier } from './types.js';

/** Instantiate every enabled notifier. */
export function createNotifiers(config: NotifiersConfig): Notifier[] {
  const notifiers: Notifier[] = [];
  if (config.telegram?.enabled) notifiers.push(new TelegramNotifier(config.telegram));
  if (config.slack?.enabled) notifiers.push(new SlackNotifier(config.slack));
  if (config.webhook?.enabled) notifiers.push(new WebhookNotifier(config.webhook));

  if (notifiers.length === 0) {
    log('[Notify] No notifiers enabled, alerts are logged only');
  } else {
    log(`[Notify] Enabled: ${notifiers.map(n => n.name).join(', ')}`);
  }
  return notifiers;
}
