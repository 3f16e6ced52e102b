import { NotifierDeliveryError } from '../errors.js';

const SEND_TIMEOUT = 10_000;

export interface SendOptions {
  method?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Send a JSON body and fail on anything but a 2xx answer.
 * Network errors and timeouts become NotifierDeliveryError too.
 */
export async function sendJson(
  notifier: string,
  url: string,
  body: unknown,
  options: SendOptions = {},
): Promise<void> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? SEND_TIMEOUT);
  let res: Response;
  try {
    res = await fetch(url, {
      method: options.method ?? 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    const reason = controller.signal.aborted ? 'request timed out' : err instanceof Error ? err.message : String(err);
    throw new NotifierDeliveryError(notifier, reason);
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new NotifierDeliveryError(notifier, `HTTP ${res.status}${text ? ` - ${text.slice(0, 200)}` : ''}`, res.status);
  }
}
