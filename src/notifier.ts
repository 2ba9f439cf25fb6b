import { NotificationError, getErrorMessage, withTimeout } from './errors';
import type { SlackConfig } from './types';

export const NOTIFICATION_TIMEOUT_MS = 10000;

export interface Notifier {
  send(message: string): Promise<void>;
}

/** Used when notifications are disabled. */
export class NoopNotifier implements Notifier {
  async send(): Promise<void> {}
}

async function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<void> {
  const controller = new AbortController();
  let response: Response;

  try {
    response = await withTimeout(
      fetch(url, {
        method: 'POST',
        signal: controller.signal,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'lan-presence-monitor/1.0',
          ...headers
        },
        body: JSON.stringify(body)
      }),
      NOTIFICATION_TIMEOUT_MS
    );
  } catch (error) {
    controller.abort();
    throw new NotificationError(`Request to webhook failed: ${getErrorMessage(error)}`);
  }

  if (!response.ok) {
    throw new NotificationError(`Webhook responded ${response.status}: ${response.statusText}`, response.status);
  }
}

export class SlackNotifier implements Notifier {
  constructor(private readonly config: SlackConfig) {}

  async send(message: string): Promise<void> {
    const payload: { text: string; channel?: string } = { text: message };
    if (this.config.channel) {
      payload.channel = this.config.channel;
    }
    await postJson(this.config.webhookUrl, payload);
  }
}

export function createNotifier(config: SlackConfig): Notifier {
  if (!config.enabled || !config.webhookUrl) {
    return new NoopNotifier();
  }
  return new SlackNotifier(config);
}

/** Push-style liveness ping for an external dead-man's-switch service. */
export class HeartbeatPublisher {
  constructor(private readonly url: string, private readonly target: string) {}

  async publish(status: string, uptimeMs: number): Promise<void> {
    await postJson(
      this.url,
      { target: this.target, status, uptime: Math.floor(uptimeMs / 1000), timestamp: Date.now() },
      { 'X-Monitor-Target': this.target }
    );
  }
}
