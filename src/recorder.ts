import type { IntervalLog } from './event-log';
import type { Notifier } from './notifier';
import type { Locale, MonitorState, StateEvent } from './types';
import { formatEventLine, formatInterval, formatNotification } from './utils/format';
import { Logger } from './utils/logger';
import { getErrorMessage } from './errors';

interface RecorderConfig {
  eventLog: IntervalLog;
  notifier: Notifier;
  /** Printed in notifications. */
  target: string;
  locale: Locale;
  logger?: Logger;
}

/**
 * Writes one log line per confirmed transition and fires a notification.
 * Neither a failed write nor a failed notification reaches the caller.
 */
export class EventRecorder {
  private inFlight = new Set<Promise<void>>();
  private logger: Logger;

  constructor(private readonly config: RecorderConfig) {
    this.logger = config.logger ?? new Logger('RECORDER', config.target);
  }

  async record(event: StateEvent): Promise<void> {
    const line = formatEventLine(event, this.config.locale);
    this.logger.info(line);
    await this.write(line);
    this.dispatch(formatNotification(event, this.config.target, this.config.locale));
  }

  /** Closes the still-open interval when monitoring stops. Not notified. */
  async recordShutdown(state: MonitorState, at: number): Promise<void> {
    const line = formatInterval(state.currentStatus, state.statusSince, at, this.config.locale);
    this.logger.info(`Final interval ${line}`);
    await this.write(line);
  }

  /** Waits for in-flight notifications, giving up after `timeoutMs`. */
  async flush(timeoutMs: number): Promise<void> {
    if (this.inFlight.size === 0) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    await Promise.race([Promise.allSettled([...this.inFlight]).then(() => undefined), timeout]);
    clearTimeout(timer);

    if (this.inFlight.size > 0) {
      this.logger.warn(`Dropping ${this.inFlight.size} undelivered notification(s)`);
    }
  }

  private async write(line: string): Promise<void> {
    try {
      await this.config.eventLog.append(line);
    } catch (error) {
      // Monitoring continues without the file; the line is still on the console.
      this.logger.error(`Interval not persisted: ${getErrorMessage(error)}`);
    }
  }

  private dispatch(message: string) {
    const send = Promise.resolve()
      .then(() => this.config.notifier.send(message))
      .catch((error: unknown) => {
        this.logger.warn(`Failed to send notification: ${getErrorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(send);
      });
    this.inFlight.add(send);
  }
}
