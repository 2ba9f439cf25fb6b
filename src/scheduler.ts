import { setTimeout as delay } from 'node:timers/promises';
import { describeTarget } from './monitor';
import type { PresenceStateMachine } from './state';
import type { EventRecorder } from './recorder';
import type { HeartbeatPublisher } from './notifier';
import type { Locale, ProbeOutcome, StateEvent, Target } from './types';
import { formatDuration, formatTimestamp, messagesFor, statusLabel } from './utils/format';
import { Logger } from './utils/logger';
import { getErrorMessage } from './errors';

export const SHUTDOWN_FLUSH_TIMEOUT_MS = 2000;

export interface Prober {
  probe(target: Target): Promise<ProbeOutcome>;
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves early, without rejecting, when `signal` aborts. */
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
};

interface SchedulerConfig {
  target: Target;
  /** Seconds. */
  pingInterval: number;
  /** Seconds. */
  heartbeatInterval: number;
  locale: Locale;
  prober: Prober;
  machine: PresenceStateMachine;
  recorder: EventRecorder;
  heartbeat?: Pick<HeartbeatPublisher, 'publish'>;
  logger?: Logger;
  clock?: () => number;
  sleep?: Sleep;
}

/**
 * Owns the monitor state and drives the probe loop. Probes run one after
 * another; only this loop mutates the state machine.
 */
export class MonitorScheduler {
  private logger: Logger;
  private now: () => number;
  private sleep: Sleep;
  private controller: AbortController | null = null;
  private running = false;
  private startedAt = 0;
  private lastHeartbeatAt = 0;
  private errorSince: number | null = null;
  private degraded = false;

  constructor(private readonly config: SchedulerConfig) {
    this.logger = config.logger ?? new Logger('MONITOR', describeTarget(config.target));
    this.now = config.clock ?? Date.now;
    this.sleep = config.sleep ?? sleep;
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = this.now();
    this.lastHeartbeatAt = this.startedAt;

    const { target } = this.config;
    this.logger.info(`Monitoring ${describeTarget(target)} (${target.kind === 'mac' ? 'MAC' : 'IP'})`);

    await this.safeTick();
    while (this.running) {
      await this.sleep(this.config.pingInterval * 1000, controller.signal);
      if (!this.running) break;
      await this.safeTick();
    }

    await this.shutdown();
  }

  /** Ends the loop; `start()` resolves once the final interval is written. */
  stop() {
    if (!this.running) return;
    this.running = false;
    this.controller?.abort();
  }

  /** One probe, fed to the state machine; records the resulting transition, if any. */
  async tick(): Promise<StateEvent | null> {
    const { machine, prober, target } = this.config;
    const timestamp = this.now();
    const outcome = await prober.probe(target);

    this.trackProbeErrors(outcome, timestamp);

    const baselined = machine.hasBaseline();
    const event = machine.observe({ timestamp, outcome });

    if (!baselined) {
      const state = machine.getState();
      if (state) {
        this.logger.info(`Initial status: ${statusLabel(state.currentStatus, this.config.locale)}`);
      }
    }

    if (event) {
      this.logger.info(
        `Status changed: ${statusLabel(event.from, this.config.locale)} -> ${statusLabel(event.to, this.config.locale)} (since ${formatTimestamp(event.endedAt)})`
      );
      await this.config.recorder.record(event);
    }

    this.checkHeartbeat(timestamp);
    return event;
  }

  private async safeTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      this.logger.error(`Monitoring error: ${getErrorMessage(error)}`);
    }
  }

  private trackProbeErrors(outcome: ProbeOutcome, timestamp: number) {
    if (outcome.status !== 'error') {
      if (this.degraded) {
        this.logger.info('Probe recovered');
      }
      this.errorSince = null;
      this.degraded = false;
      return;
    }

    this.logger.warn(`Probe error (counted as unreachable): ${outcome.error}`);

    if (this.errorSince === null) {
      this.errorSince = timestamp;
    } else if (!this.degraded && timestamp - this.errorSince >= this.config.machine.thresholdFor('offline')) {
      this.degraded = true;
      this.logger.error(
        `Probe degraded: failing since ${formatTimestamp(this.errorSince)}, reported status reflects probe failures`
      );
    }
  }

  private checkHeartbeat(timestamp: number) {
    if (timestamp - this.lastHeartbeatAt < this.config.heartbeatInterval * 1000) return;
    this.lastHeartbeatAt = timestamp;

    const { locale } = this.config;
    const messages = messagesFor(locale);
    const state = this.config.machine.getState();
    const status = state ? statusLabel(state.currentStatus, locale) : messages.unknown;
    const inStatus = formatDuration(state ? timestamp - state.statusSince : 0, locale);
    const uptimeMs = timestamp - this.startedAt;

    this.logger.info(messages.heartbeat(status, inStatus, formatDuration(uptimeMs, locale)));

    const publisher = this.config.heartbeat;
    if (!publisher) return;

    void publisher
      .publish(state ? state.currentStatus : 'unknown', uptimeMs)
      .catch((error: unknown) => {
        this.logger.warn(`Failed to send heartbeat: ${getErrorMessage(error)}`);
      });
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Monitoring stopped');

    const state = this.config.machine.getState();
    if (state) {
      await this.config.recorder.recordShutdown(state, this.now());
    }

    await this.config.recorder.flush(SHUTDOWN_FLUSH_TIMEOUT_MS);
    this.controller = null;
  }
}
