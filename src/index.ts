#!/usr/bin/env node
import { DEFAULT_CONFIG_PATH, loadConfig } from './config';
import { ReachabilityProber, describeTarget } from './monitor';
import { MonitorScheduler } from './scheduler';
import { PresenceStateMachine, resolveThresholds } from './state';
import { EventRecorder } from './recorder';
import { EventLog } from './event-log';
import { HeartbeatPublisher, createNotifier } from './notifier';
import { ConfigError, getErrorMessage } from './errors';
import { Logger, configureLogging, drainAll } from './utils/logger';
import type { MonitorConfig } from './types';

export function createMonitor(config: MonitorConfig): MonitorScheduler {
  const target = describeTarget(config.target);

  return new MonitorScheduler({
    target: config.target,
    pingInterval: config.pingInterval,
    heartbeatInterval: config.heartbeatInterval,
    locale: config.locale,
    prober: new ReachabilityProber({ timeout: config.probeTimeout * 1000 }),
    machine: new PresenceStateMachine(resolveThresholds(config.offlineThreshold, config.onlineThreshold)),
    recorder: new EventRecorder({
      eventLog: new EventLog(config.logFile),
      notifier: createNotifier(config.slack),
      target,
      locale: config.locale
    }),
    heartbeat: config.heartbeatUrl ? new HeartbeatPublisher(config.heartbeatUrl, target) : undefined
  });
}

async function run(argv: string[]): Promise<void> {
  const configPath = argv[2] || DEFAULT_CONFIG_PATH;
  const config = loadConfig(configPath);
  configureLogging({ level: config.logLevel, logDir: config.logDir });

  const logger = new Logger('MONITOR', describeTarget(config.target));
  logger.info(`Loaded configuration from ${configPath}`);
  if (config.offlineThreshold < config.pingInterval) {
    logger.warn(
      `offline_threshold (${config.offlineThreshold}s) is shorter than ping_interval (${config.pingInterval}s); two consecutive missed probes are enough to go offline`
    );
  }

  const monitor = createMonitor(config);

  // Handle graceful shutdown
  const cleanup = () => {
    logger.info('Shutting down...');
    monitor.stop();
  };
  process.once('SIGINT', cleanup);
  process.once('SIGTERM', cleanup);

  try {
    await monitor.start();
  } finally {
    process.removeListener('SIGINT', cleanup);
    process.removeListener('SIGTERM', cleanup);
  }
}

/** Runs the monitor until it is stopped and resolves with the process exit code. */
export async function main(argv: string[]): Promise<number> {
  try {
    await run(argv);
    return 0;
  } catch (error) {
    const label = error instanceof ConfigError ? 'Configuration error' : 'Fatal error';
    console.error(`${label}: ${getErrorMessage(error)}`);
    return 1;
  } finally {
    await drainAll();
  }
}

if (require.main === module) {
  void main(process.argv).then((code) => process.exit(code));
}
