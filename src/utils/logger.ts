import { mkdir, appendFile } from 'fs/promises';
import { join } from 'path';
import type { LogLevel } from '../types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for the per-component diagnostic file. Console only when unset. */
  logDir?: string;
}

let defaults: LoggerOptions = {};

/** Loggers with a file behind them, so shutdown can wait for every queued write. */
const fileLoggers = new Set<Logger>();

/** Sets the level and directory used by loggers created afterwards. */
export function configureLogging(options: LoggerOptions) {
  defaults = { ...options };
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export class Logger {
  private component: string;
  private instanceId: string;
  private level: LogLevel;
  private logFile: string | null = null;
  private ready: Promise<boolean> | null = null;
  private pending: Promise<void> = Promise.resolve();

  constructor(component: string, instanceId: string, options: LoggerOptions = defaults) {
    this.component = component;
    this.instanceId = instanceId;
    this.level = options.level ?? 'info';

    if (options.logDir) {
      const dateStr = new Date().toISOString().split('T')[0];
      const safeId = instanceId.replace(/[^a-zA-Z0-9_-]/g, '_');
      this.logFile = join(options.logDir, `${dateStr}-${component}-${safeId}.log`);
      this.ready = mkdir(options.logDir, { recursive: true }).then(
        () => true,
        (error: unknown) => {
          console.error('Failed to create logs directory:', error);
          return false;
        }
      );
      fileLoggers.add(this);
    }
  }

  log(message: string, level: LogLevel = 'info') {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const timestamp = new Date().toISOString();
    const logEntry = `[${timestamp}] [${level.toUpperCase()}] [${this.component}:${this.instanceId}] ${message}`;

    if (level === 'error') {
      console.error(logEntry);
    } else if (level === 'warn') {
      console.warn(logEntry);
    } else {
      console.log(logEntry);
    }

    const file = this.logFile;
    const ready = this.ready;
    if (!file || !ready) return;

    this.pending = this.pending
      .then(() => ready)
      .then(async (ok) => {
        if (ok) await appendFile(file, `${logEntry}\n`, 'utf-8');
      })
      .catch((error: unknown) => {
        console.error('Failed to write to log file:', error);
      });
  }

  debug(message: string) {
    this.log(message, 'debug');
  }

  info(message: string) {
    this.log(message, 'info');
  }

  warn(message: string) {
    this.log(message, 'warn');
  }

  error(message: string) {
    this.log(message, 'error');
  }

  /** Resolves once queued file writes have settled. */
  async drain(): Promise<void> {
    await this.pending;
  }
}

/** Waits for the queued file writes of every logger created so far. */
export async function drainAll(): Promise<void> {
  await Promise.all([...fileLoggers].map((logger) => logger.drain()));
}
