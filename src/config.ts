import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from './errors';
import { isMacAddress, normalizeMac } from './utils/arp';
import { isLogLevel } from './utils/logger';
import type { MonitorConfig, Target } from './types';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

/** YAML leaves `ip:` with no value as null. */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? '');

const ipAddress = z.string().ip();

const ConfigSchema = z
  .object({
    target: z.object({
      ip: optionalString,
      mac: optionalString,
      accept_stale: z.boolean().default(false)
    }),
    ping_interval: z.number().positive('ping_interval must be greater than 0'),
    probe_timeout: z.number().positive('probe_timeout must be greater than 0').optional(),
    offline_threshold: z.number().nonnegative('offline_threshold must be non-negative'),
    online_threshold: z.number().nonnegative('online_threshold must be non-negative').optional(),
    heartbeat_interval: z.number().positive('heartbeat_interval must be greater than 0').default(300),
    heartbeat_url: z.string().url('heartbeat_url must be a URL').optional(),
    log_file: z.string().min(1, 'log_file is required'),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    log_dir: z.string().min(1).optional(),
    locale: z.enum(['en', 'zh']).default('en'),
    slack: z
      .object({
        enabled: z.boolean().default(false),
        webhook_url: optionalString,
        channel: optionalString
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const { ip, mac } = config.target;
    if (!ip && !mac) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['target'], message: 'either ip or mac is required' });
    }
    if (ip && !ipAddress.safeParse(ip).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['target', 'ip'], message: `invalid IP address "${ip}"` });
    }
    if (mac && !isMacAddress(mac)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['target', 'mac'], message: `invalid MAC address "${mac}"` });
    }
    if (config.probe_timeout !== undefined && config.probe_timeout >= config.ping_interval) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['probe_timeout'],
        message: 'probe_timeout must be shorter than ping_interval'
      });
    }
    if (config.slack.enabled && !z.string().url().safeParse(config.slack.webhook_url).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack', 'webhook_url'],
        message: 'a webhook URL is required when slack is enabled'
      });
    }
  });

type RawConfig = z.infer<typeof ConfigSchema>;

function toTarget(raw: RawConfig['target']): Target {
  if (raw.mac) {
    return {
      kind: 'mac',
      mac: normalizeMac(raw.mac),
      ...(raw.ip ? { ip: raw.ip } : {}),
      acceptStale: raw.accept_stale
    };
  }
  return { kind: 'ip', ip: raw.ip };
}

/** One second short of the interval, or half of it for sub-second intervals. */
export function defaultProbeTimeout(pingInterval: number): number {
  return pingInterval > 1 ? Math.max(1, pingInterval - 1) : pingInterval / 2;
}

/** Validates an already-parsed document. */
export function parseConfig(value: unknown, env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const result = ConfigSchema.safeParse(value);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const path = firstIssue?.path.join('.') || undefined;
    throw new ConfigError(firstIssue?.message ?? 'Invalid configuration', path);
  }

  const data = result.data;
  const envLevel = env.LOG_LEVEL?.toLowerCase();

  return {
    target: toTarget(data.target),
    pingInterval: data.ping_interval,
    probeTimeout: data.probe_timeout ?? defaultProbeTimeout(data.ping_interval),
    offlineThreshold: data.offline_threshold,
    onlineThreshold: data.online_threshold ?? data.offline_threshold,
    heartbeatInterval: data.heartbeat_interval,
    heartbeatUrl: data.heartbeat_url,
    logFile: data.log_file,
    logLevel: isLogLevel(envLevel) ? envLevel : data.log_level,
    logDir: data.log_dir,
    locale: data.locale,
    slack: {
      enabled: data.slack.enabled,
      webhookUrl: data.slack.webhook_url,
      channel: data.slack.channel
    }
  };
}

export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${getErrorMessage(error)}`);
  }

  if (document === null || typeof document !== 'object') {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }

  return parseConfig(document, env);
}
