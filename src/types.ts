export type PresenceStatus = 'online' | 'offline';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Locale = 'en' | 'zh';

export interface IpTarget {
  kind: 'ip';
  ip: string;
}

export interface MacTarget {
  kind: 'mac';
  mac: string;
  /** Optional address used to refresh the neighbour cache and pin the ARP entry. */
  ip?: string;
  acceptStale: boolean;
}

export type Target = IpTarget | MacTarget;

export interface ReachableOutcome {
  status: 'reachable';
}

export interface UnreachableOutcome {
  status: 'unreachable';
  reason: string;
}

/** The probe itself failed; says nothing about the target. */
export interface ProbeErrorOutcome {
  status: 'error';
  error: string;
}

export type ProbeOutcome = ReachableOutcome | UnreachableOutcome | ProbeErrorOutcome;

export interface ProbeSample {
  timestamp: number;
  outcome: ProbeOutcome;
}

export interface MonitorState {
  currentStatus: PresenceStatus;
  statusSince: number;
  pendingStatus: PresenceStatus | null;
  pendingSince: number | null;
}

export interface StateEvent {
  readonly from: PresenceStatus;
  readonly to: PresenceStatus;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationMs: number;
}

export interface DebounceThresholds {
  toOffline: number;
  toOnline: number;
}

export interface SlackConfig {
  enabled: boolean;
  webhookUrl: string;
  channel: string;
}

export interface MonitorConfig {
  target: Target;
  /** Seconds between probes. */
  pingInterval: number;
  /** Seconds a single probe may take. */
  probeTimeout: number;
  offlineThreshold: number;
  onlineThreshold: number;
  heartbeatInterval: number;
  heartbeatUrl?: string;
  logFile: string;
  logLevel: LogLevel;
  logDir?: string;
  locale: Locale;
  slack: SlackConfig;
}
