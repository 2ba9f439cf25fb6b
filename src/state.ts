import type {
  DebounceThresholds,
  MonitorState,
  PresenceStatus,
  ProbeOutcome,
  ProbeSample,
  StateEvent
} from './types';

/**
 * Converts the configured thresholds from seconds to milliseconds. Both
 * directions share the offline threshold unless an online threshold is given.
 */
export function resolveThresholds(offlineThreshold: number, onlineThreshold?: number): DebounceThresholds {
  return {
    toOffline: offlineThreshold * 1000,
    toOnline: (onlineThreshold ?? offlineThreshold) * 1000
  };
}

/** Probe errors count as unreachable. */
export function statusFromOutcome(outcome: ProbeOutcome): PresenceStatus {
  return outcome.status === 'reachable' ? 'online' : 'offline';
}

/**
 * Turns timestamped probe samples into confirmed transitions.
 *
 * The first sample sets the baseline without an event. A differing observation
 * becomes a pending candidate; once a later sample still agrees with it and at
 * least the threshold has elapsed since the candidate's first sample, the
 * candidate is promoted. The transition boundary is the candidate's first
 * sample, not the confirming one.
 */
export class PresenceStateMachine {
  private state: MonitorState | null = null;

  constructor(private readonly thresholds: DebounceThresholds) {}

  hasBaseline(): boolean {
    return this.state !== null;
  }

  getState(): MonitorState | null {
    return this.state ? { ...this.state } : null;
  }

  thresholdFor(status: PresenceStatus): number {
    return status === 'offline' ? this.thresholds.toOffline : this.thresholds.toOnline;
  }

  observe(sample: ProbeSample): StateEvent | null {
    const observed = statusFromOutcome(sample.outcome);
    const state = this.state;

    if (!state) {
      this.state = {
        currentStatus: observed,
        statusSince: sample.timestamp,
        pendingStatus: null,
        pendingSince: null
      };
      return null;
    }

    if (observed === state.currentStatus) {
      state.pendingStatus = null;
      state.pendingSince = null;
      return null;
    }

    if (state.pendingStatus !== observed || state.pendingSince === null) {
      state.pendingStatus = observed;
      state.pendingSince = sample.timestamp;
      return null;
    }

    if (sample.timestamp - state.pendingSince < this.thresholdFor(observed)) {
      return null;
    }

    const event: StateEvent = Object.freeze({
      from: state.currentStatus,
      to: observed,
      startedAt: state.statusSince,
      endedAt: state.pendingSince,
      durationMs: state.pendingSince - state.statusSince
    });

    state.currentStatus = observed;
    state.statusSince = state.pendingSince;
    state.pendingStatus = null;
    state.pendingSince = null;

    return event;
  }
}
