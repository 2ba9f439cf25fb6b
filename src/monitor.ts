import { ping } from './utils/ping';
import { readNeighborTable, findNeighbor } from './utils/arp';
import { runCommand } from './utils/command';
import type { CommandRunner } from './utils/command';
import type { IpTarget, MacTarget, ProbeOutcome, Target } from './types';
import { getErrorMessage, withTimeout } from './errors';
import { Logger } from './utils/logger';

interface ProberConfig {
  /** Milliseconds a whole probe may take, refresh ping included. */
  timeout: number;
  runCommand?: CommandRunner;
}

export function describeTarget(target: Target): string {
  return target.kind === 'mac' ? target.mac : target.ip;
}

/**
 * Runs one reachability check. Every failure path resolves to an outcome;
 * `probe` never rejects.
 */
export class ReachabilityProber {
  private logger: Logger;
  private config: ProberConfig;
  private run: CommandRunner;

  constructor(config: ProberConfig) {
    this.config = config;
    this.run = config.runCommand ?? runCommand;
    this.logger = new Logger('PROBE', 'reachability');
  }

  private async checkIcmpTarget(target: IpTarget): Promise<ProbeOutcome> {
    return ping(target.ip, { timeout: this.config.timeout });
  }

  private async checkArpTarget(target: MacTarget): Promise<ProbeOutcome> {
    const deadline = Date.now() + this.config.timeout;

    if (target.ip) {
      // Refresh the neighbour cache; the reply itself does not decide presence.
      // It gets half the budget so the table read always has time left.
      const refresh = await ping(target.ip, { timeout: Math.floor(this.config.timeout / 2) });
      if (refresh.status === 'error') {
        this.logger.debug(`Neighbour refresh ping to ${target.ip} failed: ${refresh.error}`);
      }
    }

    const remaining = Math.max(1, deadline - Date.now());

    try {
      const entries = await withTimeout(readNeighborTable(this.run, remaining), remaining);
      const entry = findNeighbor(entries, {
        mac: target.mac,
        ip: target.ip,
        acceptStale: target.acceptStale
      });

      if (entry) {
        this.logger.debug(`${target.mac} found at ${entry.ip} (${entry.state})`);
        return { status: 'reachable' };
      }
      return { status: 'unreachable', reason: `${target.mac} not present in neighbour table` };
    } catch (error) {
      return { status: 'error', error: `Neighbour table lookup failed: ${getErrorMessage(error)}` };
    }
  }

  async probe(target: Target): Promise<ProbeOutcome> {
    try {
      const outcome = target.kind === 'mac'
        ? await this.checkArpTarget(target)
        : await this.checkIcmpTarget(target);

      if (outcome.status === 'reachable') {
        this.logger.debug(`${describeTarget(target)} is UP`);
      } else if (outcome.status === 'unreachable') {
        this.logger.debug(`${describeTarget(target)} is DOWN: ${outcome.reason}`);
      }

      return outcome;
    } catch (error) {
      return { status: 'error', error: getErrorMessage(error) };
    }
  }
}
