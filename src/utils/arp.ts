import { isCommandMissing } from './command';
import type { CommandRunner } from './command';

export interface NeighborEntry {
  ip: string;
  mac: string | null;
  /** Upper-case kernel state (REACHABLE, STALE, ...) or UNKNOWN when the tool reports none. */
  state: string;
}

const MAC_PATTERN = /^([0-9a-f]{1,2}[:-]){5}[0-9a-f]{1,2}$/i;

const INVALID_STATES = new Set(['FAILED', 'INCOMPLETE']);

export function isMacAddress(value: string): boolean {
  return MAC_PATTERN.test(value);
}

/** Lower-case, colon separated, zero padded: `0:1B-2c...` becomes `00:1b:2c...`. */
export function normalizeMac(mac: string): string {
  return mac
    .toLowerCase()
    .split(/[:-]/)
    .map((octet) => octet.padStart(2, '0'))
    .join(':');
}

function parseIpNeighLine(tokens: string[]): NeighborEntry | null {
  // 192.168.1.5 dev eth0 lladdr 00:11:22:33:44:55 REACHABLE
  if (tokens.length < 3 || tokens[1] !== 'dev') return null;
  const lladdr = tokens.indexOf('lladdr');
  const mac = lladdr >= 0 ? tokens[lladdr + 1] : undefined;
  return {
    ip: tokens[0],
    mac: mac && isMacAddress(mac) ? normalizeMac(mac) : null,
    state: tokens[tokens.length - 1].toUpperCase()
  };
}

/**
 * Parses the neighbour table printed by `ip neigh show`, `arp -an` (Linux and BSD)
 * or `arp -a` (Windows).
 */
export function parseNeighborTable(output: string): NeighborEntry[] {
  const entries: NeighborEntry[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const tokens = line.split(/\s+/);
    const neigh = parseIpNeighLine(tokens);
    if (neigh) {
      entries.push(neigh);
      continue;
    }

    // ? (192.168.1.5) at 00:11:22:33:44:55 [ether] on eth0
    const bsd = /\(([^)]+)\)\s+at\s+(\S+)/.exec(line);
    if (bsd) {
      const mac = isMacAddress(bsd[2]) ? normalizeMac(bsd[2]) : null;
      entries.push({ ip: bsd[1], mac, state: mac ? 'UNKNOWN' : 'INCOMPLETE' });
      continue;
    }

    //   192.168.1.5           00-11-22-33-44-55     dynamic
    if (tokens.length >= 2 && /^[0-9.]+$/.test(tokens[0]) && isMacAddress(tokens[1])) {
      entries.push({ ip: tokens[0], mac: normalizeMac(tokens[1]), state: 'UNKNOWN' });
    }
  }

  return entries;
}

export interface NeighborMatch {
  mac: string;
  ip?: string;
  acceptStale: boolean;
}

export function findNeighbor(entries: NeighborEntry[], match: NeighborMatch): NeighborEntry | undefined {
  const wanted = normalizeMac(match.mac);
  return entries.find((entry) => {
    if (entry.mac !== wanted) return false;
    if (match.ip && entry.ip !== match.ip) return false;
    if (INVALID_STATES.has(entry.state)) return false;
    if (entry.state === 'STALE' && !match.acceptStale) return false;
    return true;
  });
}

const NEIGHBOR_COMMANDS: Array<[string, string[]]> = [
  ['ip', ['neigh', 'show']],
  ['arp', ['-an']]
];

/**
 * Reads the neighbour table with the first tool that is installed.
 * Rejects when none is available or the command fails.
 */
export async function readNeighborTable(run: CommandRunner, timeoutMs: number): Promise<NeighborEntry[]> {
  let lastError: unknown = new Error('No neighbour table command available');

  for (const [file, args] of NEIGHBOR_COMMANDS) {
    try {
      const output = await run(file, args, timeoutMs);
      return parseNeighborTable(output);
    } catch (error) {
      if (!isCommandMissing(error)) throw error;
      lastError = error;
    }
  }

  throw lastError;
}
