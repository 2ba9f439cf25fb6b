import { describe, it, expect, vi } from 'vitest';
import { findNeighbor, normalizeMac, parseNeighborTable, readNeighborTable } from '../src/utils/arp';

const IP_NEIGH = `192.168.1.1 dev eth0 lladdr 00:11:22:33:44:55 REACHABLE
192.168.1.20 dev eth0 lladdr AA:BB:CC:DD:EE:0F STALE
192.168.1.30 dev eth0 FAILED
192.168.1.40 dev eth0 lladdr 02:00:00:00:00:40 DELAY
fe80::1 dev eth0 lladdr 00:11:22:33:44:55 router STALE
`;

const ARP_AN = `? (192.168.1.1) at 00:11:22:33:44:55 [ether] on eth0
? (192.168.1.30) at <incomplete> on eth0
? (192.168.1.50) at 2:0:0:0:0:50 on en0 ifscope [ethernet]
`;

const WINDOWS_ARP = `
Interface: 192.168.1.2 --- 0x4
  Internet Address      Physical Address      Type
  192.168.1.1           00-11-22-33-44-55     dynamic
  192.168.1.255         ff-ff-ff-ff-ff-ff     static
`;

function enoent(): Error {
  return Object.assign(new Error('spawn ip ENOENT'), { code: 'ENOENT' });
}

describe('normalizeMac', () => {
  it('lower-cases, uses colons and pads octets', () => {
    expect(normalizeMac('AA-BB-CC-0-1-F')).toBe('aa:bb:cc:00:01:0f');
  });
});

describe('parseNeighborTable', () => {
  it('parses ip neigh output', () => {
    expect(parseNeighborTable(IP_NEIGH)).toEqual([
      { ip: '192.168.1.1', mac: '00:11:22:33:44:55', state: 'REACHABLE' },
      { ip: '192.168.1.20', mac: 'aa:bb:cc:dd:ee:0f', state: 'STALE' },
      { ip: '192.168.1.30', mac: null, state: 'FAILED' },
      { ip: '192.168.1.40', mac: '02:00:00:00:00:40', state: 'DELAY' },
      { ip: 'fe80::1', mac: '00:11:22:33:44:55', state: 'STALE' }
    ]);
  });

  it('parses arp -an output', () => {
    expect(parseNeighborTable(ARP_AN)).toEqual([
      { ip: '192.168.1.1', mac: '00:11:22:33:44:55', state: 'UNKNOWN' },
      { ip: '192.168.1.30', mac: null, state: 'INCOMPLETE' },
      { ip: '192.168.1.50', mac: '02:00:00:00:00:50', state: 'UNKNOWN' }
    ]);
  });

  it('parses Windows arp -a output', () => {
    expect(parseNeighborTable(WINDOWS_ARP)).toEqual([
      { ip: '192.168.1.1', mac: '00:11:22:33:44:55', state: 'UNKNOWN' },
      { ip: '192.168.1.255', mac: 'ff:ff:ff:ff:ff:ff', state: 'UNKNOWN' }
    ]);
  });
});

describe('findNeighbor', () => {
  const entries = parseNeighborTable(IP_NEIGH);

  it('matches regardless of case and separator', () => {
    expect(findNeighbor(entries, { mac: '00-11-22-33-44-55', acceptStale: false })?.ip).toBe('192.168.1.1');
  });

  it('requires the configured address when one is given', () => {
    expect(findNeighbor(entries, { mac: '00:11:22:33:44:55', ip: '192.168.1.99', acceptStale: false })).toBeUndefined();
    expect(findNeighbor(entries, { mac: '02:00:00:00:00:40', ip: '192.168.1.40', acceptStale: false })?.state).toBe('DELAY');
  });

  it('skips stale entries unless allowed', () => {
    expect(findNeighbor(entries, { mac: 'aa:bb:cc:dd:ee:0f', acceptStale: false })).toBeUndefined();
    expect(findNeighbor(entries, { mac: 'aa:bb:cc:dd:ee:0f', acceptStale: true })?.ip).toBe('192.168.1.20');
  });

  it('never matches incomplete entries', () => {
    const incomplete = [{ ip: '192.168.1.30', mac: '00:11:22:33:44:66', state: 'INCOMPLETE' }];
    expect(findNeighbor(incomplete, { mac: '00:11:22:33:44:66', acceptStale: true })).toBeUndefined();
  });
});

describe('readNeighborTable', () => {
  it('uses ip neigh when available', async () => {
    const run = vi.fn().mockResolvedValue(IP_NEIGH);

    const entries = await readNeighborTable(run, 2000);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith('ip', ['neigh', 'show'], 2000);
    expect(entries).toHaveLength(5);
  });

  it('falls back to arp when ip is not installed', async () => {
    const run = vi.fn().mockRejectedValueOnce(enoent()).mockResolvedValueOnce(ARP_AN);

    const entries = await readNeighborTable(run, 2000);

    expect(run).toHaveBeenNthCalledWith(2, 'arp', ['-an'], 2000);
    expect(entries).toHaveLength(3);
  });

  it('rejects when no tool is installed', async () => {
    const run = vi.fn().mockRejectedValue(enoent());

    await expect(readNeighborTable(run, 2000)).rejects.toThrow('spawn ip ENOENT');
  });

  it('rejects on other command failures without falling back', async () => {
    const run = vi.fn().mockRejectedValue(new Error('Command failed: ip neigh show'));

    await expect(readNeighborTable(run, 2000)).rejects.toThrow('Command failed');
    expect(run).toHaveBeenCalledTimes(1);
  });
});
