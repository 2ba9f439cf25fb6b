import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  formatEventLine,
  formatInterval,
  formatNotification,
  formatTimestamp
} from '../src/utils/format';
import type { StateEvent } from '../src/types';

// Local time, so the formatted output does not depend on the machine's zone.
const start = new Date(2025, 6, 13, 22, 10, 0).getTime();
const end = new Date(2025, 6, 13, 22, 20, 0).getTime();

describe('formatTimestamp', () => {
  it('uses yyyyMMdd_HHmmss', () => {
    expect(formatTimestamp(start)).toBe('20250713_221000');
    expect(formatTimestamp(new Date(2025, 0, 2, 3, 4, 5).getTime())).toBe('20250102_030405');
  });
});

describe('formatDuration', () => {
  it('formats minutes', () => {
    expect(formatDuration(600_000)).toBe('10 minutes');
  });

  it('formats hours with minutes and seconds', () => {
    expect(formatDuration(3_700_000)).toBe('1 hour 1 minute 40 seconds');
  });

  it('skips zero components', () => {
    expect(formatDuration(3_600_000)).toBe('1 hour');
    expect(formatDuration(90_061_000)).toBe('25 hours 1 minute 1 second');
  });

  it('formats zero and sub-second durations as zero seconds', () => {
    expect(formatDuration(0)).toBe('0 seconds');
    expect(formatDuration(999)).toBe('0 seconds');
  });

  it('formats in Chinese', () => {
    expect(formatDuration(600_000, 'zh')).toBe('10 分钟');
  });

  it('never shows a smaller magnitude for a longer duration', () => {
    const leading = (label: string) => {
      const [count, unit] = label.split(' ');
      const scale = unit.startsWith('hour') ? 3600 : unit.startsWith('minute') ? 60 : 1;
      return Number(count) * scale;
    };

    let previous = 0;
    for (const seconds of [0, 1, 59, 60, 61, 599, 600, 3599, 3600, 3700, 7200, 86400]) {
      const magnitude = leading(formatDuration(seconds * 1000));
      expect(magnitude).toBeGreaterThanOrEqual(previous);
      previous = magnitude;
    }
  });
});

describe('log lines', () => {
  const event: StateEvent = { from: 'online', to: 'offline', startedAt: start, endedAt: end, durationMs: end - start };

  it('formats a completed interval', () => {
    expect(formatEventLine(event)).toBe('20250713_221000->20250713_222000 [Online, 10 minutes]');
  });

  it('formats a completed interval in Chinese', () => {
    expect(formatEventLine(event, 'zh')).toBe('20250713_221000->20250713_222000 [在线10 分钟]');
  });

  it('formats an arbitrary interval', () => {
    expect(formatInterval('offline', start, start + 3_700_000)).toBe(
      '20250713_221000->20250713_231140 [Offline, 1 hour 1 minute 40 seconds]'
    );
  });

  it('builds the notification from the log line', () => {
    expect(formatNotification(event, '192.168.1.20')).toBe(
      'Device 192.168.1.20 is offline. 20250713_221000->20250713_222000 [Online, 10 minutes]'
    );
    expect(formatNotification({ ...event, from: 'offline', to: 'online' }, '192.168.1.20', 'zh')).toBe(
      '设备 192.168.1.20 已上线。20250713_221000->20250713_222000 [离线10 分钟]'
    );
  });
});
