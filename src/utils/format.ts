import { format, formatDuration as formatDurationWithLocale } from 'date-fns';
import type { Locale as DateFnsLocale } from 'date-fns';
import { enUS, zhCN } from 'date-fns/locale';
import type { Locale, PresenceStatus, StateEvent } from '../types';

export const TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

interface Messages {
  dateLocale: DateFnsLocale;
  status: Record<PresenceStatus, string>;
  /** Placed between the status label and the duration in a log line. */
  separator: string;
  notify: (target: string, to: PresenceStatus, line: string) => string;
  heartbeat: (status: string, inStatus: string, uptime: string) => string;
  unknown: string;
}

const MESSAGES: Record<Locale, Messages> = {
  en: {
    dateLocale: enUS,
    status: { online: 'Online', offline: 'Offline' },
    separator: ', ',
    notify: (target, to, line) => `Device ${target} is ${to}. ${line}`,
    heartbeat: (status, inStatus, uptime) =>
      `[heartbeat] status: ${status} | in status: ${inStatus} | uptime: ${uptime}`,
    unknown: 'Unknown'
  },
  zh: {
    dateLocale: zhCN,
    status: { online: '在线', offline: '离线' },
    separator: '',
    notify: (target, to, line) => `设备 ${target} ${to === 'online' ? '已上线' : '已下线'}。${line}`,
    heartbeat: (status, inStatus, uptime) =>
      `[心跳] 当前状态: ${status} | 持续时间: ${inStatus} | 运行时间: ${uptime}`,
    unknown: '未知'
  }
};

export function messagesFor(locale: Locale): Messages {
  return MESSAGES[locale];
}

export function formatTimestamp(epochMs: number): string {
  return format(new Date(epochMs), TIMESTAMP_FORMAT);
}

/** Whole hours, minutes and seconds; sub-second remainders are truncated. */
export function formatDuration(durationMs: number, locale: Locale = 'en'): string {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const dateLocale = MESSAGES[locale].dateLocale;

  if (totalSeconds === 0) {
    return formatDurationWithLocale({ seconds: 0 }, { locale: dateLocale, zero: true, format: ['seconds'] });
  }

  return formatDurationWithLocale(
    { hours, minutes, seconds },
    { locale: dateLocale, format: ['hours', 'minutes', 'seconds'] }
  );
}

export function statusLabel(status: PresenceStatus, locale: Locale = 'en'): string {
  return MESSAGES[locale].status[status];
}

/** `20250713_221000->20250713_222000 [Online, 10 minutes]` */
export function formatInterval(
  status: PresenceStatus,
  startedAt: number,
  endedAt: number,
  locale: Locale = 'en'
): string {
  const messages = MESSAGES[locale];
  const duration = formatDuration(endedAt - startedAt, locale);
  return `${formatTimestamp(startedAt)}->${formatTimestamp(endedAt)} [${messages.status[status]}${messages.separator}${duration}]`;
}

export function formatEventLine(event: StateEvent, locale: Locale = 'en'): string {
  return formatInterval(event.from, event.startedAt, event.endedAt, locale);
}

export function formatNotification(event: StateEvent, target: string, locale: Locale = 'en'): string {
  return MESSAGES[locale].notify(target, event.to, formatEventLine(event, locale));
}
