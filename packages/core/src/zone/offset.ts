import type { DateSelection, TimeZoneId } from '../domain/types.js';
import { utcStartOfDate } from '../date/calendar.js';

const MS_PER_MINUTE = 60000;

/**
 * Offset of a zone from UTC at an instant, in minutes (east positive).
 *
 * @example
 * zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), 'Europe/Paris') // 120
 * zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), 'America/New_York') // -240
 */
export function zoneOffsetMinutes(date: Date, zone: TimeZoneId): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: zone,
    timeZoneName: 'longOffset',
  });
  const name = formatter.formatToParts(date).find((p) => p.type === 'timeZoneName')?.value ?? 'GMT';

  // "GMT" alone means a zero offset
  const match = /^GMT([+-])(\d{1,2})(?::(\d{2}))?$/.exec(name);
  if (!match) {
    return 0;
  }
  const [, sign = '+', hours = '0', minutes = '0'] = match;
  const total = Number(hours) * 60 + Number(minutes);
  return sign === '-' ? -total : total;
}

/**
 * The instant the zone's wall clock reads `hour:00` on a calendar date.
 *
 * The offset is read twice: once at the naive UTC guess and once at the
 * corrected instant, which settles dates where the offset changes between
 * the two (DST days, Samoa's 2011 date-line jump).
 */
export function zonedWallClockInstant(date: DateSelection, hour: number, zone: TimeZoneId): Date {
  const naive = utcStartOfDate(date) + hour * 60 * MS_PER_MINUTE;
  const first = naive - zoneOffsetMinutes(new Date(naive), zone) * MS_PER_MINUTE;
  return new Date(naive - zoneOffsetMinutes(new Date(first), zone) * MS_PER_MINUTE);
}
