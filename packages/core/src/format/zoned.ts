import type { DateSelection, ElapsedTime, TimeZoneId } from '../domain/types.js';
import { zoneOffsetMinutes } from '../zone/offset.js';

/**
 * Wall-clock components of an instant in a time zone.
 */
export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Reads the wall-clock components of an instant in a zone.
 * Uses Intl.DateTimeFormat, so DST is whatever the runtime's tz data says
 * for that instant.
 */
export function zonedParts(date: Date, zone: TimeZoneId): ZonedParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: zone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hourCycle: 'h23',
  });

  const parts = formatter.formatToParts(date);
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value || '0', 10);

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

/**
 * UTC offset of a zone at an instant, as `+HH:MM` / `-HH:MM`.
 *
 * @example
 * utcOffset(new Date('2025-06-21T12:00:00Z'), 'Europe/Paris') // '+02:00'
 */
export function utcOffset(date: Date, zone: TimeZoneId): string {
  const offset = zoneOffsetMinutes(date, zone);
  const abs = Math.abs(offset);
  return `${offset < 0 ? '-' : '+'}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}

/**
 * ISO 8601 timestamp in the zone's local time with its offset,
 * e.g. `2025-06-21T05:47:12+02:00`.
 */
export function toZonedIsoString(date: Date, zone: TimeZoneId): string {
  const p = zonedParts(date, zone);
  const year = String(p.year).padStart(4, '0');
  return (
    `${year}-${pad2(p.month)}-${pad2(p.day)}` +
    `T${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}` +
    utcOffset(date, zone)
  );
}

/**
 * 24-hour `HH:MM` in the zone.
 */
export function formatClockTime(date: Date, zone: TimeZoneId): string {
  const p = zonedParts(date, zone);
  return `${pad2(p.hour)}:${pad2(p.minute)}`;
}

/**
 * Long English date, e.g. `Saturday, June 21, 2025`.
 */
export function formatLongDate(date: DateSelection): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: 'numeric',
  }).format(new Date(Date.UTC(date.year, date.month - 1, date.day)));
}

/**
 * `HH:MM:SS`; hours may reach 24.
 */
export function formatElapsed(elapsed: ElapsedTime): string {
  return `${pad2(elapsed.hours)}:${pad2(elapsed.minutes)}:${pad2(elapsed.seconds)}`;
}
