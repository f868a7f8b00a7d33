import { describe, it, expect } from 'vitest';
import {
  formatClockTime,
  formatElapsed,
  formatLongDate,
  toZonedIsoString,
  utcOffset,
  zonedParts,
} from './zoned.js';
import { createTimeZoneId } from '../domain/types.js';

const paris = createTimeZoneId('Europe/Paris');
const newYork = createTimeZoneId('America/New_York');
const kolkata = createTimeZoneId('Asia/Kolkata');
const utc = createTimeZoneId('UTC');

describe('zonedParts', () => {
  it('reads wall-clock components in the zone', () => {
    expect(zonedParts(new Date('2025-06-21T22:30:05Z'), paris)).toEqual({
      year: 2025,
      month: 6,
      day: 22,
      hour: 0,
      minute: 30,
      second: 5,
    });
  });
});

describe('utcOffset', () => {
  it('follows daylight saving time', () => {
    expect(utcOffset(new Date('2025-01-15T12:00:00Z'), paris)).toBe('+01:00');
    expect(utcOffset(new Date('2025-06-21T12:00:00Z'), paris)).toBe('+02:00');
    expect(utcOffset(new Date('2025-01-15T12:00:00Z'), newYork)).toBe('-05:00');
  });

  it('handles half-hour and zero offsets', () => {
    expect(utcOffset(new Date('2025-06-21T12:00:00Z'), kolkata)).toBe('+05:30');
    expect(utcOffset(new Date('2025-06-21T12:00:00Z'), utc)).toBe('+00:00');
  });
});

describe('toZonedIsoString', () => {
  it('renders local time with the offset', () => {
    expect(toZonedIsoString(new Date('2025-06-21T03:47:12.900Z'), paris)).toBe('2025-06-21T05:47:12+02:00');
    expect(toZonedIsoString(new Date('2025-03-09T06:59:59Z'), newYork)).toBe('2025-03-09T01:59:59-05:00');
    expect(toZonedIsoString(new Date('2025-03-09T07:00:00Z'), newYork)).toBe('2025-03-09T03:00:00-04:00');
  });
});

describe('formatClockTime', () => {
  it('uses a 24-hour clock', () => {
    expect(formatClockTime(new Date('2025-06-21T19:58:04Z'), paris)).toBe('21:58');
    expect(formatClockTime(new Date('2025-06-21T22:05:00Z'), paris)).toBe('00:05');
  });
});

describe('formatLongDate', () => {
  it('spells out the weekday and month', () => {
    expect(formatLongDate({ year: 2025, month: 6, day: 21 })).toBe('Saturday, June 21, 2025');
    expect(formatLongDate({ year: 2024, month: 2, day: 29 })).toBe('Thursday, February 29, 2024');
  });
});

describe('formatElapsed', () => {
  it('zero-pads every component', () => {
    expect(formatElapsed({ hours: 9, minutes: 5, seconds: 3 })).toBe('09:05:03');
    expect(formatElapsed({ hours: 24, minutes: 0, seconds: 0 })).toBe('24:00:00');
  });
});
