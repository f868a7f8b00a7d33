import { describe, it, expect } from 'vitest';
import { zonedWallClockInstant, zoneOffsetMinutes } from './offset.js';
import { createTimeZoneId } from '../domain/types.js';

const paris = createTimeZoneId('Europe/Paris');
const newYork = createTimeZoneId('America/New_York');
const kolkata = createTimeZoneId('Asia/Kolkata');
const apia = createTimeZoneId('Pacific/Apia');
const utc = createTimeZoneId('UTC');

describe('zoneOffsetMinutes', () => {
  it('reads east and west offsets', () => {
    expect(zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), paris)).toBe(120);
    expect(zoneOffsetMinutes(new Date('2025-01-15T12:00:00Z'), newYork)).toBe(-300);
    expect(zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), kolkata)).toBe(330);
    expect(zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), apia)).toBe(780);
  });

  it('is zero for UTC', () => {
    expect(zoneOffsetMinutes(new Date('2025-06-21T12:00:00Z'), utc)).toBe(0);
  });
});

describe('zonedWallClockInstant', () => {
  it('finds the instant a zone reads the given hour', () => {
    const date = { year: 2025, month: 6, day: 21 };

    expect(zonedWallClockInstant(date, 12, newYork).toISOString()).toBe('2025-06-21T16:00:00.000Z');
    expect(zonedWallClockInstant(date, 12, kolkata).toISOString()).toBe('2025-06-21T06:30:00.000Z');
    expect(zonedWallClockInstant(date, 12, apia).toISOString()).toBe('2025-06-20T23:00:00.000Z');
  });

  it('uses the summer offset after the spring change', () => {
    expect(zonedWallClockInstant({ year: 2025, month: 3, day: 30 }, 12, paris).toISOString()).toBe(
      '2025-03-30T10:00:00.000Z',
    );
  });
});
