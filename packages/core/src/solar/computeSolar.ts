import { DaylightError, describeError } from '../domain/errors.js';
import type {
  DateSelection,
  ElapsedTime,
  Location,
  SolarResult,
  ZoneResolution,
} from '../domain/types.js';
import { zonedWallClockInstant } from '../zone/offset.js';
import { getPosition, getTimes, type SunTimes } from './suncalc-wrapper.js';

export const SECONDS_PER_DAY = 86400;

/**
 * The astronomical capability the calculator depends on.
 */
export interface SolarCalculator {
  /** Sun event instants for the day whose solar transit is nearest `date` */
  times(date: Date, latitude: number, longitude: number): SunTimes;
  /** Sun altitude above the horizon in radians */
  altitude(date: Date, latitude: number, longitude: number): number;
}

/**
 * SolarCalculator backed by suncalc.
 */
export const suncalcCalculator: SolarCalculator = {
  times: (date, latitude, longitude) => getTimes(date, latitude, longitude),
  altitude: (date, latitude, longitude) => getPosition(date, latitude, longitude).altitude,
};

function isValidInstant(date: Date | undefined): date is Date {
  return date instanceof Date && !Number.isNaN(date.getTime());
}

/**
 * Drops sub-second precision so durations are exact in whole seconds.
 */
function truncateToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Noon on the zone's wall clock for a calendar date. suncalc returns the
 * events of the solar day whose transit is nearest this instant, so the
 * events land on `date` as the zone counts days, even where the zone sits
 * across the date line from its longitude (Samoa, Kiribati).
 */
export function referenceInstant(date: DateSelection, zone: ZoneResolution): Date {
  return zonedWallClockInstant(date, 12, zone.zone);
}

/**
 * Splits a whole number of seconds into hours, minutes and seconds.
 *
 * @example
 * toElapsedTime(86400) // { hours: 24, minutes: 0, seconds: 0 }
 */
export function toElapsedTime(totalSeconds: number): ElapsedTime {
  const whole = Math.max(0, Math.round(totalSeconds));
  return {
    hours: Math.floor(whole / 3600),
    minutes: Math.floor((whole % 3600) / 60),
    seconds: whole % 60,
  };
}

/**
 * Computes sunrise, sunset and daylight for a date and location.
 *
 * When the sun does not cross the horizon on the date, the result is
 * marked `all_day` (sun above the horizon at solar noon, 24h of daylight)
 * or `all_night` (0h).
 *
 * @throws DaylightError `SolarComputationError` when the calculator fails or
 *         returns inconsistent instants
 */
export function computeSolar(
  date: DateSelection,
  location: Location,
  zone: ZoneResolution,
  calculator: SolarCalculator = suncalcCalculator,
): SolarResult {
  const reference = referenceInstant(date, zone);

  let times: SunTimes;
  try {
    times = calculator.times(reference, location.latitude, location.longitude);
  } catch (error) {
    throw new DaylightError(
      'SolarComputationError',
      `Error calculating sunlight data: ${describeError(error)}`,
      { cause: error },
    );
  }

  if (!isValidInstant(times.solarNoon)) {
    throw new DaylightError(
      'SolarComputationError',
      `Error calculating sunlight data: no solar noon for (${location.latitude}, ${location.longitude})`,
    );
  }

  const base = {
    date,
    location,
    zone,
    solarNoon: truncateToSecond(times.solarNoon),
    civilDawn: isValidInstant(times.dawn) ? truncateToSecond(times.dawn) : undefined,
    civilDusk: isValidInstant(times.dusk) ? truncateToSecond(times.dusk) : undefined,
  };

  if (!isValidInstant(times.sunrise) || !isValidInstant(times.sunset)) {
    const sunUp = calculator.altitude(times.solarNoon, location.latitude, location.longitude) > 0;
    return sunUp
      ? { ...base, kind: 'all_day', daylightSeconds: SECONDS_PER_DAY }
      : { ...base, kind: 'all_night', daylightSeconds: 0 };
  }

  const sunrise = truncateToSecond(times.sunrise);
  const sunset = truncateToSecond(times.sunset);
  const daylightMs = sunset.getTime() - sunrise.getTime();
  if (daylightMs < 0) {
    throw new DaylightError(
      'SolarComputationError',
      `Error calculating sunlight data: sunset precedes sunrise on ${sunrise.toISOString()}`,
    );
  }

  return { ...base, kind: 'normal', sunrise, sunset, daylightSeconds: daylightMs / 1000 };
}
