import { find } from 'geo-tz';
import { DaylightError, describeError } from '../domain/errors.js';
import { silentLogger, type Logger } from '../domain/logger.js';
import {
  isTimeZoneId,
  UTC_ZONE,
  type Location,
  type TimeZoneId,
  type ZoneResolution,
} from '../domain/types.js';

/**
 * Returns the IANA zone candidates covering a coordinate, best first.
 */
export interface ZoneLookup {
  zonesAt(latitude: number, longitude: number): readonly string[];
}

/**
 * ZoneLookup backed by geo-tz's offline boundary data.
 */
export const geoTzLookup: ZoneLookup = {
  zonesAt: (latitude, longitude) => find(latitude, longitude),
};

/**
 * Looks up the zone for a location.
 *
 * @throws DaylightError `TimeZoneResolutionFailed` when the lookup yields no usable zone
 */
export function lookupZone(
  location: Location,
  lookup: ZoneLookup,
  logger: Logger = silentLogger,
): TimeZoneId {
  let candidates: readonly string[];
  try {
    candidates = lookup.zonesAt(location.latitude, location.longitude);
  } catch (error) {
    throw new DaylightError(
      'TimeZoneResolutionFailed',
      `Time zone lookup failed for (${location.latitude}, ${location.longitude}): ${describeError(error)}`,
      { cause: error },
    );
  }

  if (candidates.length > 1) {
    logger.debug(
      `Ambiguous time zones for (${location.latitude}, ${location.longitude}): ${candidates.join(', ')}`,
    );
  }

  const zone = candidates.find(isTimeZoneId);
  if (zone === undefined) {
    throw new DaylightError(
      'TimeZoneResolutionFailed',
      `No time zone found for (${location.latitude}, ${location.longitude})`,
    );
  }
  return zone;
}

/**
 * Resolves the display zone for a location. A failed lookup is not fatal:
 * it is logged as a warning and UTC is used instead.
 */
export function resolveZone(
  location: Location,
  lookup: ZoneLookup = geoTzLookup,
  logger: Logger = silentLogger,
): ZoneResolution {
  try {
    return { zone: lookupZone(location, lookup, logger), fallback: false };
  } catch (error) {
    if (!(error instanceof DaylightError) || error.kind !== 'TimeZoneResolutionFailed') {
      throw error;
    }
    logger.warn(`Warning: ${error.message}; using UTC`);
    return { zone: UTC_ZONE, fallback: true };
  }
}
