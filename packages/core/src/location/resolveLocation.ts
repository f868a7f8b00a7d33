import { DaylightError, describeError } from '../domain/errors.js';
import { silentLogger, type Logger } from '../domain/logger.js';
import type { Location, LocationRequest } from '../domain/types.js';
import { coordinatesSchema } from '../domain/validation.js';
import type { GeocodeMatch, GeocodeQuery, Geocoder, IpLocation, IpLocator } from './services.js';

/**
 * Collaborators the location resolver needs.
 */
export interface LocationServices {
  readonly ipLocator: IpLocator;
  readonly geocoder: Geocoder;
  readonly logger?: Logger;
}

/**
 * Display name for an IP lookup: "City, Region", or "City, Country" when
 * the region is empty.
 */
export function ipDisplayName(place: IpLocation): string {
  const city = place.city || 'Unknown';
  if (place.region) {
    return `${city}, ${place.region}`;
  }
  if (place.country) {
    return `${city}, ${place.country}`;
  }
  return city;
}

/**
 * First comma-separated segment of a geocoder label.
 */
export function primaryLabel(label: string): string {
  return (label.split(',')[0] ?? '').trim();
}

/**
 * Checks user-supplied coordinates and names them after themselves.
 *
 * @throws DaylightError `InvalidCoordinates` if either value is out of range or not finite
 */
export function coordinatesLocation(latitude: number, longitude: number): Location {
  const parsed = coordinatesSchema.safeParse({ latitude, longitude });
  if (!parsed.success) {
    throw new DaylightError(
      'InvalidCoordinates',
      `Invalid coordinates (${latitude}, ${longitude}): latitude must be in [-90, 90] and longitude in [-180, 180]`,
    );
  }
  return {
    latitude: parsed.data.latitude,
    longitude: parsed.data.longitude,
    displayName: `Custom Location (${latitude}, ${longitude})`,
  };
}

/**
 * Resolves a location request to coordinates and a display name.
 *
 * @throws DaylightError `GeolocationUnavailable`, `LocationNotFound`,
 *         `GeocodingFailed` or `InvalidCoordinates`
 */
export async function resolveLocation(
  request: LocationRequest,
  services: LocationServices,
): Promise<Location> {
  const logger = services.logger ?? silentLogger;

  switch (request.mode) {
    case 'auto':
      return locateByIp(services.ipLocator, logger);
    case 'name': {
      const match = await geocodeOrFail(
        services.geocoder,
        { kind: 'text', text: request.name },
        `Could not find location: ${request.name}`,
      );
      // The query as typed ("Paris, France") reads better than the
      // geocoder's most specific label segment ("Paris")
      return {
        latitude: match.latitude,
        longitude: match.longitude,
        displayName: request.name.trim() || primaryLabel(match.label),
      };
    }
    case 'zipcode': {
      const match = await geocodeOrFail(
        services.geocoder,
        { kind: 'postalcode', postalcode: request.zipcode, country: request.country },
        `Could not find location for ZIP code: ${request.zipcode}`,
      );
      const label = primaryLabel(match.label);
      return {
        latitude: match.latitude,
        longitude: match.longitude,
        displayName: label ? `${label}, ${request.zipcode}` : request.zipcode,
      };
    }
    case 'coordinates':
      return coordinatesLocation(request.latitude, request.longitude);
    default: {
      // Exhaustive check - TypeScript will error if a mode is missing
      const _exhaustive: never = request;
      throw new Error(`Unknown location mode: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

async function locateByIp(ipLocator: IpLocator, logger: Logger): Promise<Location> {
  let place: IpLocation;
  try {
    place = await ipLocator.locate();
  } catch (error) {
    throw new DaylightError(
      'GeolocationUnavailable',
      `Error determining location from IP: ${describeError(error)}`,
      { cause: error },
    );
  }

  const parsed = coordinatesSchema.safeParse(place);
  if (!parsed.success) {
    throw new DaylightError(
      'GeolocationUnavailable',
      'Error determining location from IP: service returned unusable coordinates',
    );
  }

  const displayName = ipDisplayName(place);
  logger.debug(`IP geolocation: ${displayName} (${parsed.data.latitude}, ${parsed.data.longitude})`);
  return { ...parsed.data, displayName };
}

async function geocodeOrFail(
  geocoder: Geocoder,
  query: GeocodeQuery,
  notFoundMessage: string,
): Promise<GeocodeMatch> {
  let match: GeocodeMatch | undefined;
  try {
    match = await geocoder.geocode(query);
  } catch (error) {
    throw new DaylightError('GeocodingFailed', `Geocoding failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!match) {
    throw new DaylightError('LocationNotFound', notFoundMessage);
  }

  const parsed = coordinatesSchema.safeParse(match);
  if (!parsed.success) {
    throw new DaylightError(
      'GeocodingFailed',
      `Geocoding failed: service returned out-of-range coordinates (${match.latitude}, ${match.longitude})`,
    );
  }
  return match;
}
