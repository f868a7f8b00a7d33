/**
 * Capability contracts for the network location services.
 * The resolver depends only on these, so each can be swapped or faked.
 */

/**
 * Coordinates plus whatever naming the service returned.
 */
export interface IpLocation {
  readonly latitude: number;
  readonly longitude: number;
  readonly city?: string;
  readonly region?: string;
  readonly country?: string;
}

/**
 * Estimates the caller's position from their network address.
 */
export interface IpLocator {
  /**
   * @throws Error when the service is unreachable or returns no usable coordinates
   */
  locate(): Promise<IpLocation>;
}

/**
 * Forward geocoding input.
 */
export type GeocodeQuery =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'postalcode'; readonly postalcode: string; readonly country?: string };

/**
 * Best match for a geocoding query.
 */
export interface GeocodeMatch {
  readonly latitude: number;
  readonly longitude: number;
  /** Full comma-separated label, most specific part first */
  readonly label: string;
}

/**
 * Translates place names and postal codes into coordinates.
 */
export interface Geocoder {
  /**
   * @returns The best match, or undefined when nothing matched
   * @throws Error when the service is unreachable or the response is malformed
   */
  geocode(query: GeocodeQuery): Promise<GeocodeMatch | undefined>;
}
