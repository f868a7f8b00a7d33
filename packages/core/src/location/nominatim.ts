import type { DaylightConfig } from '../domain/config.js';
import { nominatimResponseSchema } from '../domain/validation.js';
import { getJson, type FetchFn } from './http.js';
import type { GeocodeMatch, GeocodeQuery, Geocoder } from './services.js';

/**
 * Builds the Nominatim `/search` URL for a query. Only the best match is requested.
 */
export function buildSearchUrl(baseUrl: string, query: GeocodeQuery): URL {
  const url = new URL(baseUrl);
  if (query.kind === 'text') {
    url.searchParams.set('q', query.text);
  } else {
    url.searchParams.set('postalcode', query.postalcode);
    if (query.country) {
      url.searchParams.set('countrycodes', query.country.toLowerCase());
    }
  }
  url.searchParams.set('format', 'json');
  url.searchParams.set('limit', '1');
  return url;
}

/**
 * Geocoder backed by OpenStreetMap Nominatim.
 */
export class NominatimGeocoder implements Geocoder {
  constructor(
    private readonly config: DaylightConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async geocode(query: GeocodeQuery): Promise<GeocodeMatch | undefined> {
    const body = await getJson(buildSearchUrl(this.config.nominatimUrl, query), {
      fetch: this.fetchFn,
      userAgent: this.config.userAgent,
      timeoutMs: this.config.requestTimeoutMs,
    });

    const parsed = nominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Unexpected response from geocoding service');
    }

    const best = parsed.data[0];
    if (!best) {
      return undefined;
    }
    return { latitude: best.lat, longitude: best.lon, label: best.display_name };
  }
}
