import type { DaylightConfig } from '../domain/config.js';
import { coordinatesSchema, ipInfoResponseSchema } from '../domain/validation.js';
import { getJson, type FetchFn } from './http.js';
import type { IpLocation, IpLocator } from './services.js';

/**
 * Parses ipinfo's `loc` field ("lat,lon") into checked coordinates.
 *
 * @returns undefined when the field is missing, malformed or out of range
 */
export function parseLoc(loc: string | undefined): { latitude: number; longitude: number } | undefined {
  if (!loc) {
    return undefined;
  }
  const parts = loc.split(',');
  if (parts.length !== 2) {
    return undefined;
  }
  const [lat, lon] = parts.map((part) => part.trim());
  if (!lat || !lon) {
    return undefined;
  }
  const parsed = coordinatesSchema.safeParse({ latitude: Number(lat), longitude: Number(lon) });
  return parsed.success ? parsed.data : undefined;
}

/**
 * IpLocator backed by ipinfo.io.
 */
export class IpInfoLocator implements IpLocator {
  constructor(
    private readonly config: DaylightConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async locate(): Promise<IpLocation> {
    const body = await getJson(new URL(this.config.ipInfoUrl), {
      fetch: this.fetchFn,
      userAgent: this.config.userAgent,
      timeoutMs: this.config.requestTimeoutMs,
    });

    const parsed = ipInfoResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Unexpected response from IP geolocation service');
    }

    const coordinates = parseLoc(parsed.data.loc);
    if (!coordinates) {
      throw new Error('Could not determine location from IP');
    }

    return {
      ...coordinates,
      city: parsed.data.city,
      region: parsed.data.region,
      country: parsed.data.country,
    };
  }
}
