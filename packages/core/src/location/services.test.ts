import { describe, it, expect, vi } from 'vitest';
import { IpInfoLocator, parseLoc } from './ipinfo.js';
import { NominatimGeocoder, buildSearchUrl } from './nominatim.js';
import type { FetchFn } from './http.js';
import { createConfig } from '../domain/config.js';

const config = createConfig({ userAgent: 'daylight-test/0.0' });

function jsonFetch(body: unknown, status = 200) {
  return vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }));
}

function requestedUrl(fetchFn: ReturnType<typeof jsonFetch>): string {
  const [input] = fetchFn.mock.calls[0] ?? [];
  return String(input);
}

describe('parseLoc', () => {
  it('parses "lat,lon"', () => {
    expect(parseLoc('48.8534,2.3488')).toEqual({ latitude: 48.8534, longitude: 2.3488 });
    expect(parseLoc(' -33.8678 , 151.2073 ')).toEqual({ latitude: -33.8678, longitude: 151.2073 });
  });

  it('rejects missing, malformed or out-of-range values', () => {
    expect(parseLoc(undefined)).toBeUndefined();
    expect(parseLoc('')).toBeUndefined();
    expect(parseLoc('48.8534')).toBeUndefined();
    expect(parseLoc('48.8534,2.3488,5')).toBeUndefined();
    expect(parseLoc('north,east')).toBeUndefined();
    expect(parseLoc('95,10')).toBeUndefined();
    expect(parseLoc(',10')).toBeUndefined();
  });
});

describe('IpInfoLocator', () => {
  it('reads coordinates and naming fields', async () => {
    const fetchFn = jsonFetch({
      ip: '203.0.113.7',
      city: 'Lyon',
      region: 'Auvergne-Rhône-Alpes',
      country: 'FR',
      loc: '45.7485,4.8467',
      timezone: 'Europe/Paris',
    });

    await expect(new IpInfoLocator(config, fetchFn).locate()).resolves.toEqual({
      latitude: 45.7485,
      longitude: 4.8467,
      city: 'Lyon',
      region: 'Auvergne-Rhône-Alpes',
      country: 'FR',
    });
    expect(requestedUrl(fetchFn)).toBe('https://ipinfo.io/json');
  });

  it('sends the configured user agent', async () => {
    const fetchFn = jsonFetch({ loc: '1,2' });
    await new IpInfoLocator(config, fetchFn).locate();

    const init = fetchFn.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get('User-Agent')).toBe('daylight-test/0.0');
  });

  it('throws when loc is missing', async () => {
    const fetchFn = jsonFetch({ city: 'Lyon', bogon: true });
    await expect(new IpInfoLocator(config, fetchFn).locate()).rejects.toThrow(
      'Could not determine location from IP',
    );
  });

  it('throws on a non-2xx status', async () => {
    const fetchFn = jsonFetch({ error: 'rate limited' }, 429);
    await expect(new IpInfoLocator(config, fetchFn).locate()).rejects.toThrow(
      'GET https://ipinfo.io/json failed (429)',
    );
  });

  it('throws on a body of the wrong shape', async () => {
    const fetchFn = jsonFetch({ city: 42, loc: '1,2' });
    await expect(new IpInfoLocator(config, fetchFn).locate()).rejects.toThrow(
      'Unexpected response from IP geolocation service',
    );
  });
});

describe('buildSearchUrl', () => {
  it('queries free text', () => {
    const url = buildSearchUrl('https://nominatim.openstreetmap.org/search', { kind: 'text', text: 'Paris, France' });
    expect(url.toString()).toBe(
      'https://nominatim.openstreetmap.org/search?q=Paris%2C+France&format=json&limit=1',
    );
  });

  it('queries postal codes with an optional country hint', () => {
    const base = 'https://nominatim.openstreetmap.org/search';
    expect(buildSearchUrl(base, { kind: 'postalcode', postalcode: '75001' }).toString()).toBe(
      'https://nominatim.openstreetmap.org/search?postalcode=75001&format=json&limit=1',
    );
    expect(buildSearchUrl(base, { kind: 'postalcode', postalcode: '75001', country: 'FR' }).toString()).toBe(
      'https://nominatim.openstreetmap.org/search?postalcode=75001&countrycodes=fr&format=json&limit=1',
    );
  });
});

describe('NominatimGeocoder', () => {
  it('returns the first match with numeric coordinates', async () => {
    const fetchFn = jsonFetch([
      { lat: '48.8588897', lon: '2.3200410', display_name: 'Paris, Île-de-France, France', importance: 0.9 },
      { lat: '33.6617962', lon: '-95.555513', display_name: 'Paris, Lamar County, Texas, United States' },
    ]);

    await expect(new NominatimGeocoder(config, fetchFn).geocode({ kind: 'text', text: 'Paris' })).resolves.toEqual({
      latitude: 48.8588897,
      longitude: 2.32004,
      label: 'Paris, Île-de-France, France',
    });
    expect(requestedUrl(fetchFn)).toBe('https://nominatim.openstreetmap.org/search?q=Paris&format=json&limit=1');
  });

  it('returns undefined for an empty result', async () => {
    const fetchFn = jsonFetch([]);
    await expect(
      new NominatimGeocoder(config, fetchFn).geocode({ kind: 'postalcode', postalcode: '00000' }),
    ).resolves.toBeUndefined();
  });

  it('throws on unparseable coordinates', async () => {
    const fetchFn = jsonFetch([{ lat: 'n/a', lon: '2.35', display_name: 'Paris' }]);
    await expect(new NominatimGeocoder(config, fetchFn).geocode({ kind: 'text', text: 'Paris' })).rejects.toThrow(
      'Unexpected response from geocoding service',
    );
  });

  it('propagates transport errors', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(new NominatimGeocoder(config, fetchFn).geocode({ kind: 'text', text: 'Paris' })).rejects.toThrow(
      'fetch failed',
    );
  });
});
