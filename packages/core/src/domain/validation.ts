/**
 * Zod validation schemas for values crossing the process boundary:
 * command-line input and the JSON bodies of the location services.
 */

import { z } from 'zod';

/**
 * Schema for latitude in degrees ([-90, 90]).
 */
export const latitudeSchema = z.number().finite().min(-90).max(90);

/**
 * Schema for longitude in degrees ([-180, 180]).
 */
export const longitudeSchema = z.number().finite().min(-180).max(180);

/**
 * Schema for a coordinate pair.
 */
export const coordinatesSchema = z.object({
  latitude: latitudeSchema,
  longitude: longitudeSchema,
});

/**
 * Schema for a strict `YYYY-MM-DD` string. Only the shape is checked here;
 * calendar validity is checked by the date resolver.
 */
export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

/**
 * Schema for a numeric string in a JSON body (e.g. Nominatim's "48.85").
 */
const numericStringSchema = z
  .string()
  .trim()
  .min(1)
  .transform((val) => Number(val))
  .pipe(z.number().finite());

/**
 * Schema for the ipinfo.io `/json` body. Only the fields we read.
 * `loc` is "lat,lon".
 */
export const ipInfoResponseSchema = z.object({
  city: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
  loc: z.string().optional(),
});

export type IpInfoResponse = z.infer<typeof ipInfoResponseSchema>;

/**
 * Schema for one Nominatim `/search` match.
 */
export const nominatimPlaceSchema = z.object({
  lat: numericStringSchema,
  lon: numericStringSchema,
  display_name: z.string().default(''),
});

export type NominatimPlace = z.infer<typeof nominatimPlaceSchema>;

/**
 * Schema for the Nominatim `/search` body (array of matches, best first).
 */
export const nominatimResponseSchema = z.array(nominatimPlaceSchema);
