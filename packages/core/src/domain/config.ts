/**
 * Runtime configuration for the network-backed collaborators.
 * Passed explicitly; never read from files or the environment.
 */

import { z } from 'zod';

/**
 * Schema for DaylightConfig. Every field has a default.
 */
export const daylightConfigSchema = z.object({
  /** IP geolocation endpoint returning `{ city, region, country, loc }` */
  ipInfoUrl: z.string().url().default('https://ipinfo.io/json'),
  /** Nominatim search endpoint */
  nominatimUrl: z.string().url().default('https://nominatim.openstreetmap.org/search'),
  /** Nominatim's usage policy requires an identifying User-Agent */
  userAgent: z.string().min(1).default('daylight-cli/1.0'),
  /** Per-request timeout in milliseconds */
  requestTimeoutMs: z.number().int().positive().default(5000),
});

export type DaylightConfig = z.infer<typeof daylightConfigSchema>;

export type DaylightConfigOverrides = z.input<typeof daylightConfigSchema>;

/**
 * Builds a validated configuration, filling defaults for missing fields.
 * Throws a ZodError on invalid overrides.
 */
export function createConfig(overrides: DaylightConfigOverrides = {}): DaylightConfig {
  return daylightConfigSchema.parse(overrides);
}

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: DaylightConfig = createConfig();
