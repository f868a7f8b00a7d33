/**
 * Domain module public exports.
 * This module contains the core types, errors, validation and configuration.
 */

// Types
export type {
  TimeZoneId,
  Location,
  DateSelection,
  DateShortcut,
  LocationRequest,
  LocationMode,
  OutputMode,
  ZoneResolution,
  ElapsedTime,
  NormalSolarResult,
  PolarSolarResult,
  SolarResult,
  SolarMarker,
} from './types.js';

export { isTimeZoneId, createTimeZoneId, UTC_ZONE } from './types.js';

// Errors
export type { DaylightErrorKind } from './errors.js';
export { DaylightError, isDaylightError, describeError } from './errors.js';

// Validation schemas
export type { IpInfoResponse, NominatimPlace } from './validation.js';
export {
  latitudeSchema,
  longitudeSchema,
  coordinatesSchema,
  isoDateSchema,
  ipInfoResponseSchema,
  nominatimPlaceSchema,
  nominatimResponseSchema,
} from './validation.js';

// Configuration
export type { DaylightConfig, DaylightConfigOverrides } from './config.js';
export { daylightConfigSchema, createConfig, DEFAULT_CONFIG } from './config.js';

// Logging
export type { Logger } from './logger.js';
export { silentLogger } from './logger.js';
