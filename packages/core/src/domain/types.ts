/**
 * Core domain types for sunrise/sunset reporting.
 * Every value here lives for a single invocation and is never mutated.
 */

/**
 * Branded type for IANA time zone identifiers (e.g. "Europe/Paris").
 * Provides type safety to distinguish zone IDs from other strings.
 */
export type TimeZoneId = string & { readonly __brand: 'TimeZoneId' };

/**
 * Type guard: true when the runtime's Intl data knows the zone.
 */
export function isTimeZoneId(value: string): value is TimeZoneId {
  if (value.length === 0) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a TimeZoneId from a string, throwing if the zone is unknown.
 */
export function createTimeZoneId(value: string): TimeZoneId {
  if (!isTimeZoneId(value)) {
    throw new Error(`Unknown time zone: "${value}"`);
  }
  return value;
}

/**
 * Zone used when no zone can be resolved for a location.
 */
export const UTC_ZONE: TimeZoneId = createTimeZoneId('UTC');

/**
 * A resolved place on Earth.
 */
export interface Location {
  /** Latitude in degrees, range [-90, 90] */
  readonly latitude: number;
  /** Longitude in degrees, range [-180, 180] */
  readonly longitude: number;
  /** Human-readable name shown in output */
  readonly displayName: string;
}

/**
 * A Gregorian calendar date with no time component.
 */
export interface DateSelection {
  readonly year: number;
  /** 1..12 */
  readonly month: number;
  /** 1..31, always valid for the month */
  readonly day: number;
}

/**
 * Relative date keywords, offsets from the current local calendar date.
 */
export type DateShortcut = 'today' | 'tomorrow' | 'yesterday' | 'day_after';

/**
 * How the user asked for a location.
 */
export type LocationRequest =
  | { readonly mode: 'auto' }
  | { readonly mode: 'name'; readonly name: string }
  | { readonly mode: 'zipcode'; readonly zipcode: string; readonly country?: string }
  | { readonly mode: 'coordinates'; readonly latitude: number; readonly longitude: number };

export type LocationMode = LocationRequest['mode'];

/**
 * Presentation modes for the formatted result.
 */
export type OutputMode = 'human' | 'json' | 'brief' | 'verbose';

/**
 * Outcome of zone resolution. `fallback` is set when the lookup failed
 * and UTC was substituted.
 */
export interface ZoneResolution {
  readonly zone: TimeZoneId;
  readonly fallback: boolean;
}

/**
 * Elapsed time split into clock components.
 */
export interface ElapsedTime {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/**
 * Fields shared by every solar result.
 */
interface SolarResultBase {
  readonly date: DateSelection;
  readonly location: Location;
  readonly zone: ZoneResolution;
  /** Sun transit for the date */
  readonly solarNoon: Date;
  /** Sun 6° below the horizon in the morning, absent when it never gets there */
  readonly civilDawn?: Date;
  /** Sun 6° below the horizon in the evening, absent when it never gets there */
  readonly civilDusk?: Date;
  /** Daylight in whole seconds, range [0, 86400] */
  readonly daylightSeconds: number;
}

/**
 * The sun rises and sets on the date.
 * Invariant: sunset - sunrise === daylightSeconds * 1000.
 */
export interface NormalSolarResult extends SolarResultBase {
  readonly kind: 'normal';
  readonly sunrise: Date;
  readonly sunset: Date;
}

/**
 * Polar day (`all_day`, 24h of daylight) or polar night (`all_night`, none).
 */
export interface PolarSolarResult extends SolarResultBase {
  readonly kind: 'all_day' | 'all_night';
}

/**
 * Solar result (discriminated union on `kind`).
 */
export type SolarResult = NormalSolarResult | PolarSolarResult;

export type SolarMarker = SolarResult['kind'];
