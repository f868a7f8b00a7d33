import { isSameDate, toIsoDateString } from '../date/calendar.js';
import type { DateSelection, OutputMode, SolarMarker, SolarResult } from '../domain/types.js';
import { toElapsedTime } from '../solar/computeSolar.js';
import {
  formatClockTime,
  formatElapsed,
  formatLongDate,
  toZonedIsoString,
} from './zoned.js';

export const OUTPUT_MODES: readonly OutputMode[] = ['human', 'json', 'brief', 'verbose'];

export interface FormatOptions {
  /** When the result's date equals this one, the heading says "today" */
  readonly today?: DateSelection;
}

/**
 * Serialized shape of the `json` output mode.
 */
export interface SolarReportJson {
  date: string;
  location: {
    name: string;
    latitude: number;
    longitude: number;
    timezone: string;
    timezone_fallback: boolean;
  };
  sunlight: {
    marker: SolarMarker;
    sunrise: string | null;
    sunset: string | null;
    sunrise_time: string | null;
    sunset_time: string | null;
    duration: string;
    duration_hours: number;
  };
  astronomical: {
    solar_noon: string;
    civil_dawn?: string;
    civil_dusk?: string;
  };
}

const POLAR_NOTE: Readonly<Record<Exclude<SolarMarker, 'normal'>, string>> = {
  all_day: 'none (sun up all day)',
  all_night: 'none (sun down all day)',
};

function durationText(result: SolarResult): string {
  return formatElapsed(toElapsedTime(result.daylightSeconds));
}

function heading(result: SolarResult, options: FormatOptions): string {
  const longDate = formatLongDate(result.date);
  const when =
    options.today && isSameDate(options.today, result.date) ? `today (${longDate})` : longDate;
  return `Sunlight for ${when} in ${result.location.displayName}`;
}

function humanLines(result: SolarResult, options: FormatOptions): string[] {
  const { zone } = result.zone;
  const sunrise = result.kind === 'normal' ? formatClockTime(result.sunrise, zone) : POLAR_NOTE[result.kind];
  const sunset = result.kind === 'normal' ? formatClockTime(result.sunset, zone) : POLAR_NOTE[result.kind];

  return [
    heading(result, options),
    `  Sunrise:  ${sunrise}`,
    `  Sunset:   ${sunset}`,
    `  Daylight: ${durationText(result)}`,
  ];
}

function verboseLines(result: SolarResult, options: FormatOptions): string[] {
  const { zone, fallback } = result.zone;
  const lines = [
    ...humanLines(result, options),
    `  Lat/Lon:  ${result.location.latitude}, ${result.location.longitude}`,
    `  Timezone: ${zone}${fallback ? ' (fallback)' : ''}`,
    '',
    'Astronomical information:',
    `  Solar noon: ${formatClockTime(result.solarNoon, zone)}`,
  ];
  // Twilight bounds only when the sun actually reaches -6° on this date
  if (result.civilDawn) {
    lines.push(`  Civil dawn: ${formatClockTime(result.civilDawn, zone)}`);
  }
  if (result.civilDusk) {
    lines.push(`  Civil dusk: ${formatClockTime(result.civilDusk, zone)}`);
  }
  return lines;
}

/**
 * Builds the `json` output object.
 */
export function toReportJson(result: SolarResult): SolarReportJson {
  const { zone, fallback } = result.zone;
  const normal = result.kind === 'normal' ? result : undefined;

  const astronomical: SolarReportJson['astronomical'] = {
    solar_noon: toZonedIsoString(result.solarNoon, zone),
  };
  if (result.civilDawn) {
    astronomical.civil_dawn = toZonedIsoString(result.civilDawn, zone);
  }
  if (result.civilDusk) {
    astronomical.civil_dusk = toZonedIsoString(result.civilDusk, zone);
  }

  return {
    date: toIsoDateString(result.date),
    location: {
      name: result.location.displayName,
      latitude: result.location.latitude,
      longitude: result.location.longitude,
      timezone: zone,
      timezone_fallback: fallback,
    },
    sunlight: {
      marker: result.kind,
      sunrise: normal ? toZonedIsoString(normal.sunrise, zone) : null,
      sunset: normal ? toZonedIsoString(normal.sunset, zone) : null,
      sunrise_time: normal ? formatClockTime(normal.sunrise, zone) : null,
      sunset_time: normal ? formatClockTime(normal.sunset, zone) : null,
      duration: durationText(result),
      duration_hours: Math.round((result.daylightSeconds / 3600) * 100) / 100,
    },
    astronomical,
  };
}

/**
 * Renders a solar result in the requested mode.
 *
 * - human: heading plus sunrise, sunset and daylight lines
 * - verbose: human plus coordinates, zone, solar noon and civil twilight
 * - json: pretty-printed SolarReportJson
 * - brief: the daylight duration alone, `HH:MM:SS`
 */
export function formatOutput(
  result: SolarResult,
  mode: OutputMode = 'human',
  options: FormatOptions = {},
): string {
  switch (mode) {
    case 'human':
      return humanLines(result, options).join('\n');
    case 'verbose':
      return verboseLines(result, options).join('\n');
    case 'json':
      return JSON.stringify(toReportJson(result), null, 2);
    case 'brief':
      return durationText(result);
    default: {
      // Exhaustive check - TypeScript will error if an OutputMode is missing
      const _exhaustive: never = mode;
      throw new Error(`Unknown output mode: ${_exhaustive}`);
    }
  }
}
