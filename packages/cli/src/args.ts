import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  DaylightError,
  describeError,
  type DateArguments,
  type DateShortcut,
  type LocationRequest,
  type OutputMode,
} from '@daylight/core';

/**
 * Fully validated command-line request.
 */
export interface CommandOptions {
  readonly help: boolean;
  readonly debug: boolean;
  readonly date: DateArguments;
  readonly location: LocationRequest;
  readonly output: OutputMode;
}

export const USAGE = `Usage: daylight [options]

Get sunlight hours for a given date and location.

Date (default: today):
  -d, --date <YYYY-MM-DD>   Specific date (or today, tomorrow, yesterday, day-after)
      --today               Use today's date
  -t, --tomorrow            Use tomorrow's date
  -y, --yesterday           Use yesterday's date
      --day-after           Use the day after tomorrow

Location (default: detected from your IP address):
  -l, --location <name>     Place name, e.g. "Paris, France"
  -z, --zipcode <code>      ZIP/postal code
  -c, --country <cc>        Country hint for --zipcode, e.g. us
      --latitude <deg>      Latitude in [-90, 90]
      --longitude <deg>     Longitude in [-180, 180]

Output (default: human-readable):
  -j, --json                JSON
  -b, --brief               Daylight duration only (HH:MM:SS)
  -v, --verbose             Add coordinates, time zone, solar noon and civil twilight

  -h, --help                Show this help
      --debug               Log lookups to stderr`;

const OPTIONS = {
  date: { type: 'string', short: 'd' },
  today: { type: 'boolean' },
  tomorrow: { type: 'boolean', short: 't' },
  yesterday: { type: 'boolean', short: 'y' },
  'day-after': { type: 'boolean' },
  location: { type: 'string', short: 'l' },
  zipcode: { type: 'string', short: 'z' },
  country: { type: 'string', short: 'c' },
  latitude: { type: 'string' },
  longitude: { type: 'string' },
  json: { type: 'boolean', short: 'j' },
  brief: { type: 'boolean', short: 'b' },
  verbose: { type: 'boolean', short: 'v' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const COORDINATE_FLAGS: ReadonlySet<string> = new Set(['--latitude', '--longitude']);

const NEGATIVE_NUMBER = /^-(\d|\.\d)/;

/**
 * Joins `--latitude -33.9` into `--latitude=-33.9`. parseArgs takes a
 * value starting with `-` for an option and refuses it otherwise.
 */
export function joinNegativeCoordinates(argv: readonly string[]): string[] {
  const joined: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const next = argv[i + 1];
    if (token === undefined) continue;
    if (COORDINATE_FLAGS.has(token) && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      joined.push(`${token}=${next}`);
      i++;
    } else {
      joined.push(token);
    }
  }
  return joined;
}

// strict by default: unknown options and positionals are rejected
function parseValues(argv: readonly string[]) {
  return parseArgs({ args: joinNegativeCoordinates(argv), options: OPTIONS }).values;
}

type ParsedValues = ReturnType<typeof parseValues>;

/**
 * Schema for a coordinate typed on the command line. Range is checked later.
 */
const coordinateArgSchema = z
  .string()
  .trim()
  .min(1)
  .transform((val) => Number(val))
  .pipe(z.number().finite());

function usageError(message: string, cause?: unknown): DaylightError {
  return new DaylightError('UsageError', message, { cause });
}

function dateArguments(values: ParsedValues): DateArguments {
  const shortcuts: DateShortcut[] = [];
  if (values.today) shortcuts.push('today');
  if (values.tomorrow) shortcuts.push('tomorrow');
  if (values.yesterday) shortcuts.push('yesterday');
  if (values['day-after']) shortcuts.push('day_after');

  if (shortcuts.length + (values.date !== undefined ? 1 : 0) > 1) {
    throw new DaylightError(
      'ConflictingDateArguments',
      'Options --date, --today, --tomorrow, --yesterday and --day-after are mutually exclusive',
    );
  }
  return { date: values.date, shortcut: shortcuts[0] };
}

function parseCoordinate(name: 'latitude' | 'longitude', value: string): number {
  const parsed = coordinateArgSchema.safeParse(value);
  if (!parsed.success) {
    throw new DaylightError('InvalidCoordinates', `Invalid --${name} value: "${value}" is not a number`);
  }
  return parsed.data;
}

function locationRequest(values: ParsedValues): LocationRequest {
  const hasCoordinates = values.latitude !== undefined || values.longitude !== undefined;
  const requested = [values.location !== undefined, values.zipcode !== undefined, hasCoordinates].filter(
    Boolean,
  ).length;

  if (requested > 1) {
    throw new DaylightError(
      'ConflictingLocationArguments',
      'Options --location, --zipcode and --latitude/--longitude are mutually exclusive',
    );
  }
  if (values.country !== undefined && values.zipcode === undefined) {
    throw usageError('Option --country can only be used with --zipcode');
  }

  if (values.location !== undefined) {
    return { mode: 'name', name: values.location };
  }
  if (values.zipcode !== undefined) {
    return { mode: 'zipcode', zipcode: values.zipcode, country: values.country };
  }
  if (hasCoordinates) {
    if (values.latitude === undefined || values.longitude === undefined) {
      throw new DaylightError('InvalidCoordinates', 'Both --latitude and --longitude are required');
    }
    return {
      mode: 'coordinates',
      latitude: parseCoordinate('latitude', values.latitude),
      longitude: parseCoordinate('longitude', values.longitude),
    };
  }
  return { mode: 'auto' };
}

function outputMode(values: ParsedValues): OutputMode {
  const modes: OutputMode[] = [];
  if (values.json) modes.push('json');
  if (values.brief) modes.push('brief');
  if (values.verbose) modes.push('verbose');

  if (modes.length > 1) {
    throw new DaylightError('ConflictingOutputModes', 'Options --json, --brief and --verbose are mutually exclusive');
  }
  return modes[0] ?? 'human';
}

/**
 * Parses and validates command-line arguments (without the node/script prefix).
 *
 * @throws DaylightError `UsageError` for unknown options or missing values, or a
 *         conflict/coordinate kind for mutually exclusive or malformed options
 */
export function parseCommandLine(argv: readonly string[]): CommandOptions {
  let values: ParsedValues;
  try {
    values = parseValues(argv);
  } catch (error) {
    throw usageError(describeError(error), error);
  }

  const help = values.help ?? false;
  const debug = values.debug ?? false;
  if (help) {
    return { help, debug, date: {}, location: { mode: 'auto' }, output: 'human' };
  }

  return {
    help,
    debug,
    date: dateArguments(values),
    location: locationRequest(values),
    output: outputMode(values),
  };
}
