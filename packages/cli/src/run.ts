import { format } from 'node:util';
import {
  computeSolar,
  describeError,
  formatOutput,
  isDaylightError,
  localCalendarDate,
  resolveDate,
  resolveLocation,
  resolveZone,
  type DaylightErrorKind,
  type Geocoder,
  type IpLocator,
  type Logger,
  type SolarCalculator,
  type ZoneLookup,
} from '@daylight/core';
import { parseCommandLine, USAGE } from './args.js';

/**
 * Anything text can be written to (process.stdout in production).
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Everything a command run touches outside its arguments.
 */
export interface CommandDeps {
  readonly stdout: TextSink;
  readonly stderr: TextSink;
  readonly now: () => Date;
  readonly ipLocator: IpLocator;
  readonly geocoder: Geocoder;
  readonly zoneLookup: ZoneLookup;
  readonly solarCalculator?: SolarCalculator;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Exit status for a failure kind.
 */
export function exitCodeFor(kind: DaylightErrorKind): number {
  switch (kind) {
    case 'UsageError':
    case 'ConflictingDateArguments':
    case 'ConflictingLocationArguments':
    case 'ConflictingOutputModes':
      return EXIT_USAGE;
    case 'InvalidDateFormat':
    case 'InvalidCoordinates':
    case 'GeolocationUnavailable':
    case 'LocationNotFound':
    case 'GeocodingFailed':
    case 'TimeZoneResolutionFailed':
    case 'SolarComputationError':
      return EXIT_FAILURE;
    default: {
      // Exhaustive check - TypeScript will error if a kind is missing
      const _exhaustive: never = kind;
      throw new Error(`Unknown error kind: ${_exhaustive}`);
    }
  }
}

/**
 * Logger writing to stderr; debug lines only when enabled.
 */
export function createCliLogger(stderr: TextSink, debug: boolean): Logger {
  const line = (...data: unknown[]) => {
    stderr.write(`${format(...data)}\n`);
  };
  return {
    debug: debug ? (...data: unknown[]) => line('[debug]', ...data) : () => undefined,
    warn: line,
    error: line,
  };
}

/**
 * Runs one invocation: Date → Location → Zone → Solar → Format.
 * Prints the report to stdout, or a single error line to stderr.
 *
 * @param argv - Arguments without the node/script prefix
 * @returns The process exit status
 */
export async function run(argv: readonly string[], deps: CommandDeps): Promise<number> {
  let logger = createCliLogger(deps.stderr, false);

  try {
    const options = parseCommandLine(argv);
    if (options.help) {
      deps.stdout.write(`${USAGE}\n`);
      return EXIT_SUCCESS;
    }
    logger = createCliLogger(deps.stderr, options.debug);

    const now = deps.now();
    const date = resolveDate(options.date, now);
    logger.debug('date:', date);

    const location = await resolveLocation(options.location, {
      ipLocator: deps.ipLocator,
      geocoder: deps.geocoder,
      logger,
    });
    logger.debug('location:', location);

    const zone = resolveZone(location, deps.zoneLookup, logger);
    logger.debug('zone:', zone);

    const result = computeSolar(date, location, zone, deps.solarCalculator);
    deps.stdout.write(`${formatOutput(result, options.output, { today: localCalendarDate(now) })}\n`);
    return EXIT_SUCCESS;
  } catch (error) {
    if (isDaylightError(error)) {
      logger.error(`Error: ${error.message}`);
      return exitCodeFor(error.kind);
    }
    logger.error(`Error: ${describeError(error)}`);
    return EXIT_FAILURE;
  }
}
