/**
 * Error kinds raised while resolving and computing a daylight report.
 *
 * All kinds are fatal to the invocation except `TimeZoneResolutionFailed`,
 * which the zone resolver downgrades to a warning and a UTC fallback.
 */
export type DaylightErrorKind =
  | 'InvalidDateFormat'
  | 'ConflictingDateArguments'
  | 'ConflictingLocationArguments'
  | 'ConflictingOutputModes'
  | 'GeolocationUnavailable'
  | 'LocationNotFound'
  | 'GeocodingFailed'
  | 'InvalidCoordinates'
  | 'TimeZoneResolutionFailed'
  | 'SolarComputationError'
  | 'UsageError';

/**
 * Daylight Error
 *
 * Carries a `kind` discriminant so the command boundary can pick an exit
 * code and message without inspecting message text.
 */
export class DaylightError extends Error {
  public readonly kind: DaylightErrorKind;

  constructor(kind: DaylightErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DaylightError';
    this.kind = kind;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DaylightError);
    }
  }
}

/**
 * Type guard, optionally narrowed to a single kind.
 */
export function isDaylightError(
  error: unknown,
  kind?: DaylightErrorKind,
): error is DaylightError {
  return error instanceof DaylightError && (kind === undefined || error.kind === kind);
}

/**
 * Best-effort text for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
