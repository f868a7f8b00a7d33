import { DaylightError } from '../domain/errors.js';
import type { DateSelection, DateShortcut } from '../domain/types.js';
import { isoDateSchema } from '../domain/validation.js';
import { addDays, isValidCalendarDate, localCalendarDate } from './calendar.js';

/**
 * Day offset of each shortcut from the current local date.
 */
export const SHORTCUT_OFFSETS: Readonly<Record<DateShortcut, number>> = {
  today: 0,
  tomorrow: 1,
  yesterday: -1,
  day_after: 2,
};

/**
 * Keywords accepted in place of an explicit date string.
 */
const DATE_KEYWORDS: ReadonlyMap<string, DateShortcut> = new Map<string, DateShortcut>([
  ['today', 'today'],
  ['tomorrow', 'tomorrow'],
  ['yesterday', 'yesterday'],
  ['day-after', 'day_after'],
]);

/**
 * Date input as supplied by the caller. At most one field may be set.
 */
export interface DateArguments {
  /** `YYYY-MM-DD`, or one of: today, tomorrow, yesterday, day-after */
  readonly date?: string;
  readonly shortcut?: DateShortcut;
}

/**
 * Parses a strict `YYYY-MM-DD` string into a DateSelection.
 *
 * @throws DaylightError `InvalidDateFormat` if the shape is wrong or the date does not exist
 */
export function parseIsoDate(value: string): DateSelection {
  const parsed = isoDateSchema.safeParse(value);
  if (!parsed.success) {
    throw invalidDate(value);
  }

  const [year, month, day] = parsed.data.split('-').map((part) => Number.parseInt(part, 10));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    !isValidCalendarDate(year, month, day)
  ) {
    throw invalidDate(value);
  }

  return { year, month, day };
}

/**
 * Resolves the date to report on.
 *
 * - explicit `date`: parsed as `YYYY-MM-DD` (or a relative keyword)
 * - `shortcut`: offset from the local calendar date of `now`
 * - neither: the local calendar date of `now`
 *
 * @param args - Date input; supplying both fields is an error
 * @param now - Current instant, injected so results are reproducible
 * @throws DaylightError `ConflictingDateArguments` or `InvalidDateFormat`
 */
export function resolveDate(args: DateArguments, now: Date): DateSelection {
  const { date, shortcut } = args;

  if (date !== undefined && shortcut !== undefined) {
    throw new DaylightError(
      'ConflictingDateArguments',
      'Specify either an explicit date or a relative date option, not both',
    );
  }

  const today = localCalendarDate(now);

  if (date !== undefined) {
    const keyword = DATE_KEYWORDS.get(date.trim().toLowerCase());
    if (keyword !== undefined) {
      return addDays(today, SHORTCUT_OFFSETS[keyword]);
    }
    return parseIsoDate(date.trim());
  }

  return addDays(today, SHORTCUT_OFFSETS[shortcut ?? 'today']);
}

function invalidDate(value: string): DaylightError {
  return new DaylightError(
    'InvalidDateFormat',
    `Invalid date format: ${value}. Use YYYY-MM-DD or keywords: today, tomorrow, yesterday, day-after`,
  );
}
