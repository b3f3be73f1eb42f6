import { UTCDate } from '@date-fns/utc';
import { format, isValid, parse } from 'date-fns';
import { FormatError, errorMessage } from '../errors.js';

/** Pattern used when a `date` attribute declares none (ISO-8601 local date-time). */
export const DEFAULT_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const TOKEN_OPTIONS = {
  useAdditionalWeekYearTokens: true,
  useAdditionalDayOfYearTokens: true,
} as const;

// Fields a pattern leaves out default to 1970-01-01 00:00:00.000 UTC.
const referenceDate = (): UTCDate => new UTCDate(1970, 0, 1, 0, 0, 0, 0);

/** Offset (`X`, `x`) and epoch (`t`, `T`) tokens pin the instant themselves. */
const ABSOLUTE_TOKENS = /[XxtT]/;

// Without a zone token date-fns moves the parsed fields into the process time zone.
const UTC_SUFFIX = '+00:00';
const UTC_SUFFIX_TOKEN = 'XXX';

/**
 * A compiled date pattern.
 *
 * Wall-clock values are interpreted in UTC, independent of the process time
 * zone; patterns with an offset or epoch token keep the instant they describe.
 */
export class DateFormat {
  private readonly absolute: boolean;

  /** @throws FormatError (`INVALID_DATE_FORMAT`) when the pattern cannot format and parse back a date. */
  constructor(readonly pattern: string) {
    if (pattern.trim() === '') {
      throw new FormatError('Invalid date format: empty pattern', 'INVALID_DATE_FORMAT');
    }
    this.absolute = ABSOLUTE_TOKENS.test(pattern.replace(/'[^']*'/g, ''));

    let roundTrip: Date;
    try {
      roundTrip = this.parseDate(format(referenceDate(), pattern, TOKEN_OPTIONS));
    } catch (error) {
      throw new FormatError(`Invalid date format: ${pattern}`, 'INVALID_DATE_FORMAT', undefined, errorMessage(error));
    }
    if (!isValid(roundTrip)) {
      throw new FormatError(
        `Invalid date format: ${pattern}`,
        'INVALID_DATE_FORMAT',
        undefined,
        'Formatted dates cannot be parsed back',
      );
    }
  }

  /**
   * Epoch milliseconds of `text`.
   *
   * @throws FormatError (`MALFORMED_ROW`) when `text` does not match the pattern.
   */
  parse(text: string): number {
    const parsed = this.parseDate(text);
    if (!isValid(parsed)) {
      throw new FormatError(`Unparseable date "${text}" for format ${this.pattern}`, 'MALFORMED_ROW');
    }
    return parsed.getTime();
  }

  private parseDate(text: string): Date {
    if (this.absolute) {
      return parse(text, this.pattern, referenceDate(), TOKEN_OPTIONS);
    }
    return parse(
      `${text.trimEnd()}${UTC_SUFFIX}`,
      `${this.pattern}${UTC_SUFFIX_TOKEN}`,
      referenceDate(),
      TOKEN_OPTIONS,
    );
  }
}
