/**
 * Weather Archive - Date Codec
 *
 * Converts `YYYY-MM-DD` calendar dates to Unix epoch seconds (UTC) and back.
 * All arithmetic happens in UTC at day granularity.
 */

import { DateTime } from 'luxon';

const DATE_PATTERN = '([12]\\d{3})-(0[1-9]|1[0-2])-(0[1-9]|[12]\\d|3[01])';

/** A full `YYYY-MM-DD` string and nothing else. */
export const DATE_REGEX = new RegExp(`^${DATE_PATTERN}$`);

/** A `YYYY-MM-DD` substring anywhere in the input. */
const DATE_SEARCH_REGEX = new RegExp(DATE_PATTERN);

export const YEAR_REGEX = /^[12]\d{3}$/;

function toEpochSeconds(dt: DateTime): number {
    return Math.floor(dt.toMillis() / 1000);
}

function fromEpochSeconds(seconds: number): DateTime {
    return DateTime.fromSeconds(seconds, { zone: 'utc' });
}

function utcDay(year: number, month: number, day: number): number | undefined {
    const dt = DateTime.fromObject({ year, month, day }, { zone: 'utc' });
    return dt.isValid ? toEpochSeconds(dt) : undefined;
}

/**
 * Convert a `YYYY-MM-DD` string to epoch seconds at 00:00 UTC.
 * Returns undefined for malformed strings and impossible dates (e.g. Feb 30).
 */
export function dateStringToEpochSeconds(value: string): number | undefined {
    const match = DATE_REGEX.exec(value);
    if (!match) return undefined;
    return utcDay(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Convert epoch seconds to the `YYYY-MM-DD` of the UTC day containing them.
 */
export function epochSecondsToDateString(seconds: number): string {
    return fromEpochSeconds(seconds).toFormat('yyyy-MM-dd');
}

/**
 * Find the first `YYYY-MM-DD` pattern inside a string.
 * Surrounding text is ignored, so `" 2016-03-03 "` yields `"2016-03-03"`.
 */
export function findDateString(value: string): string | undefined {
    return DATE_SEARCH_REGEX.exec(value)?.[0];
}

/** Move a day timestamp by a whole number of days. */
export function addDays(seconds: number, days: number): number {
    return toEpochSeconds(fromEpochSeconds(seconds).plus({ days }));
}

/**
 * The same month and day as `seconds`, in another year.
 * Undefined when that date does not exist (Feb 29 in a common year).
 */
export function monthDayInYear(seconds: number, year: number): number | undefined {
    const dt = fromEpochSeconds(seconds);
    return utcDay(year, dt.month, dt.day);
}
