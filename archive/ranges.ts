/**
 * Weather Archive - Range Strings
 *
 * Query ranges arrive as `YYYY-MM-DD|YYYY-MM-DD` (days) and `YYYY|YYYY`
 * (years). Both are inclusive and must not run backwards.
 */

import { dateStringToEpochSeconds, YEAR_REGEX } from './date';
import type { DateRange, YearRange } from './types';

export const RANGE_SEPARATOR = '|';
export const DATE_RANGE_LENGTH = 21;
export const YEAR_RANGE_LENGTH = 9;

export function parseDateRange(text: string): DateRange | undefined {
    if (text.length !== DATE_RANGE_LENGTH || text[10] !== RANGE_SEPARATOR) return undefined;

    const start = dateStringToEpochSeconds(text.slice(0, 10));
    const end = dateStringToEpochSeconds(text.slice(11));
    if (start === undefined || end === undefined || start > end) return undefined;

    return { start, end, text };
}

export function parseYearRange(text: string): YearRange | undefined {
    if (text.length !== YEAR_RANGE_LENGTH || text[4] !== RANGE_SEPARATOR) return undefined;

    const lowText = text.slice(0, 4);
    const highText = text.slice(5);
    if (!YEAR_REGEX.test(lowText) || !YEAR_REGEX.test(highText)) return undefined;

    const low = Number(lowText);
    const high = Number(highText);
    if (low > high) return undefined;

    return { low, high, text };
}
