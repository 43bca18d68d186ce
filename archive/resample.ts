/**
 * Weather Archive - Historical Resampling
 *
 * Builds a synthetic history: for each day D in a date range, take the record
 * observed on the same month/day in a randomly chosen year and re-date it to D.
 *
 * Years are reshuffled for every day, so consecutive days may draw from
 * different years. A day with no observation in any candidate year is left
 * out of the result.
 */

import type { WeatherArchive } from './archive';
import { addDays, monthDayInYear } from './date';
import { defaultRandomSource, shuffleInPlace, type RandomSource } from './random';
import { withTimestamp } from './record';
import type { WeatherRecord } from './types';

/** Integers low..high inclusive; empty when low > high. */
export function yearSpan(low: number, high: number): number[] {
    const years: number[] = [];
    for (let year = low; year <= high; year++) years.push(year);
    return years;
}

/**
 * Find a record for the month/day of `day`, walking `years` in order.
 * Years where that date does not exist are skipped.
 */
function firstObservation(
    archive: WeatherArchive,
    day: number,
    years: readonly number[]
): WeatherRecord | undefined {
    for (const year of years) {
        const timestamp = monthDayInYear(day, year);
        if (timestamp === undefined) continue;
        const record = archive.retrieve(timestamp);
        if (record) return record;
    }
    return undefined;
}

/**
 * Resample [dateRangeStart, dateRangeEnd] (day timestamps, inclusive) from
 * observations in years [yearRangeLow, yearRangeHigh].
 *
 * @returns one re-dated record per day that found an observation, ascending
 */
export function sampleHistorical(
    archive: WeatherArchive,
    dateRangeStart: number,
    dateRangeEnd: number,
    yearRangeLow: number,
    yearRangeHigh: number,
    random: RandomSource = defaultRandomSource
): WeatherRecord[] {
    const out: WeatherRecord[] = [];
    const years = yearSpan(yearRangeLow, yearRangeHigh);
    if (years.length === 0) return out;

    for (let day = dateRangeStart; day <= dateRangeEnd; day = addDays(day, 1)) {
        shuffleInPlace(years, random);
        const record = firstObservation(archive, day, years);
        if (record) out.push(withTimestamp(record, day));
    }
    return out;
}
