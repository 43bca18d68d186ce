/**
 * Weather Archive - Query Service
 *
 * The four queries (single date, range, mean, historical sample) over string
 * inputs, shared by the command-line driver and the HTTP routes. Every
 * outcome is a tagged result; invalid input is reported, never thrown.
 */

import type { WeatherArchive } from './archive';
import { dateStringToEpochSeconds } from './date';
import { defaultRandomSource, type RandomSource } from './random';
import { parseDateRange, parseYearRange } from './ranges';
import { sampleHistorical } from './resample';
import { summarizeVariable, type MeanOptions } from './stats';
import { isVariableName } from './variables';
import type { DateRange, VariableName, WeatherRecord, YearRange } from './types';

export type InvalidReason =
    | 'INVALID_DATE'
    | 'INVALID_RANGE'
    | 'INVALID_YEARS'
    | 'UNRECOGNIZED_VARIABLE';

export interface InvalidQuery {
    kind: 'invalid';
    reason: InvalidReason;
    message: string;
}

export type DateQueryResult =
    | { kind: 'record'; record: WeatherRecord }
    | { kind: 'not_found'; date: string }
    | InvalidQuery;

export type RecordsQueryResult =
    | { kind: 'records'; records: WeatherRecord[] }
    | InvalidQuery;

export type MeanQueryResult =
    | { kind: 'mean'; variable: VariableName; range: DateRange; mean: number; count: number }
    | { kind: 'no_data'; variable: VariableName; range: DateRange }
    | InvalidQuery;

export interface QueryService {
    readonly archive: WeatherArchive;
    byDate(date: string): DateQueryResult;
    byRange(range: string): RecordsQueryResult;
    /** One argument is a date range, the other a variable name, in either order. */
    mean(first: string, second: string, options?: MeanOptions): MeanQueryResult;
    /** One argument is a date range, the other a year range, in either order. */
    sample(first: string, second: string, random?: RandomSource): RecordsQueryResult;
}

export interface QueryServiceOptions {
    /** Source for historical sampling when a call does not pass its own */
    random?: RandomSource;
}

function invalid(reason: InvalidReason, message: string): InvalidQuery {
    return { kind: 'invalid', reason, message };
}

function orderMeanArgs(
    first: string,
    second: string
): { range: DateRange; variable: string } | undefined {
    const firstRange = parseDateRange(first);
    if (firstRange) return { range: firstRange, variable: second };
    const secondRange = parseDateRange(second);
    if (secondRange) return { range: secondRange, variable: first };
    return undefined;
}

function orderSampleArgs(
    first: string,
    second: string
): { range: DateRange; years: YearRange } | undefined {
    const forward = { range: parseDateRange(first), years: parseYearRange(second) };
    if (forward.range && forward.years) return { range: forward.range, years: forward.years };
    const reverse = { range: parseDateRange(second), years: parseYearRange(first) };
    if (reverse.range && reverse.years) return { range: reverse.range, years: reverse.years };
    return undefined;
}

export function createQueryService(
    archive: WeatherArchive,
    options: QueryServiceOptions = {}
): QueryService {
    const defaultRandom = options.random ?? defaultRandomSource;

    return {
        archive,

        byDate(date) {
            const timestamp = dateStringToEpochSeconds(date);
            if (timestamp === undefined) {
                return invalid('INVALID_DATE', `Incorrect date "${date}", expected YYYY-MM-DD`);
            }
            const record = archive.retrieve(timestamp);
            return record ? { kind: 'record', record } : { kind: 'not_found', date };
        },

        byRange(text) {
            const range = parseDateRange(text);
            if (!range) {
                return invalid('INVALID_RANGE', `Incorrect date range "${text}", expected YYYY-MM-DD|YYYY-MM-DD`);
            }
            return { kind: 'records', records: archive.retrieveRange(range.start, range.end) };
        },

        mean(first, second, meanOptions) {
            const args = orderMeanArgs(first, second);
            if (!args) {
                return invalid('INVALID_RANGE', 'One input must be a date range formatted as YYYY-MM-DD|YYYY-MM-DD');
            }
            const { range, variable } = args;
            if (!isVariableName(variable)) {
                return invalid('UNRECOGNIZED_VARIABLE', `The variable "${variable}" is not recognized`);
            }

            const summary = summarizeVariable(archive, variable, range.start, range.end, meanOptions);
            if (summary.count === 0) return { kind: 'no_data', variable, range };
            return { kind: 'mean', variable, range, mean: summary.mean, count: summary.count };
        },

        sample(first, second, random) {
            const args = orderSampleArgs(first, second);
            if (!args) {
                return invalid(
                    'INVALID_YEARS',
                    'Expected a date range (YYYY-MM-DD|YYYY-MM-DD) and a year range (YYYY|YYYY)'
                );
            }
            const { range, years } = args;
            const records = sampleHistorical(
                archive,
                range.start,
                range.end,
                years.low,
                years.high,
                random ?? defaultRandom
            );
            return { kind: 'records', records };
        }
    };
}
